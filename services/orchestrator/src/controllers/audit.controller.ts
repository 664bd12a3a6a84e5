import { Body, Controller, HttpCode, HttpStatus, Inject, Post } from "@nestjs/common";

import { AuditRequestDto } from "../dto/audit-request.dto.js";
import { AuditResponseDto } from "../dto/audit-response.dto.js";
import { AuditService } from "../services/audit.service.js";

@Controller("audit")
export class AuditController {
  constructor(
    @Inject(AuditService)
    private readonly auditService: AuditService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async audit(@Body() body: AuditRequestDto): Promise<AuditResponseDto> {
    return this.auditService.audit(body);
  }
}
