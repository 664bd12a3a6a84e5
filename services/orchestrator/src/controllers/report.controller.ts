import { Controller, Get, Inject, NotFoundException, Param } from "@nestjs/common";

import { ReportResponseDto } from "../dto/report-response.dto.js";
import { AuditService } from "../services/audit.service.js";

@Controller("report")
export class ReportController {
  constructor(
    @Inject(AuditService)
    private readonly auditService: AuditService,
  ) {}

  @Get(":auditId")
  async getReport(@Param("auditId") auditId: string): Promise<ReportResponseDto> {
    const report = await this.auditService.getReport(auditId);
    if (!report) {
      throw new NotFoundException(`report not found for audit ${auditId}`);
    }
    return {
      auditId: report.auditId,
      record: report.record,
      metadata: report.metadata,
      storedAt: report.storedAt.toISOString(),
    };
  }
}
