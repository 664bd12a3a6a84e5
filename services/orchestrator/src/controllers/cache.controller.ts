import { Controller, Delete, HttpCode, HttpStatus, Inject, NotFoundException, Param } from "@nestjs/common";

import { AuditService } from "../services/audit.service.js";

@Controller("cache")
export class CacheController {
  constructor(
    @Inject(AuditService)
    private readonly auditService: AuditService,
  ) {}

  @Delete(":key")
  @HttpCode(HttpStatus.NO_CONTENT)
  async invalidate(@Param("key") key: string): Promise<void> {
    const removed = await this.auditService.invalidate(key);
    if (!removed) {
      throw new NotFoundException(`no cache entry for ${key}`);
    }
  }
}
