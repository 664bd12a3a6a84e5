import { IsBase64, IsMimeType, IsNotEmpty, IsObject, IsOptional, IsString } from "class-validator";

export class AuditRequestDto {
  @IsBase64()
  image!: string;

  @IsOptional()
  @IsMimeType()
  mimeType?: string;

  @IsString()
  @IsNotEmpty()
  protocol!: string;

  @IsOptional()
  @IsObject()
  metadata?: Record<string, unknown>;
}
