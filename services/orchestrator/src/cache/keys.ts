import { createHash } from "node:crypto";

export function digest(content: Buffer | string): string {
  return createHash("sha256").update(content).digest("hex");
}

export function visionCacheKey(imageDigest: string): string {
  return `vision_${imageDigest}`;
}

export function auditCacheKey(imageDigest: string, protocolDigest: string): string {
  return `audit_${imageDigest}_${protocolDigest}`;
}
