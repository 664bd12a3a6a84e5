import type { ScoringPolicy, ScoringPolicyOverrides } from "./policy.js";
import { resolvePolicy, scoringOverridesSchema } from "./policy.js";

export type CacheDriver = "file" | "s3" | "memory" | "none";

const CACHE_DRIVERS: readonly CacheDriver[] = ["file", "s3", "memory", "none"];

export interface ServiceEndpoints {
  inferenceUrl?: string;
}

export interface DatabaseConfig {
  url?: string;
}

export interface CacheObjectStorageConfig {
  bucket?: string;
  region?: string;
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  prefix?: string;
}

export interface CacheConfig {
  driver: CacheDriver;
  filePath: string;
  objectStorage: CacheObjectStorageConfig;
}

export interface AppConfig {
  port: number;
  endpoints: ServiceEndpoints;
  database: DatabaseConfig;
  cache: CacheConfig;
  defaultMimeType: string;
  scoring: ScoringPolicy;
}

function parseCacheDriver(value: string | undefined): CacheDriver {
  const driver = CACHE_DRIVERS.find((candidate) => candidate === value?.toLowerCase());
  if (value && !driver) {
    throw new Error(`Unsupported CACHE_DRIVER "${value}". Expected one of ${CACHE_DRIVERS.join(", ")}`);
  }
  return driver ?? "file";
}

function parseScoringOverrides(value: string | undefined): ScoringPolicyOverrides {
  if (!value) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    throw new Error(`Failed to parse SCORING_POLICY: ${(error as Error).message}`);
  }
  return scoringOverridesSchema.parse(parsed);
}

export function loadConfig(): AppConfig {
  return {
    port: Number(process.env.PORT ?? "8080"),
    endpoints: {
      inferenceUrl: process.env.INFERENCE_URL,
    },
    database: {
      url: process.env.DATABASE_URL,
    },
    cache: {
      driver: parseCacheDriver(process.env.CACHE_DRIVER),
      filePath: process.env.CACHE_FILE ?? ".audit-cache.json",
      objectStorage: {
        bucket: process.env.CACHE_BUCKET,
        region: process.env.CACHE_REGION,
        endpoint: process.env.CACHE_ENDPOINT,
        accessKeyId: process.env.CACHE_ACCESS_KEY_ID,
        secretAccessKey: process.env.CACHE_SECRET_ACCESS_KEY,
        prefix: process.env.CACHE_PREFIX,
      },
    },
    defaultMimeType: process.env.DEFAULT_MIME_TYPE ?? "image/jpeg",
    scoring: resolvePolicy(parseScoringOverrides(process.env.SCORING_POLICY)),
  };
}
