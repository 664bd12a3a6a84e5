import { Logger } from "@nestjs/common";

import type { CacheStore } from "./cache/cache.store.js";
import { auditCacheKey, digest, visionCacheKey } from "./cache/keys.js";
import { applyMismatchOverride, detectMismatch } from "./mismatch.js";
import { normalizeAuditResponse, parseVisionObservation } from "./normalizer.js";
import type { ScoringPolicy } from "./policy.js";
import { DEFAULT_SCORING_POLICY } from "./policy.js";
import { errorRecord, lowQualityRecord, parseErrorRecord, scoredRecord } from "./records.js";
import type { AuditRecord } from "./types.js";

/** The two hosted inference capabilities. Either may reject. */
export interface InferenceBackend {
  analyzeImage(image: Buffer, mimeType: string): Promise<string>;
  compareAgainstProtocol(observation: string, protocol: string): Promise<string>;
}

export type StageResult<T> =
  | { status: "ok"; value: T }
  | { status: "failed"; reason: string };

export type PipelineState =
  | "UPLOADED"
  | "VISION_PENDING"
  | "VISION_CACHED"
  | "QUALITY_GATE"
  | "ABORTED_LOW_QUALITY"
  | "REASONING_PENDING"
  | "REASONING_CACHED"
  | "NORMALIZED"
  | "SCORED"
  | "MISMATCH_OVERRIDDEN"
  | "COMPLETE";

export interface AuditRequest {
  image: Buffer;
  mimeType: string;
  protocol: string;
}

export interface AuditTrace {
  auditId: string;
  imageDigest: string;
  protocolDigest: string;
  states: PipelineState[];
  visionCached: boolean;
  reasoningCached: boolean;
  visionError?: string;
}

export interface AuditOutcome {
  record: AuditRecord;
  trace: AuditTrace;
}

export function renderVisionFailure(reason: string): string {
  return `Vision analysis error: ${reason}`;
}

/**
 * Runs one audit: vision description, quality gate, protocol comparison, normalization,
 * scoring and the experiment-type override. Always resolves with a record.
 */
export class AuditPipeline {
  private readonly logger = new Logger(AuditPipeline.name);

  constructor(
    private readonly inference: InferenceBackend,
    private readonly cache: CacheStore,
    private readonly policy: ScoringPolicy = DEFAULT_SCORING_POLICY,
  ) {}

  async run(request: AuditRequest): Promise<AuditOutcome> {
    const imageDigest = digest(request.image);
    const protocolDigest = digest(request.protocol);
    const trace: AuditTrace = {
      auditId: auditCacheKey(imageDigest, protocolDigest),
      imageDigest,
      protocolDigest,
      states: ["UPLOADED"],
      visionCached: false,
      reasoningCached: false,
    };
    const finish = (record: AuditRecord): AuditOutcome => {
      trace.states.push("COMPLETE");
      return { record, trace };
    };

    const vision = await this.describeImage(request, trace);
    if (vision.status === "failed") {
      trace.visionError = vision.reason;
    }
    const observationText = vision.status === "ok" ? vision.value : renderVisionFailure(vision.reason);
    const observation = parseVisionObservation(observationText);

    trace.states.push("QUALITY_GATE");
    const experiment = detectMismatch(observation, request.protocol);
    if (observation.imageQuality !== null && observation.imageQuality < this.policy.minimumImageQuality) {
      this.logger.log(`Audit ${trace.auditId} halted: image quality ${observation.imageQuality}/10`);
      trace.states.push("ABORTED_LOW_QUALITY");
      return finish(lowQualityRecord(observation, experiment));
    }

    const comparison = await this.compare(observationText, request.protocol, vision.status === "ok", trace);
    if (comparison.status === "failed") {
      return finish(errorRecord(comparison.reason, experiment));
    }

    const normalized = normalizeAuditResponse(comparison.value);
    trace.states.push("NORMALIZED");
    if (normalized.kind === "unparseable") {
      this.logger.warn(`Audit ${trace.auditId} comparison output could not be parsed`);
      return finish(parseErrorRecord(normalized.raw, experiment));
    }

    const scored = scoredRecord(normalized.audit, experiment, this.policy);
    trace.states.push("SCORED");
    const record = applyMismatchOverride(scored, this.policy.mismatchScoreCap);
    if (record !== scored) {
      this.logger.log(
        `Audit ${trace.auditId} overridden: detected ${experiment.detected}, protocol expects ${experiment.expected}`,
      );
      trace.states.push("MISMATCH_OVERRIDDEN");
    }
    return finish(record);
  }

  private async describeImage(request: AuditRequest, trace: AuditTrace): Promise<StageResult<string>> {
    const key = visionCacheKey(trace.imageDigest);
    const cached = await this.readCache(key);
    if (cached !== undefined) {
      trace.states.push("VISION_CACHED");
      trace.visionCached = true;
      return { status: "ok", value: cached };
    }

    trace.states.push("VISION_PENDING");
    try {
      const text = await this.inference.analyzeImage(request.image, request.mimeType);
      await this.writeCache(key, text);
      return { status: "ok", value: text };
    } catch (error) {
      this.logger.error(`Vision analysis failed for ${trace.imageDigest}: ${(error as Error).message}`);
      return { status: "failed", reason: (error as Error).message };
    }
  }

  private async compare(
    observationText: string,
    protocol: string,
    cacheable: boolean,
    trace: AuditTrace,
  ): Promise<StageResult<string>> {
    const cached = await this.readCache(trace.auditId);
    if (cached !== undefined) {
      trace.states.push("REASONING_CACHED");
      trace.reasoningCached = true;
      return { status: "ok", value: cached };
    }

    trace.states.push("REASONING_PENDING");
    try {
      const text = await this.inference.compareAgainstProtocol(observationText, protocol);
      // A comparison built on a failed vision call must not shadow a later good run.
      if (cacheable) {
        await this.writeCache(trace.auditId, text);
      }
      return { status: "ok", value: text };
    } catch (error) {
      this.logger.error(`Protocol comparison failed for ${trace.auditId}: ${(error as Error).message}`);
      return { status: "failed", reason: (error as Error).message };
    }
  }

  private async readCache(key: string): Promise<string | undefined> {
    try {
      return await this.cache.get(key);
    } catch (error) {
      this.logger.warn(`Cache read failed for ${key}; treating as a miss: ${(error as Error).message}`);
      return undefined;
    }
  }

  private async writeCache(key: string, value: string): Promise<void> {
    try {
      await this.cache.put(key, value);
    } catch (error) {
      this.logger.warn(`Cache write failed for ${key}; continuing without it: ${(error as Error).message}`);
    }
  }
}
