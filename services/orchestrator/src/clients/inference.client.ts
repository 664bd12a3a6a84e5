import { Inject, Injectable, Logger } from "@nestjs/common";
import { z } from "zod";

import type { AppConfig } from "../config.js";
import type { InferenceBackend } from "../pipeline.js";
import { APP_CONFIG } from "../tokens.js";

const inferenceResponseSchema = z.object({
  text: z.string(),
  model: z.string().optional(),
});

@Injectable()
export class InferenceClient implements InferenceBackend {
  private readonly logger = new Logger(InferenceClient.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  async analyzeImage(image: Buffer, mimeType: string): Promise<string> {
    const form = new FormData();
    form.append("image", new Blob([new Uint8Array(image)], { type: mimeType }), "image");
    const body = await this.post("vision", { body: form });
    return body.text;
  }

  async compareAgainstProtocol(observation: string, protocol: string): Promise<string> {
    const body = await this.post("compare", {
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ observation, protocol }),
    });
    return body.text;
  }

  private async post(path: string, init: RequestInit): Promise<z.infer<typeof inferenceResponseSchema>> {
    const endpoint = this.config.endpoints.inferenceUrl;
    if (!endpoint) {
      throw new Error("Inference endpoint not configured");
    }
    const response = await fetch(`${endpoint.replace(/\/$/, "")}/${path}`, {
      ...init,
      method: "POST",
    });
    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Inference ${path} request failed: ${response.status} ${text}`);
    }
    const parsed = inferenceResponseSchema.parse(await response.json());
    if (parsed.model) {
      this.logger.debug(`Inference ${path} answered by ${parsed.model}`);
    }
    return parsed;
  }
}
