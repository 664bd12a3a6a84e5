import type { Settings } from "./config.js";
import { NimApiError } from "./nimClient.js";
import type { NimClient } from "./nimClient.js";
import { REASONING_SYSTEM_PROMPT, VISION_PROMPT, reasoningUserPrompt } from "./prompts.js";
import type { InferenceResult } from "./types.js";

const VISION_MAX_TOKENS = 2000;
const REASONING_MAX_TOKENS = 4000;

export class InferenceError extends Error {
  constructor(message: string, readonly upstreamStatus?: number) {
    super(message);
    this.name = "InferenceError";
  }
}

function upstreamStatus(error: unknown): number | undefined {
  return error instanceof NimApiError ? error.status : undefined;
}

export class InferenceService {
  constructor(
    private readonly client: NimClient,
    private readonly models: Pick<Settings, "visionModels" | "reasoningModel">,
  ) {}

  /** Tries each vision model in order and returns the first description produced. */
  async describeImage(image: Buffer, mimeType: string): Promise<InferenceResult> {
    const dataUrl = `data:${mimeType};base64,${image.toString("base64")}`;
    let lastError: unknown;
    for (const model of this.models.visionModels) {
      try {
        return await this.client.complete({
          model,
          maxTokens: VISION_MAX_TOKENS,
          messages: [
            {
              role: "user",
              content: [
                { type: "text", text: VISION_PROMPT },
                { type: "image_url", image_url: { url: dataUrl } },
              ],
            },
          ],
        });
      } catch (error) {
        lastError = error;
        console.warn(`Vision model ${model} failed: ${(error as Error).message}`);
      }
    }
    const reason = lastError instanceof Error ? lastError.message : "no vision models configured";
    throw new InferenceError(`All vision models unavailable: ${reason}`, upstreamStatus(lastError));
  }

  async compare(observation: string, protocol: string): Promise<InferenceResult> {
    try {
      return await this.client.complete({
        model: this.models.reasoningModel,
        maxTokens: REASONING_MAX_TOKENS,
        messages: [
          { role: "system", content: REASONING_SYSTEM_PROMPT },
          { role: "user", content: reasoningUserPrompt(observation, protocol) },
        ],
        extraBody: { chat_template_kwargs: { enable_thinking: false } },
      });
    } catch (error) {
      throw new InferenceError((error as Error).message, upstreamStatus(error));
    }
  }
}
