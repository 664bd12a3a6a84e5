import fetch from "node-fetch";
import { z } from "zod";

import type { Settings } from "./config.js";

export type ContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export interface ChatMessage {
  role: "system" | "user";
  content: string | ContentPart[];
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  maxTokens: number;
  extraBody?: Record<string, unknown>;
}

export interface ChatCompletion {
  text: string;
  model: string;
}

const completionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      }),
    )
    .min(1),
});

export class NimApiError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = "NimApiError";
  }
}

/** Minimal client for an OpenAI-compatible chat completions endpoint. */
export class NimClient {
  constructor(private readonly settings: Pick<Settings, "apiKey" | "baseUrl" | "timeoutMs">) {}

  async complete(request: ChatRequest): Promise<ChatCompletion> {
    const json = await this.post("chat/completions", {
      model: request.model,
      messages: request.messages,
      max_tokens: request.maxTokens,
      temperature: 0,
      ...request.extraBody,
    });
    const parsed = completionSchema.parse(json);
    const text = parsed.choices[0]?.message.content ?? "";
    if (text.trim().length === 0) {
      throw new NimApiError(`Model ${request.model} returned an empty completion`);
    }
    return { text, model: parsed.model ?? request.model };
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    const base = this.settings.baseUrl.endsWith("/")
      ? this.settings.baseUrl
      : `${this.settings.baseUrl}/`;
    const url = new URL(path, base).toString();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.settings.timeoutMs);
    try {
      const response = await fetch(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.settings.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      if (!response.ok) {
        const text = await response.text();
        throw new NimApiError(`NIM API error: ${response.status} ${text}`, response.status);
      }
      return await response.json();
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new NimApiError(`NIM request timed out after ${this.settings.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }
}
