export const DEFAULT_VISION_MODELS: readonly string[] = [
  "nvidia/nemotron-nano-12b-v2-vl",
  "nvidia/vlm-1b-instruct",
  "google/gemma-3-27b-it",
  "meta/llama-3.2-11b-vision-instruct",
];

export const DEFAULT_REASONING_MODEL = "nvidia/nemotron-3-nano-30b-a3b";

export interface Settings {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  visionModels: string[];
  reasoningModel: string;
  port: number;
}

function parseModelList(value: string | undefined): string[] {
  const models = (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return models.length > 0 ? models : [...DEFAULT_VISION_MODELS];
}

export function loadSettings(): Settings {
  return {
    apiKey: process.env.NIM_API_KEY ?? "",
    baseUrl: process.env.NIM_BASE_URL ?? "https://integrate.api.nvidia.com/v1",
    timeoutMs: Number(process.env.NIM_TIMEOUT_MS ?? "60000"),
    visionModels: parseModelList(process.env.VISION_MODELS),
    reasoningModel: process.env.REASONING_MODEL ?? DEFAULT_REASONING_MODEL,
    port: Number(process.env.PORT ?? "8090"),
  };
}
