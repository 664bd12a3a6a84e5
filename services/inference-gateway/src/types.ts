import { z } from "zod";

export interface InferenceResult {
  text: string;
  model: string;
}

export const compareRequestSchema = z.object({
  observation: z.string(),
  protocol: z.string().trim().min(1),
});

export type CompareRequest = z.infer<typeof compareRequestSchema>;
