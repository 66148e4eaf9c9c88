import { z } from "zod";

export const chatMessageSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  content: z.string(),
});

/**
 * Supported subset of the OpenAI Chat Completions request.
 * Unrecognized fields (top_p, user, ...) are accepted and dropped.
 */
export const chatRequestSchema = z.object({
  model: z.string().min(1, "model is required"),
  messages: z
    .array(chatMessageSchema)
    .min(1, "messages must contain at least one message")
    .refine((messages) => messages.some((m) => m.role === "user"), "messages must contain a user message"),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().nullish(),
  stream: z.boolean().nullish(),
});

export type ChatMessage = z.infer<typeof chatMessageSchema>;
export type ChatRequest = z.infer<typeof chatRequestSchema>;
