import { z } from "zod";

export const ConfigSchema = z.object({
  ai: z
    .object({
      anthropicKey: z.string().optional(),
      model: z.string().default("claude-3-5-sonnet-latest"),
      maxTokens: z.number().int().positive().default(1024),
      timeoutMs: z.number().int().positive().default(60_000),
      retries: z.number().int().min(0).default(2),
    })
    .default({}),
  cookbook: z
    .object({
      title: z.string().min(1).default("My Personal Cookbook"),
      output: z.string().min(1).default("cookbook.html"),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
