// pattern: Functional Core
import { z } from "zod";

const AssistantConfigSchema = z.object({
  max_tool_rounds: z.number().int().positive().default(2),
  max_history: z.number().int().nonnegative().default(2),
  max_tokens: z.number().int().positive().default(1200),
  temperature: z.number().min(0).max(1).default(0),
});

const ModelConfigSchema = z.object({
  name: z.string(),
  api_key: z.string().optional(),
});

const EmbeddingConfigSchema = z.object({
  provider: z.enum(["openai", "ollama"]),
  model: z.string(),
  endpoint: z.string().url().optional(),
  dimensions: z.number().int().positive().default(768),
  api_key: z.string().optional(),
});

const DatabaseConfigSchema = z.object({
  url: z.string(),
});

const SearchConfigSchema = z
  .object({
    max_results: z.number().int().positive().default(5),
    chunk_size: z.number().int().positive().default(800),
    chunk_overlap: z.number().int().nonnegative().default(100),
  })
  .superRefine((data, ctx) => {
    if (data.chunk_overlap >= data.chunk_size) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "chunk_overlap must be smaller than chunk_size",
        path: ["chunk_overlap"],
      });
    }
  });

const DocsConfigSchema = z.object({
  path: z.string().default("./docs"),
});

const AppConfigSchema = z.object({
  assistant: AssistantConfigSchema.default({}),
  model: ModelConfigSchema,
  embedding: EmbeddingConfigSchema,
  database: DatabaseConfigSchema,
  search: SearchConfigSchema.default({}),
  docs: DocsConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AssistantConfig = z.infer<typeof AssistantConfigSchema>;
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type DocsConfig = z.infer<typeof DocsConfigSchema>;

export {
  AppConfigSchema,
  AssistantConfigSchema,
  ModelConfigSchema,
  EmbeddingConfigSchema,
  DatabaseConfigSchema,
  SearchConfigSchema,
  DocsConfigSchema,
};
