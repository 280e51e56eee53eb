// pattern: Imperative Shell

import TOML from "@iarna/toml";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { AppConfigSchema } from "./schema.ts";
import type { AppConfig } from "./schema.ts";

export type {
  AppConfig,
  AssistantConfig,
  ModelConfig,
  EmbeddingConfig,
  DatabaseConfig,
  SearchConfig,
  DocsConfig,
} from "./schema.ts";

function asTable(value: unknown): Record<string, unknown> {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}

export function loadConfig(configPath?: string): AppConfig {
  const resolvedPath = resolve(configPath ?? "config.toml");
  const raw = readFileSync(resolvedPath, "utf-8");
  const parsed: Record<string, unknown> = TOML.parse(raw);

  // Environment variable overrides for secrets
  const envOverrides: Record<string, unknown> = {};

  if (process.env["ANTHROPIC_API_KEY"]) {
    const modelObj = asTable(parsed["model"]);
    modelObj["api_key"] = process.env["ANTHROPIC_API_KEY"];
    envOverrides["model"] = modelObj;
  }

  if (process.env["EMBEDDING_API_KEY"]) {
    const embeddingObj = asTable(parsed["embedding"]);
    embeddingObj["api_key"] = process.env["EMBEDDING_API_KEY"];
    envOverrides["embedding"] = embeddingObj;
  }

  if (process.env["DATABASE_URL"]) {
    envOverrides["database"] = { url: process.env["DATABASE_URL"] };
  }

  const merged = { ...parsed, ...envOverrides };
  return AppConfigSchema.parse(merged);
}
