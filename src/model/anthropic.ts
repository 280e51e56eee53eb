// pattern: Imperative Shell

import Anthropic from "@anthropic-ai/sdk";
import type { ModelConfig } from "../config/schema.ts";
import type {
  ContentBlock,
  Message,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  StopReason,
  ToolDefinition,
  UsageStats,
} from "./types.ts";
import { ModelError } from "./types.ts";
import { callWithRetry } from "./retry.ts";

/**
 * Structural view of an SDK response block. Wide enough to accept every
 * block kind the API may return, so unknown kinds can be dropped instead of
 * failing the whole response.
 */
export type RawContentBlock = {
  type: string;
  text?: string;
  id?: string;
  name?: string;
  input?: unknown;
};

function isRetryableError(error: unknown): boolean {
  return error instanceof ModelError && error.retryable;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toModelError(error: unknown): unknown {
  if (error instanceof Anthropic.AuthenticationError) {
    return new ModelError("auth", false, error.message || "authentication failed");
  }
  if (error instanceof Anthropic.RateLimitError) {
    return new ModelError("rate_limit", true, error.message || "rate limit exceeded");
  }
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new ModelError("timeout", true, error.message || "request timed out");
  }
  if (error instanceof Anthropic.APIError) {
    return new ModelError("api_error", false, error.message || "api error");
  }
  return error;
}

function normalizeToolDefinitions(
  tools: ReadonlyArray<ToolDefinition>
): Array<Anthropic.Messages.Tool> {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: tool.input_schema,
  }));
}

export function normalizeMessage(msg: Message): Anthropic.Messages.MessageParam {
  if (typeof msg.content === "string") {
    return {
      role: msg.role,
      content: msg.content,
    };
  }

  const content = msg.content.map((block): Anthropic.Messages.ContentBlockParam => {
    switch (block.type) {
      case "text":
        return { type: "text", text: block.text };
      case "tool_use":
        return { type: "tool_use", id: block.id, name: block.name, input: block.input };
      case "tool_result":
        return {
          type: "tool_result",
          tool_use_id: block.tool_use_id,
          content: block.content,
          ...(block.is_error !== undefined && { is_error: block.is_error }),
        };
    }
  });

  return {
    role: msg.role,
    content,
  };
}

export function buildAnthropicParams(
  request: ModelRequest
): Anthropic.Messages.MessageCreateParamsNonStreaming {
  return {
    model: request.model,
    max_tokens: request.max_tokens,
    messages: request.messages.map(normalizeMessage),
    ...(request.system !== undefined && { system: request.system }),
    ...(request.temperature !== undefined && { temperature: request.temperature }),
    ...(request.tools && request.tools.length > 0 && { tools: normalizeToolDefinitions(request.tools) }),
    ...(request.tool_choice && { tool_choice: request.tool_choice }),
  };
}

export function normalizeContentBlocks(blocks: ReadonlyArray<RawContentBlock>): Array<ContentBlock> {
  const normalized: Array<ContentBlock> = [];

  for (const block of blocks) {
    if (block.type === "text" && typeof block.text === "string") {
      normalized.push({ type: "text", text: block.text });
    } else if (block.type === "tool_use" && block.id !== undefined && block.name !== undefined) {
      normalized.push({
        type: "tool_use",
        id: block.id,
        name: block.name,
        input: isRecord(block.input) ? block.input : {},
      });
    }
    // thinking and other block kinds carry nothing the agent loop consumes
  }

  return normalized;
}

export function normalizeStopReason(reason: string | null): StopReason {
  switch (reason) {
    case "tool_use":
      return "tool_use";
    case "max_tokens":
      return "max_tokens";
    case "stop_sequence":
      return "stop_sequence";
    default:
      return "end_turn";
  }
}

function normalizeUsage(usage: {
  input_tokens: number;
  output_tokens: number;
  cache_creation_input_tokens?: number | null;
  cache_read_input_tokens?: number | null;
}): UsageStats {
  return {
    input_tokens: usage.input_tokens,
    output_tokens: usage.output_tokens,
    cache_creation_input_tokens: usage.cache_creation_input_tokens ?? null,
    cache_read_input_tokens: usage.cache_read_input_tokens ?? null,
  };
}

export function createAnthropicAdapter(config: ModelConfig): ModelProvider {
  const apiKey = config.api_key || process.env["ANTHROPIC_API_KEY"];

  if (!apiKey) {
    throw new Error(
      "anthropic adapter requires api_key in config or ANTHROPIC_API_KEY environment variable"
    );
  }

  const client = new Anthropic({
    apiKey,
  });

  return {
    async complete(request: ModelRequest): Promise<ModelResponse> {
      const response = await callWithRetry(
        async () => {
          try {
            return await client.messages.create(buildAnthropicParams(request));
          } catch (error) {
            throw toModelError(error);
          }
        },
        isRetryableError,
        {
          onError: (error, attempt) => {
            if (isRetryableError(error)) {
              const message = error instanceof Error ? error.message : String(error);
              console.warn(`[model] attempt ${attempt + 1} failed: ${message}`);
            }
          },
        }
      );

      return {
        content: normalizeContentBlocks(response.content),
        stop_reason: normalizeStopReason(response.stop_reason),
        usage: normalizeUsage(response.usage),
      };
    },
  };
}
