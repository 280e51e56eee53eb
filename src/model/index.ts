// pattern: Functional Core

export type {
  TextBlock,
  ToolUseBlock,
  ToolResultBlock,
  ContentBlock,
  ToolInputSchema,
  ToolDefinition,
  ToolChoice,
  Message,
  ModelRequest,
  StopReason,
  UsageStats,
  ModelResponse,
  ModelErrorCode,
  ModelProvider,
} from "./types.ts";

export { ModelError } from "./types.ts";
export { createAnthropicAdapter } from "./anthropic.ts";
export { callWithRetry } from "./retry.ts";
