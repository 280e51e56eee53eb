// pattern: Functional Core

/**
 * Shared types for the completion service.
 * The agent loop talks to this port; the Anthropic adapter normalizes to it.
 */

export type TextBlock = {
  type: "text";
  text: string;
};

export type ToolUseBlock = {
  type: "tool_use";
  id: string;
  name: string;
  input: Record<string, unknown>;
};

export type ToolResultBlock = {
  type: "tool_result";
  tool_use_id: string;
  content: string;
  is_error?: boolean;
};

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock;

export type ToolInputSchema = {
  type: "object";
  properties: Record<string, unknown>;
  required: Array<string>;
};

export type ToolDefinition = {
  name: string;
  description: string;
  input_schema: ToolInputSchema;
};

export type ToolChoice = { type: "auto" } | { type: "any" } | { type: "tool"; name: string };

export type Message = {
  role: "user" | "assistant";
  content: string | Array<ContentBlock>;
};

export type ModelRequest = {
  messages: ReadonlyArray<Message>;
  system?: string;
  tools?: ReadonlyArray<ToolDefinition>;
  tool_choice?: ToolChoice;
  model: string;
  max_tokens: number;
  temperature?: number;
};

export type StopReason = "end_turn" | "tool_use" | "max_tokens" | "stop_sequence";

export type UsageStats = {
  input_tokens: number;
  output_tokens: number;
  cache_creation_input_tokens?: number | null;
  cache_read_input_tokens?: number | null;
};

export type ModelResponse = {
  content: Array<ContentBlock>;
  stop_reason: StopReason;
  usage: UsageStats;
};

export type ModelErrorCode = "auth" | "rate_limit" | "timeout" | "api_error";

export class ModelError extends Error {
  constructor(
    public code: ModelErrorCode,
    public retryable: boolean = false,
    message: string = ""
  ) {
    super(message);
    this.name = "ModelError";
  }
}

export interface ModelProvider {
  complete(request: ModelRequest): Promise<ModelResponse>;
}
