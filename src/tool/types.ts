// pattern: Functional Core

/**
 * Tool system types for registration, dispatch, and model integration.
 * Tools declare their parameters for the model and a zod schema that decodes
 * the model's raw input before the handler sees it.
 */

import type { z } from 'zod';
import type { ToolDefinition as ModelToolDefinition } from '../model/types.ts';

export type ToolParameterType = 'string' | 'integer' | 'number' | 'boolean';

export type ToolParameter = {
  name: string;
  type: ToolParameterType;
  description: string;
  required: boolean;
  enum_values?: ReadonlyArray<string>;
};

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: ReadonlyArray<ToolParameter>;
};

/**
 * Attribution record for a piece of course content shown to the model.
 * Links are null when the store has none, never omitted.
 */
export type Source = {
  text: string;
  course_link: string | null;
  lesson_link: string | null;
};

export type ToolResult =
  | { success: true; output: string; sources: ReadonlyArray<Source> }
  | { success: false; error: string };

export type Tool<TInput> = {
  definition: ToolDefinition;
  input: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  handler: (input: TInput) => Promise<ToolResult>;
};

export interface ToolRegistry {
  register<TInput>(tool: Tool<TInput>): void;
  getDefinitions(): Array<ToolDefinition>;
  toModelTools(): Array<ModelToolDefinition>;
  dispatch(name: string, params: Record<string, unknown>): Promise<ToolResult>;
  getSources(): Array<Source>;
  clearSources(): void;
}
