// pattern: Functional Core

/**
 * Agent types for the bounded tool-use loop.
 */

import type { ModelProvider } from '../model/types.ts';
import type { ToolRegistry } from '../tool/types.ts';

export type AgentConfig = {
  model_name: string;
  max_tokens: number;
  temperature: number;
  max_tool_rounds: number;
};

export type AgentDependencies = {
  model: ModelProvider;
  config: AgentConfig;
};

export type RunOptions = {
  /** Prior-conversation summary appended to the system prompt. */
  history?: string | null;
  registry?: ToolRegistry | null;
  maxRounds?: number;
};

export type Agent = {
  run(query: string, options?: RunOptions): Promise<string>;
};

export class TextExtractionError extends Error {
  constructor(
    public stopReason: string,
    public blockTypes: ReadonlyArray<string>,
  ) {
    super(
      `No text content found in response. Stop reason: ${stopReason}, Content blocks: [${blockTypes.join(', ')}]`,
    );
    this.name = 'TextExtractionError';
  }
}
