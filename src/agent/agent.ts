// pattern: Imperative Shell

/**
 * Bounded multi-round tool-use loop.
 * Calls the model, runs the tools it asks for, folds the results back into
 * the conversation and stops at the first final answer. When the round
 * budget runs out it makes one last call with tools withheld.
 */

import { buildSystemPrompt } from './prompt.ts';
import { TextExtractionError } from './types.ts';
import type { Agent, AgentDependencies, RunOptions } from './types.ts';
import type {
  ContentBlock,
  Message,
  ModelRequest,
  ModelResponse,
  ToolResultBlock,
  ToolUseBlock,
} from '../model/types.ts';
import type { ToolRegistry } from '../tool/types.ts';

export const FALLBACK_ANSWER =
  "I've searched through the course materials but need more tool calls to fully answer your question. " +
  'Please try asking a more specific question, or break your question into smaller parts.';

function isToolUse(block: ContentBlock): block is ToolUseBlock {
  return block.type === 'tool_use';
}

/**
 * Return the text of the first text block.
 * Throws TextExtractionError when the response has none.
 */
export function extractText(response: ModelResponse): string {
  for (const block of response.content) {
    if (block.type === 'text') {
      return block.text;
    }
  }
  throw new TextExtractionError(
    response.stop_reason,
    response.content.map((block) => block.type),
  );
}

/**
 * Run every tool request in the order given. One result per request, in the
 * same order; failures become error results rather than exceptions.
 */
export async function executeToolCalls(
  toolUses: ReadonlyArray<ToolUseBlock>,
  registry: ToolRegistry,
): Promise<Array<ToolResultBlock>> {
  const results: Array<ToolResultBlock> = [];

  for (const toolUse of toolUses) {
    const result = await registry.dispatch(toolUse.name, toolUse.input);
    results.push({
      type: 'tool_result',
      tool_use_id: toolUse.id,
      content: result.success ? result.output : result.error,
      is_error: !result.success,
    });
  }

  return results;
}

export function createAgent(deps: AgentDependencies): Agent {
  const { model, config } = deps;

  function baseRequest(messages: ReadonlyArray<Message>, system: string): ModelRequest {
    return {
      messages,
      system,
      model: config.model_name,
      max_tokens: config.max_tokens,
      temperature: config.temperature,
    };
  }

  async function finalSynthesis(messages: ReadonlyArray<Message>, system: string): Promise<string> {
    const response = await model.complete(baseRequest(messages, system));
    try {
      return extractText(response);
    } catch (error) {
      if (!(error instanceof TextExtractionError)) {
        throw error;
      }
      console.warn(`[agent] final synthesis returned no text: ${error.message}`);
      return FALLBACK_ANSWER;
    }
  }

  async function run(query: string, options: RunOptions = {}): Promise<string> {
    const maxRounds = options.maxRounds ?? config.max_tool_rounds;
    if (!Number.isInteger(maxRounds) || maxRounds < 1) {
      throw new RangeError(`round budget must be a positive integer, got ${maxRounds}`);
    }

    const registry = options.registry ?? null;
    const tools = registry ? registry.toModelTools() : [];
    const system = buildSystemPrompt(options.history);
    const messages: Array<Message> = [{ role: 'user', content: query }];

    for (let round = 1; round <= maxRounds; round++) {
      const request = baseRequest(messages, system);
      if (tools.length > 0) {
        request.tools = tools;
        request.tool_choice = { type: 'auto' };
      }

      const response = await model.complete(request);
      const toolUses = response.content.filter(isToolUse);

      if (response.stop_reason !== 'tool_use' || !registry || toolUses.length === 0) {
        return extractText(response);
      }

      messages.push({ role: 'assistant', content: response.content });
      messages.push({ role: 'user', content: await executeToolCalls(toolUses, registry) });
    }

    return finalSynthesis(messages, system);
  }

  return { run };
}
