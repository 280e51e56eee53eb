// pattern: Functional Core

/**
 * Agent loop module exports
 */

export type { Agent, AgentConfig, AgentDependencies, RunOptions } from './types.ts';
export { TextExtractionError } from './types.ts';
export { createAgent, extractText, executeToolCalls, FALLBACK_ANSWER } from './agent.ts';
export { buildSystemPrompt, SYSTEM_PROMPT } from './prompt.ts';
