// pattern: Imperative Shell

/**
 * Course assistant entry point.
 * Composition root that wires all adapters, loads the course folder and
 * starts the interactive REPL.
 */

import * as readline from 'node:readline';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadConfig } from '@/config/config';
import { createPostgresProvider } from '@/persistence';
import { createAnthropicAdapter, ModelError } from '@/model';
import { createEmbeddingProvider, EmbeddingError } from '@/embedding';
import { createPostgresCourseStore } from '@/content';
import { createSessionManager } from '@/session';
import { createAgent, TextExtractionError } from '@/agent';
import { createCourseAssistant } from '@/assistant';
import type { CourseAssistant, QueryResult } from '@/assistant';
import type { CourseAnalytics } from '@/content';
import type { PersistenceProvider } from '@/persistence';

export type ReplState = {
  sessionId: string | null;
};

export type InteractionLoopDeps = {
  assistant: CourseAssistant;
  state: ReplState;
  write?: (text: string) => void;
};

export type LineOutcome = 'continue' | 'exit';

const HELP_TEXT = [
  'Ask a question about the loaded courses, or use a command:',
  '  /courses  list the loaded courses',
  '  /new      start a new conversation',
  '  /exit     quit',
].join('\n');

// SQLSTATE codes from the server, or socket errors from the pool
const DATABASE_ERROR_CODE = /^([0-9A-Z]{5}|ECONNREFUSED|ECONNRESET|ENOTFOUND)$/;

function isDatabaseError(error: unknown): error is Error & { code: string } {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    DATABASE_ERROR_CODE.test(error.code)
  );
}

/**
 * Turn a failure into a message for the person at the prompt.
 */
export function describeError(error: unknown): string {
  if (error instanceof ModelError) {
    switch (error.code) {
      case 'auth':
        return 'authentication with the completion service failed; check ANTHROPIC_API_KEY';
      case 'rate_limit':
        return 'the completion service is rate limiting requests; try again shortly';
      case 'timeout':
        return 'the completion service timed out; try again';
      case 'api_error':
        return `completion service error: ${error.message}`;
    }
  }
  if (error instanceof TextExtractionError) {
    return 'the completion service returned an unexpected response format';
  }
  if (error instanceof EmbeddingError) {
    return `embedding service error: ${error.message}`;
  }
  if (isDatabaseError(error)) {
    return `database error: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

export function formatAnswer(result: QueryResult): string {
  if (result.sources.length === 0) {
    return result.answer;
  }
  const lines = result.sources.map((source, i) => {
    const link = source.lesson_link ?? source.course_link;
    return link ? `  ${i + 1}. ${source.text} (${link})` : `  ${i + 1}. ${source.text}`;
  });
  return `${result.answer}\n\nSources:\n${lines.join('\n')}`;
}

export function formatAnalytics(analytics: CourseAnalytics): string {
  if (analytics.total_courses === 0) {
    return 'No courses loaded.';
  }
  const titles = analytics.course_titles.map((title) => `  - ${title}`);
  return [`${analytics.total_courses} course(s) loaded:`, ...titles].join('\n');
}

/**
 * Create an interaction loop that can be tested with mock dependencies.
 * Extracts REPL logic for testability.
 */
export function createInteractionLoop(deps: InteractionLoopDeps): (input: string) => Promise<LineOutcome> {
  const write = deps.write ?? ((text: string) => process.stdout.write(text));

  return async (userInput: string) => {
    switch (userInput) {
      case '/exit':
        return 'exit';
      case '/help':
        write(`\n${HELP_TEXT}\n\n`);
        return 'continue';
      case '/new':
        deps.state.sessionId = null;
        write('\nStarted a new conversation.\n\n');
        return 'continue';
      case '/courses':
        write(`\n${formatAnalytics(await deps.assistant.getCourseAnalytics())}\n\n`);
        return 'continue';
    }

    try {
      const result = await deps.assistant.query(userInput, deps.state.sessionId);
      deps.state.sessionId = result.session_id;
      write(`\n${formatAnswer(result)}\n\n`);
    } catch (error) {
      write(`\nerror: ${describeError(error)}\n\n`);
    }
    return 'continue';
  };
}

/**
 * Core shutdown logic without process.exit - for testability.
 */
export async function performShutdown(
  rl: Pick<readline.Interface, 'close'>,
  persistence: Pick<PersistenceProvider, 'disconnect'>,
): Promise<void> {
  rl.close();
  await persistence.disconnect();
}

export function createShutdownHandler(
  rl: Pick<readline.Interface, 'close'>,
  persistence: Pick<PersistenceProvider, 'disconnect'>,
): () => Promise<void> {
  let shuttingDown = false;
  return async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('\nShutting down...');
    try {
      await performShutdown(rl, persistence);
    } catch (error) {
      console.error('error during shutdown:', error);
      process.exitCode = 1;
    }
    process.exit();
  };
}

/**
 * Main entry point: wires all components and starts the REPL.
 */
async function main(): Promise<void> {
  console.log('course assistant starting...\n');

  const config = loadConfig(process.env['CONFIG_PATH']);

  const persistence = createPostgresProvider(config.database);
  const model = createAnthropicAdapter(config.model);
  const embedding = createEmbeddingProvider(config.embedding);

  await persistence.connect();
  console.log('connected to database');
  await persistence.runMigrations();
  console.log('migrations completed');

  const store = createPostgresCourseStore({
    persistence,
    embedding,
    maxResults: config.search.max_results,
  });

  const agent = createAgent({
    model,
    config: {
      model_name: config.model.name,
      max_tokens: config.assistant.max_tokens,
      temperature: config.assistant.temperature,
      max_tool_rounds: config.assistant.max_tool_rounds,
    },
  });

  const assistant = createCourseAssistant({
    agent,
    store,
    sessions: createSessionManager(config.assistant.max_history),
    chunk_size: config.search.chunk_size,
    chunk_overlap: config.search.chunk_overlap,
  });

  const loaded = await assistant.addCourseFolder(config.docs.path);
  console.log(`loaded ${loaded.courses} new course(s) with ${loaded.chunks} chunks\n`);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const interactionHandler = createInteractionLoop({
    assistant,
    state: { sessionId: null },
  });

  const shutdownHandler = createShutdownHandler(rl, persistence);

  process.on('SIGINT', shutdownHandler);
  process.on('SIGTERM', shutdownHandler);
  // a terminal readline takes Ctrl+C itself; Ctrl+D closes the input
  rl.on('SIGINT', shutdownHandler);
  rl.on('close', shutdownHandler);

  console.log(`${HELP_TEXT}\n`);

  rl.setPrompt('> ');
  rl.on('line', async (line: string) => {
    const trimmed = line.trim();
    if (trimmed) {
      try {
        if ((await interactionHandler(trimmed)) === 'exit') {
          await shutdownHandler();
          return;
        }
      } catch (error) {
        console.error(`error: ${describeError(error)}`);
      }
    }
    rl.prompt();
  });

  rl.prompt();
}

// Run main entry point only when file is executed directly
const entry = process.argv[1];
if (entry && resolve(entry) === fileURLToPath(import.meta.url)) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
