// pattern: Imperative Shell

/**
 * Course assistant facade: one question in, one answer with its sources out.
 * Owns the per-query tool registry and the session bookkeeping around the
 * agent loop.
 */

import type { Agent } from '../agent/types.ts';
import type { CourseAnalytics, CourseStore } from '../content/types.ts';
import { ingestFolder } from '../ingest/index.ts';
import type { IngestSummary } from '../ingest/index.ts';
import type { SessionManager } from '../session/types.ts';
import { createCourseToolRegistry } from '../tool/index.ts';
import type { CourseAssistant, QueryResult } from './types.ts';

export type CourseAssistantDependencies = {
  agent: Agent;
  store: CourseStore;
  sessions: SessionManager;
  chunk_size: number;
  chunk_overlap: number;
};

export function buildQueryPrompt(question: string): string {
  return `Answer this question about course materials: ${question}`;
}

export function createCourseAssistant(deps: CourseAssistantDependencies): CourseAssistant {
  const { agent, store, sessions } = deps;

  async function query(question: string, sessionId?: string | null): Promise<QueryResult> {
    const session_id = sessionId || sessions.createSession();
    const registry = createCourseToolRegistry(store);

    const answer = await agent.run(buildQueryPrompt(question), {
      history: sessions.getConversationHistory(session_id),
      registry,
    });

    const sources = registry.getSources();
    registry.clearSources();

    sessions.addExchange(session_id, question, answer);
    return { answer, sources, session_id };
  }

  async function getCourseAnalytics(): Promise<CourseAnalytics> {
    const [total_courses, course_titles] = await Promise.all([
      store.getCourseCount(),
      store.getExistingCourseTitles(),
    ]);
    return { total_courses, course_titles };
  }

  async function addCourseFolder(path: string, clearExisting = false): Promise<IngestSummary> {
    return ingestFolder(path, {
      store,
      chunk_size: deps.chunk_size,
      chunk_overlap: deps.chunk_overlap,
      clearExisting,
    });
  }

  return { query, getCourseAnalytics, addCourseFolder };
}
