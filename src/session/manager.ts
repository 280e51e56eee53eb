// pattern: Imperative Shell

/**
 * In-memory conversation sessions. Each session keeps only its most recent
 * exchanges; nothing survives a restart.
 */

import type { Exchange, SessionManager } from './types.ts';

export function formatHistory(exchanges: ReadonlyArray<Exchange>): string {
  return exchanges
    .map((exchange) => `User: ${exchange.user}\nAssistant: ${exchange.assistant}`)
    .join('\n');
}

export function createSessionManager(maxHistory: number): SessionManager {
  if (!Number.isInteger(maxHistory) || maxHistory < 0) {
    throw new RangeError(`max history must be a non-negative integer, got ${maxHistory}`);
  }

  const sessions = new Map<string, Array<Exchange>>();
  let counter = 0;

  return {
    createSession(): string {
      counter++;
      const id = `session_${counter}`;
      sessions.set(id, []);
      return id;
    },

    addExchange(sessionId: string, userMessage: string, assistantMessage: string): void {
      const exchanges = sessions.get(sessionId) ?? [];
      exchanges.push({ user: userMessage, assistant: assistantMessage });
      sessions.set(sessionId, exchanges.slice(Math.max(0, exchanges.length - maxHistory)));
    },

    getConversationHistory(sessionId: string | null | undefined): string | null {
      if (!sessionId) {
        return null;
      }
      const exchanges = sessions.get(sessionId);
      if (!exchanges || exchanges.length === 0) {
        return null;
      }
      return formatHistory(exchanges);
    },

    clearSession(sessionId: string): void {
      sessions.set(sessionId, []);
    },
  };
}
