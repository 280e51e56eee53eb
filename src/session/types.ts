// pattern: Functional Core

export type Exchange = {
  user: string;
  assistant: string;
};

export interface SessionManager {
  createSession(): string;
  addExchange(sessionId: string, userMessage: string, assistantMessage: string): void;
  /** Formatted history of the session, or null when there is none. */
  getConversationHistory(sessionId: string | null | undefined): string | null;
  clearSession(sessionId: string): void;
}
