// pattern: Functional Core

export type { Exchange, SessionManager } from './types.ts';
export { createSessionManager, formatHistory } from './manager.ts';
