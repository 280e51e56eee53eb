// pattern: Functional Core

export type { PersistenceProvider, QueryFunction, Row } from './types.ts';
export { createPostgresProvider, listMigrations } from './postgres.ts';
