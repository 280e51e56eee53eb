// pattern: Functional Core

export type Row = Record<string, unknown>;

/** Rows come back untyped; callers decode them. */
export type QueryFunction = (sql: string, params?: ReadonlyArray<unknown>) => Promise<Array<Row>>;

export type PersistenceProvider = {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** Apply pending migrations; returns the file names applied by this call. */
  runMigrations(): Promise<Array<string>>;
  query: QueryFunction;
  withTransaction<T>(fn: (query: QueryFunction) => Promise<T>): Promise<T>;
};
