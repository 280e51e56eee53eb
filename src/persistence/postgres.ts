// pattern: Imperative Shell

import { Pool } from 'pg';
import type { PoolClient } from 'pg';
import { readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { PersistenceProvider, QueryFunction, Row } from './types.ts';
import type { DatabaseConfig } from '../config/config.ts';

const DEFAULT_MIGRATIONS_DIR = fileURLToPath(new URL('./migrations', import.meta.url));

export function listMigrations(migrationsDir: string): Array<string> {
  return readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql'))
    .sort();
}

function clientQuery(client: PoolClient): QueryFunction {
  return async (sql, params) => {
    const result = await client.query<Row>(sql, params ? Array.from(params) : undefined);
    return result.rows;
  };
}

export function createPostgresProvider(
  config: DatabaseConfig,
  migrationsDir: string = DEFAULT_MIGRATIONS_DIR,
): PersistenceProvider {
  const pool = new Pool({ connectionString: config.url });

  pool.on('error', (error) => {
    console.error('[persistence] idle client error:', error.message);
  });

  async function connect(): Promise<void> {
    const client = await pool.connect();
    client.release();
  }

  async function disconnect(): Promise<void> {
    await pool.end();
  }

  async function runMigrations(): Promise<Array<string>> {
    const files = listMigrations(migrationsDir);
    const applied: Array<string> = [];

    const client = await pool.connect();
    try {
      await client.query(`
        CREATE TABLE IF NOT EXISTS schema_migrations (
          name TEXT PRIMARY KEY,
          applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )
      `);

      const existing = await client.query<{ name: string }>(
        'SELECT name FROM schema_migrations ORDER BY name',
      );
      const appliedSet = new Set(existing.rows.map((row) => row.name));

      for (const file of files) {
        if (appliedSet.has(file)) continue;

        const sql = readFileSync(join(migrationsDir, file), 'utf-8');
        await client.query('BEGIN');
        try {
          await client.query(sql);
          await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
          await client.query('COMMIT');
        } catch (error) {
          await client.query('ROLLBACK');
          throw error;
        }
        console.log(`[persistence] applied migration ${file}`);
        applied.push(file);
      }
    } finally {
      client.release();
    }

    return applied;
  }

  async function withTransaction<T>(fn: (query: QueryFunction) => Promise<T>): Promise<T> {
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      const result = await fn(clientQuery(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  return {
    connect,
    disconnect,
    runMigrations,
    async query(sql: string, params?: ReadonlyArray<unknown>): Promise<Array<Row>> {
      const result = await pool.query<Row>(sql, params ? Array.from(params) : undefined);
      return result.rows;
    },
    withTransaction,
  };
}
