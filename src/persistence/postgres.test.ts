// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { join } from 'node:path';
import { listMigrations } from './postgres.ts';

const migrationsDir = fileURLToPath(new URL('./migrations', import.meta.url));

describe('listMigrations', () => {
  it('should list the SQL files in apply order', () => {
    expect(listMigrations(migrationsDir)).toEqual(['001_courses.sql']);
  });

  it('should create the course tables', () => {
    const sql = readFileSync(join(migrationsDir, '001_courses.sql'), 'utf-8');

    expect(sql).toContain('CREATE TABLE IF NOT EXISTS courses');
    expect(sql).toContain('CREATE TABLE IF NOT EXISTS lessons');
    expect(sql).toContain('CREATE TABLE IF NOT EXISTS course_chunks');
  });
});
