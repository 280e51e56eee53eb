// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { toSql } from 'pgvector/utils';
import { createPostgresCourseStore } from './postgres-store.ts';
import type { PersistenceProvider, QueryFunction, Row } from '../persistence/types.ts';
import { createMockEmbeddingProvider } from '../integration/test-helpers.ts';

type RecordedQuery = {
  sql: string;
  params: ReadonlyArray<unknown>;
  inTransaction: boolean;
};

type FakePersistence = PersistenceProvider & {
  queries: Array<RecordedQuery>;
  transactions: number;
};

type Responder = (sql: string, params: ReadonlyArray<unknown>) => Array<Row>;

function createFakePersistence(respond: Responder = () => []): FakePersistence {
  const queries: Array<RecordedQuery> = [];

  function recorder(inTransaction: boolean): QueryFunction {
    return async (sql, params = []) => {
      queries.push({ sql, params, inTransaction });
      return respond(sql, params);
    };
  }

  const fake: FakePersistence = {
    queries,
    transactions: 0,
    async connect() {},
    async disconnect() {},
    async runMigrations() {
      return [];
    },
    query: recorder(false),
    async withTransaction<T>(fn: (query: QueryFunction) => Promise<T>): Promise<T> {
      fake.transactions++;
      return fn(recorder(true));
    },
  };
  return fake;
}

const embedding = createMockEmbeddingProvider(4);

async function vectorOf(text: string): Promise<string> {
  return toSql(await embedding.embed(text));
}

const MCP_TITLE = 'MCP: Build Rich-Context AI Apps with Anthropic';

describe('createPostgresCourseStore', () => {
  describe('search', () => {
    it('should rank all chunks when no filter is given', async () => {
      const persistence = createFakePersistence((sql) =>
        sql.includes('FROM course_chunks')
          ? [
              { content: 'Servers expose tools.', course_title: MCP_TITLE, lesson_number: 1, chunk_index: 4, distance: 0.12 },
              { content: 'Clients call tools.', course_title: MCP_TITLE, lesson_number: null, chunk_index: 0, distance: 0.3 },
            ]
          : [],
      );
      const store = createPostgresCourseStore({ persistence, embedding });

      const results = await store.search({ query: 'what is a server' });

      expect(results).toEqual({
        kind: 'hits',
        hits: [
          { content: 'Servers expose tools.', metadata: { course_title: MCP_TITLE, lesson_number: 1, chunk_index: 4 }, distance: 0.12 },
          { content: 'Clients call tools.', metadata: { course_title: MCP_TITLE, lesson_number: null, chunk_index: 0 }, distance: 0.3 },
        ],
      });
      expect(persistence.queries.length).toBe(1);
      expect(persistence.queries[0]?.sql).not.toContain('WHERE');
      expect(persistence.queries[0]?.params).toEqual([await vectorOf('what is a server'), 5]);
    });

    it('should filter by the resolved course title and lesson number', async () => {
      const persistence = createFakePersistence((sql) =>
        sql.includes('lower(title)') ? [{ title: MCP_TITLE }] : [],
      );
      const store = createPostgresCourseStore({ persistence, embedding });

      await store.search({ query: 'servers', course_name: 'mcp: build rich-context ai apps with anthropic', lesson_number: 2, limit: 3 });

      const searchQuery = persistence.queries[1];
      expect(searchQuery?.sql).toContain('WHERE course_title = $1 AND lesson_number = $2');
      expect(searchQuery?.params).toEqual([MCP_TITLE, 2, await vectorOf('servers'), 3]);
    });

    it('should treat lesson 0 as a filter', async () => {
      const persistence = createFakePersistence();
      const store = createPostgresCourseStore({ persistence, embedding });

      await store.search({ query: 'intro', lesson_number: 0 });

      expect(persistence.queries[0]?.sql).toContain('WHERE lesson_number = $1');
      expect(persistence.queries[0]?.params[0]).toBe(0);
    });

    it('should fall back to the nearest title embedding for course names', async () => {
      const persistence = createFakePersistence((sql) =>
        sql.includes('title_embedding <=>') ? [{ title: MCP_TITLE }] : [],
      );
      const store = createPostgresCourseStore({ persistence, embedding });

      await store.search({ query: 'servers', course_name: 'MCP' });

      expect(persistence.queries[1]?.params).toEqual([await vectorOf('MCP')]);
      expect(persistence.queries[2]?.params[0]).toBe(MCP_TITLE);
    });

    it('should report an unresolvable course name', async () => {
      const persistence = createFakePersistence();
      const store = createPostgresCourseStore({ persistence, embedding });

      const results = await store.search({ query: 'servers', course_name: 'Underwater Basket Weaving' });

      expect(results).toEqual({ kind: 'error', error: "No course found matching 'Underwater Basket Weaving'" });
    });

    it('should turn query failures into a search error', async () => {
      const persistence = createFakePersistence(() => {
        throw new Error('connection refused');
      });
      const store = createPostgresCourseStore({ persistence, embedding });

      const results = await store.search({ query: 'servers' });

      expect(results).toEqual({ kind: 'error', error: 'Search error: connection refused' });
    });

    it('should use the configured result limit', async () => {
      const persistence = createFakePersistence();
      const store = createPostgresCourseStore({ persistence, embedding, maxResults: 8 });

      await store.search({ query: 'servers' });

      expect(persistence.queries[0]?.params[1]).toBe(8);
    });
  });

  describe('lookups', () => {
    it('should build the outline with lessons in order', async () => {
      const persistence = createFakePersistence((sql) => {
        if (sql.includes('lower(title)')) return [{ title: MCP_TITLE }];
        if (sql.includes('SELECT title, link FROM courses')) return [{ title: MCP_TITLE, link: 'https://courses.test/mcp' }];
        if (sql.includes('FROM lessons')) {
          return [
            { lesson_number: 0, title: 'Introduction' },
            { lesson_number: 1, title: 'Why MCP' },
          ];
        }
        return [];
      });
      const store = createPostgresCourseStore({ persistence, embedding });

      const outline = await store.getCourseOutline(MCP_TITLE);

      expect(outline).toEqual({
        course_title: MCP_TITLE,
        course_link: 'https://courses.test/mcp',
        lessons: [
          { lesson_number: 0, lesson_title: 'Introduction' },
          { lesson_number: 1, lesson_title: 'Why MCP' },
        ],
      });
    });

    it('should return null for an outline of an unknown course', async () => {
      const store = createPostgresCourseStore({ persistence: createFakePersistence(), embedding });

      expect(await store.getCourseOutline('nothing')).toBeNull();
    });

    it('should look up course and lesson links', async () => {
      const persistence = createFakePersistence((sql) => {
        if (sql.includes('FROM courses')) return [{ link: 'https://courses.test/mcp' }];
        if (sql.includes('FROM lessons')) return [{ link: null }];
        return [];
      });
      const store = createPostgresCourseStore({ persistence, embedding });

      expect(await store.getCourseLink(MCP_TITLE)).toBe('https://courses.test/mcp');
      expect(await store.getLessonLink(MCP_TITLE, 3)).toBeNull();
      expect(persistence.queries[1]?.params).toEqual([MCP_TITLE, 3]);
    });

    it('should count and list courses', async () => {
      const persistence = createFakePersistence((sql) =>
        sql.includes('COUNT(*)') ? [{ count: 2 }] : [{ title: 'A' }, { title: 'B' }],
      );
      const store = createPostgresCourseStore({ persistence, embedding });

      expect(await store.getCourseCount()).toBe(2);
      expect(await store.getExistingCourseTitles()).toEqual(['A', 'B']);
    });
  });

  describe('writes', () => {
    it('should insert a course with its lessons and chunks in one transaction', async () => {
      const persistence = createFakePersistence();
      const store = createPostgresCourseStore({ persistence, embedding });

      await store.addCourse(
        {
          title: MCP_TITLE,
          link: 'https://courses.test/mcp',
          instructor: 'Ada Example',
          lessons: [
            { lesson_number: 0, title: 'Introduction', link: 'https://courses.test/mcp/0' },
            { lesson_number: 1, title: 'Why MCP', link: null },
          ],
        },
        [
          { content: 'First chunk.', course_title: MCP_TITLE, lesson_number: 0, chunk_index: 0 },
          { content: 'Second chunk.', course_title: MCP_TITLE, lesson_number: 1, chunk_index: 1 },
        ],
      );

      expect(persistence.transactions).toBe(1);
      expect(persistence.queries.every((q) => q.inTransaction)).toBe(true);
      expect(persistence.queries.map((q) => q.sql.trim().split(/\s+/).slice(0, 3).join(' '))).toEqual([
        'INSERT INTO courses',
        'INSERT INTO lessons',
        'INSERT INTO lessons',
        'INSERT INTO course_chunks',
        'INSERT INTO course_chunks',
      ]);
      expect(persistence.queries[0]?.params).toEqual([
        MCP_TITLE,
        'https://courses.test/mcp',
        'Ada Example',
        await vectorOf(MCP_TITLE),
      ]);
      expect(persistence.queries[4]?.params).toEqual([MCP_TITLE, 1, 1, 'Second chunk.', await vectorOf('Second chunk.')]);
    });

    it('should clear every table in one transaction', async () => {
      const persistence = createFakePersistence();
      const store = createPostgresCourseStore({ persistence, embedding });

      await store.clearAll();

      expect(persistence.transactions).toBe(1);
      expect(persistence.queries.map((q) => q.sql)).toEqual([
        'DELETE FROM course_chunks',
        'DELETE FROM lessons',
        'DELETE FROM courses',
      ]);
    });
  });
});
