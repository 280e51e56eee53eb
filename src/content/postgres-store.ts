// pattern: Imperative Shell

/**
 * PostgreSQL implementation of the CourseStore port.
 * Chunks and course titles carry pgvector embeddings; searches rank chunks
 * by cosine distance and course names resolve to the nearest stored title.
 */

import { z } from 'zod';
import { toSql } from 'pgvector/utils';
import type { EmbeddingProvider } from '../embedding/types.ts';
import type { PersistenceProvider, QueryFunction } from '../persistence/types.ts';
import type {
  Course,
  CourseChunk,
  CourseOutline,
  CourseStore,
  SearchHit,
  SearchQuery,
  SearchResults,
} from './types.ts';

const DEFAULT_SEARCH_LIMIT = 5;

const TitleRowSchema = z.object({ title: z.string() });
const LinkRowSchema = z.object({ link: z.string().nullable() });
const CountRowSchema = z.object({ count: z.coerce.number() });
const LessonRowSchema = z.object({ lesson_number: z.number(), title: z.string() });
const CourseRowSchema = z.object({ title: z.string(), link: z.string().nullable() });
const HitRowSchema = z.object({
  content: z.string(),
  course_title: z.string().nullable(),
  lesson_number: z.number().nullable(),
  chunk_index: z.number(),
  distance: z.coerce.number(),
});

export type PostgresCourseStoreOptions = {
  persistence: PersistenceProvider;
  embedding: EmbeddingProvider;
  maxResults?: number;
};

function toHit(row: z.infer<typeof HitRowSchema>): SearchHit {
  return {
    content: row.content,
    metadata: {
      course_title: row.course_title,
      lesson_number: row.lesson_number,
      chunk_index: row.chunk_index,
    },
    distance: row.distance,
  };
}

async function insertCourse(
  query: QueryFunction,
  course: Course,
  titleEmbedding: ReadonlyArray<number>,
  chunks: ReadonlyArray<CourseChunk>,
  chunkEmbeddings: ReadonlyArray<ReadonlyArray<number>>,
): Promise<void> {
  await query(
    `INSERT INTO courses (title, link, instructor, title_embedding)
     VALUES ($1, $2, $3, $4::vector)`,
    [course.title, course.link, course.instructor, toSql(titleEmbedding)],
  );

  for (const lesson of course.lessons) {
    await query(
      `INSERT INTO lessons (course_title, lesson_number, title, link)
       VALUES ($1, $2, $3, $4)`,
      [course.title, lesson.lesson_number, lesson.title, lesson.link],
    );
  }

  for (const [i, chunk] of chunks.entries()) {
    const embedding = chunkEmbeddings[i];
    if (!embedding) {
      throw new Error(`missing embedding for chunk ${chunk.chunk_index} of ${course.title}`);
    }
    await query(
      `INSERT INTO course_chunks (course_title, lesson_number, chunk_index, content, embedding)
       VALUES ($1, $2, $3, $4, $5::vector)`,
      [course.title, chunk.lesson_number, chunk.chunk_index, chunk.content, toSql(embedding)],
    );
  }
}

export function createPostgresCourseStore(options: PostgresCourseStoreOptions): CourseStore {
  const { persistence, embedding } = options;
  const maxResults = options.maxResults ?? DEFAULT_SEARCH_LIMIT;

  async function resolveCourseTitle(name: string): Promise<string | null> {
    const exact = await persistence.query(
      'SELECT title FROM courses WHERE lower(title) = lower($1) LIMIT 1',
      [name],
    );
    if (exact[0]) {
      return TitleRowSchema.parse(exact[0]).title;
    }

    const vector = await embedding.embed(name);
    const nearest = await persistence.query(
      `SELECT title FROM courses
       ORDER BY title_embedding <=> $1::vector
       LIMIT 1`,
      [toSql(vector)],
    );
    return nearest[0] ? TitleRowSchema.parse(nearest[0]).title : null;
  }

  async function runSearch(query: SearchQuery): Promise<SearchResults> {
    const params: Array<unknown> = [];
    const filters: Array<string> = [];

    if (query.course_name) {
      const title = await resolveCourseTitle(query.course_name);
      if (!title) {
        return { kind: 'error', error: `No course found matching '${query.course_name}'` };
      }
      params.push(title);
      filters.push(`course_title = $${params.length}`);
    }

    if (query.lesson_number !== null && query.lesson_number !== undefined) {
      params.push(query.lesson_number);
      filters.push(`lesson_number = $${params.length}`);
    }

    const vector = await embedding.embed(query.query);
    params.push(toSql(vector));
    const vectorParam = `$${params.length}`;
    params.push(query.limit ?? maxResults);
    const limitParam = `$${params.length}`;

    const where = filters.length > 0 ? `WHERE ${filters.join(' AND ')}` : '';
    const rows = await persistence.query(
      `SELECT content, course_title, lesson_number, chunk_index,
              embedding <=> ${vectorParam}::vector AS distance
       FROM course_chunks
       ${where}
       ORDER BY distance ASC
       LIMIT ${limitParam}`,
      params,
    );

    return { kind: 'hits', hits: rows.map((row) => toHit(HitRowSchema.parse(row))) };
  }

  return {
    async search(query: SearchQuery): Promise<SearchResults> {
      try {
        return await runSearch(query);
      } catch (error) {
        return {
          kind: 'error',
          error: `Search error: ${error instanceof Error ? error.message : String(error)}`,
        };
      }
    },

    resolveCourseTitle,

    async getCourseLink(courseTitle: string): Promise<string | null> {
      const rows = await persistence.query('SELECT link FROM courses WHERE title = $1', [courseTitle]);
      return rows[0] ? LinkRowSchema.parse(rows[0]).link : null;
    },

    async getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | null> {
      const rows = await persistence.query(
        'SELECT link FROM lessons WHERE course_title = $1 AND lesson_number = $2',
        [courseTitle, lessonNumber],
      );
      return rows[0] ? LinkRowSchema.parse(rows[0]).link : null;
    },

    async getCourseOutline(courseName: string): Promise<CourseOutline | null> {
      const title = await resolveCourseTitle(courseName);
      if (!title) {
        return null;
      }

      const courseRows = await persistence.query('SELECT title, link FROM courses WHERE title = $1', [title]);
      if (!courseRows[0]) {
        return null;
      }
      const course = CourseRowSchema.parse(courseRows[0]);

      const lessonRows = await persistence.query(
        'SELECT lesson_number, title FROM lessons WHERE course_title = $1 ORDER BY lesson_number ASC',
        [title],
      );

      return {
        course_title: course.title,
        course_link: course.link,
        lessons: lessonRows
          .map((row) => LessonRowSchema.parse(row))
          .map((lesson) => ({ lesson_number: lesson.lesson_number, lesson_title: lesson.title })),
      };
    },

    async addCourse(course: Course, chunks: ReadonlyArray<CourseChunk>): Promise<void> {
      const titleEmbedding = await embedding.embed(course.title);
      const chunkEmbeddings = await embedding.embedBatch(chunks.map((chunk) => chunk.content));

      await persistence.withTransaction((query) =>
        insertCourse(query, course, titleEmbedding, chunks, chunkEmbeddings),
      );
    },

    async getExistingCourseTitles(): Promise<Array<string>> {
      const rows = await persistence.query('SELECT title FROM courses ORDER BY created_at ASC, title ASC');
      return rows.map((row) => TitleRowSchema.parse(row).title);
    },

    async getCourseCount(): Promise<number> {
      const rows = await persistence.query('SELECT COUNT(*)::int AS count FROM courses');
      return rows[0] ? CountRowSchema.parse(rows[0]).count : 0;
    },

    async clearAll(): Promise<void> {
      await persistence.withTransaction(async (query) => {
        await query('DELETE FROM course_chunks');
        await query('DELETE FROM lessons');
        await query('DELETE FROM courses');
      });
    },
  };
}
