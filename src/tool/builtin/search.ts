// pattern: Imperative Shell

/**
 * Course content search tool.
 * Delegates filtering and ranking to the CourseStore and formats hits for the
 * model, returning one source per hit.
 */

import { z } from 'zod';
import type { CourseStore, SearchHit } from '../../content/types.ts';
import type { Source, Tool, ToolResult } from '../types.ts';

const UNKNOWN_COURSE = 'unknown';

export const SearchInputSchema = z.object({
  query: z.string().min(1),
  course_name: z.string().nullish(),
  lesson_number: z.number().int().nullish(),
});

export type SearchInput = z.infer<typeof SearchInputSchema>;

export function describeEmptySearch(input: SearchInput): string {
  let filterInfo = '';
  if (input.course_name) {
    filterInfo += ` in course '${input.course_name}'`;
  }
  if (input.lesson_number !== null && input.lesson_number !== undefined) {
    filterInfo += ` in lesson ${input.lesson_number}`;
  }
  return `No relevant content found${filterInfo}.`;
}

function formatLabel(courseTitle: string, lessonNumber: number | null): string {
  return lessonNumber === null ? courseTitle : `${courseTitle} - Lesson ${lessonNumber}`;
}

export function formatHits(hits: ReadonlyArray<SearchHit>): string {
  return hits
    .map((hit) => {
      const title = hit.metadata.course_title ?? UNKNOWN_COURSE;
      return `[${formatLabel(title, hit.metadata.lesson_number)}]\n${hit.content}`;
    })
    .join('\n\n');
}

async function buildSource(store: CourseStore, hit: SearchHit): Promise<Source> {
  const title = hit.metadata.course_title;
  const lessonNumber = hit.metadata.lesson_number;

  if (title === null) {
    return { text: formatLabel(UNKNOWN_COURSE, lessonNumber), course_link: null, lesson_link: null };
  }

  const courseLink = await store.getCourseLink(title);
  const lessonLink = lessonNumber === null ? null : await store.getLessonLink(title, lessonNumber);

  return {
    text: formatLabel(title, lessonNumber),
    course_link: courseLink,
    lesson_link: lessonLink,
  };
}

export function createSearchTool(store: CourseStore): Tool<SearchInput> {
  return {
    definition: {
      name: 'search_course_content',
      description:
        'Search course materials with smart course name matching and lesson filtering',
      parameters: [
        {
          name: 'query',
          type: 'string',
          description: 'What to search for in the course content',
          required: true,
        },
        {
          name: 'course_name',
          type: 'string',
          description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
          required: false,
        },
        {
          name: 'lesson_number',
          type: 'integer',
          description: 'Specific lesson number to search within (e.g. 1, 2, 3)',
          required: false,
        },
      ],
    },
    input: SearchInputSchema,
    handler: async (input): Promise<ToolResult> => {
      const results = await store.search({
        query: input.query,
        course_name: input.course_name,
        lesson_number: input.lesson_number,
      });

      if (results.kind === 'error') {
        return { success: false, error: results.error };
      }

      if (results.hits.length === 0) {
        return { success: true, output: describeEmptySearch(input), sources: [] };
      }

      const sources: Array<Source> = [];
      for (const hit of results.hits) {
        sources.push(await buildSource(store, hit));
      }

      return { success: true, output: formatHits(results.hits), sources };
    },
  };
}
