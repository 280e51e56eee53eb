// pattern: Functional Core

/**
 * Shared test utilities.
 * In-process stand-ins for the embedding provider, the course store and the
 * completion service.
 */

import type { EmbeddingProvider } from '../embedding/types.ts';
import type {
  Course,
  CourseChunk,
  CourseOutline,
  CourseStore,
  SearchQuery,
  SearchResults,
} from '../content/types.ts';
import type {
  ContentBlock,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  StopReason,
} from '../model/types.ts';

/**
 * Create a deterministic mock embedding provider for testing.
 * Uses a simple hash-based deterministic algorithm to generate consistent embeddings.
 */
export function createMockEmbeddingProvider(dimensions = 8): EmbeddingProvider {
  const embed = async (text: string): Promise<Array<number>> => {
    const hash = Array.from(text).reduce((acc, char) => (acc * 31 + char.charCodeAt(0)) % 1_000_003, 0);
    return Array.from({ length: dimensions }, (_, i) => Math.sin(hash + i) * 0.5 + 0.5);
  };

  return {
    embed,
    embedBatch: async (texts) => Promise.all(texts.map((text) => embed(text))),
    dimensions,
  };
}

export type FakeCourseStore = CourseStore & {
  searches: Array<SearchQuery>;
};

export type FakeCourseStoreOptions = {
  courses?: ReadonlyArray<Course>;
  chunks?: ReadonlyArray<CourseChunk>;
  searchError?: string;
};

/**
 * In-memory CourseStore. Course names resolve by case-insensitive substring,
 * hits come back in insertion order with increasing distance.
 */
export function createFakeCourseStore(options: FakeCourseStoreOptions = {}): FakeCourseStore {
  const courses = new Map<string, Course>();
  const chunks: Array<CourseChunk> = [...(options.chunks ?? [])];
  const searches: Array<SearchQuery> = [];

  for (const course of options.courses ?? []) {
    courses.set(course.title, course);
  }

  async function resolveCourseTitle(name: string): Promise<string | null> {
    const needle = name.toLowerCase();
    for (const title of courses.keys()) {
      if (title.toLowerCase().includes(needle)) {
        return title;
      }
    }
    return null;
  }

  return {
    searches,

    async search(query: SearchQuery): Promise<SearchResults> {
      searches.push(query);
      if (options.searchError) {
        return { kind: 'error', error: options.searchError };
      }

      let courseTitle: string | null = null;
      if (query.course_name) {
        courseTitle = await resolveCourseTitle(query.course_name);
        if (!courseTitle) {
          return { kind: 'error', error: `No course found matching '${query.course_name}'` };
        }
      }

      const hits = chunks
        .filter((chunk) => courseTitle === null || chunk.course_title === courseTitle)
        .filter((chunk) => query.lesson_number === null || query.lesson_number === undefined || chunk.lesson_number === query.lesson_number)
        .slice(0, query.limit ?? 5)
        .map((chunk, index) => ({
          content: chunk.content,
          metadata: {
            course_title: chunk.course_title,
            lesson_number: chunk.lesson_number,
            chunk_index: chunk.chunk_index,
          },
          distance: 0.1 * (index + 1),
        }));

      return { kind: 'hits', hits };
    },

    resolveCourseTitle,

    async getCourseLink(courseTitle: string): Promise<string | null> {
      return courses.get(courseTitle)?.link ?? null;
    },

    async getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | null> {
      const lesson = courses.get(courseTitle)?.lessons.find((l) => l.lesson_number === lessonNumber);
      return lesson?.link ?? null;
    },

    async getCourseOutline(courseName: string): Promise<CourseOutline | null> {
      const title = await resolveCourseTitle(courseName);
      const course = title === null ? undefined : courses.get(title);
      if (!course) {
        return null;
      }
      return {
        course_title: course.title,
        course_link: course.link,
        lessons: [...course.lessons]
          .sort((a, b) => a.lesson_number - b.lesson_number)
          .map((lesson) => ({ lesson_number: lesson.lesson_number, lesson_title: lesson.title })),
      };
    },

    async addCourse(course: Course, courseChunks: ReadonlyArray<CourseChunk>): Promise<void> {
      courses.set(course.title, course);
      chunks.push(...courseChunks);
    },

    async getExistingCourseTitles(): Promise<Array<string>> {
      return Array.from(courses.keys());
    },

    async getCourseCount(): Promise<number> {
      return courses.size;
    },

    async clearAll(): Promise<void> {
      courses.clear();
      chunks.length = 0;
    },
  };
}

export function textResponse(text: string, stopReason: StopReason = 'end_turn'): ModelResponse {
  return {
    content: [{ type: 'text', text }],
    stop_reason: stopReason,
    usage: { input_tokens: 100, output_tokens: 20 },
  };
}

export function toolUseResponse(
  calls: ReadonlyArray<{ id: string; name: string; input: Record<string, unknown> }>,
  preamble?: string,
): ModelResponse {
  const content: Array<ContentBlock> = [];
  if (preamble) {
    content.push({ type: 'text', text: preamble });
  }
  for (const call of calls) {
    content.push({ type: 'tool_use', id: call.id, name: call.name, input: call.input });
  }
  return {
    content,
    stop_reason: 'tool_use',
    usage: { input_tokens: 100, output_tokens: 20 },
  };
}

export type ScriptedModel = ModelProvider & {
  requests: Array<ModelRequest>;
};

/**
 * Model provider that replays the given responses in order and records a
 * snapshot of every request. Running out of responses fails the test.
 */
export function createScriptedModel(responses: ReadonlyArray<ModelResponse>): ScriptedModel {
  const requests: Array<ModelRequest> = [];
  let callIndex = 0;

  return {
    requests,
    async complete(request: ModelRequest): Promise<ModelResponse> {
      requests.push({ ...request, messages: [...request.messages] });
      const response = responses[callIndex];
      callIndex++;
      if (!response) {
        throw new Error(`scripted model has no response for call ${callIndex}`);
      }
      return response;
    },
  };
}
