// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { createSearchTool, describeEmptySearch } from './search.ts';
import { createToolRegistry } from '../registry.ts';
import { createFakeCourseStore } from '../../integration/test-helpers.ts';
import type { Course, CourseChunk } from '../../content/types.ts';

const computerUse: Course = {
  title: 'Building Towards Computer Use',
  link: 'https://example.com/courses/computer-use',
  instructor: 'Test Instructor',
  lessons: [
    { lesson_number: 3, title: 'Screenshots', link: 'https://example.com/courses/computer-use/3' },
    { lesson_number: 5, title: 'Prompt Caching', link: 'https://example.com/courses/computer-use/5' },
  ],
};

const mcp: Course = {
  title: 'Introduction to MCP',
  link: null,
  instructor: null,
  lessons: [{ lesson_number: 1, title: 'Why MCP', link: null }],
};

const chunks: Array<CourseChunk> = [
  { content: 'Prompt caching stores a prefix of the prompt.', course_title: computerUse.title, lesson_number: 5, chunk_index: 0 },
  { content: 'Screenshots let the model see the desktop.', course_title: computerUse.title, lesson_number: 3, chunk_index: 1 },
  { content: 'MCP connects models to tools.', course_title: mcp.title, lesson_number: 1, chunk_index: 0 },
];

function createTool(options: { searchError?: string; extraChunks?: Array<CourseChunk> } = {}) {
  const store = createFakeCourseStore({
    courses: [computerUse, mcp],
    chunks: [...chunks, ...(options.extraChunks ?? [])],
    ...(options.searchError !== undefined && { searchError: options.searchError }),
  });
  return { store, tool: createSearchTool(store) };
}

describe('search_course_content', () => {
  describe('definition', () => {
    it('should declare query as the only required parameter', () => {
      const registry = createToolRegistry();
      registry.register(createTool().tool);

      const [definition] = registry.toModelTools();

      expect(definition?.name).toBe('search_course_content');
      expect(Object.keys(definition?.input_schema.properties ?? {})).toEqual(['query', 'course_name', 'lesson_number']);
      expect(definition?.input_schema.required).toEqual(['query']);
    });
  });

  describe('formatting', () => {
    it('should format every hit with a course and lesson header in store order', async () => {
      const { tool } = createTool();

      const result = await tool.handler({ query: 'What is prompt caching?' });

      expect(result).toEqual({
        success: true,
        output: [
          '[Building Towards Computer Use - Lesson 5]\nPrompt caching stores a prefix of the prompt.',
          '[Building Towards Computer Use - Lesson 3]\nScreenshots let the model see the desktop.',
          '[Introduction to MCP - Lesson 1]\nMCP connects models to tools.',
        ].join('\n\n'),
        sources: [
          {
            text: 'Building Towards Computer Use - Lesson 5',
            course_link: 'https://example.com/courses/computer-use',
            lesson_link: 'https://example.com/courses/computer-use/5',
          },
          {
            text: 'Building Towards Computer Use - Lesson 3',
            course_link: 'https://example.com/courses/computer-use',
            lesson_link: 'https://example.com/courses/computer-use/3',
          },
          { text: 'Introduction to MCP - Lesson 1', course_link: null, lesson_link: null },
        ],
      });
    });

    it('should omit the lesson segment when a chunk has no lesson number', async () => {
      const { tool } = createTool({
        extraChunks: [{ content: 'Course overview text.', course_title: mcp.title, lesson_number: null, chunk_index: 4 }],
      });

      const result = await tool.handler({ query: 'overview', course_name: 'MCP' });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.output).toBe(
          '[Introduction to MCP - Lesson 1]\nMCP connects models to tools.\n\n[Introduction to MCP]\nCourse overview text.',
        );
        expect(result.sources[1]).toEqual({ text: 'Introduction to MCP', course_link: null, lesson_link: null });
      }
    });
  });

  describe('filters', () => {
    it('should pass course and lesson filters to the store', async () => {
      const { store, tool } = createTool();

      const result = await tool.handler({ query: 'caching', course_name: 'Computer Use', lesson_number: 5 });

      expect(store.searches).toEqual([{ query: 'caching', course_name: 'Computer Use', lesson_number: 5 }]);
      expect(result.success && result.output).toBe(
        '[Building Towards Computer Use - Lesson 5]\nPrompt caching stores a prefix of the prompt.',
      );
    });

    it('should name both filters when nothing matches', async () => {
      const { tool } = createTool();

      const result = await tool.handler({ query: 'anything', course_name: 'MCP', lesson_number: 5 });

      expect(result).toEqual({
        success: true,
        output: "No relevant content found in course 'MCP' in lesson 5.",
        sources: [],
      });
    });
  });

  describe('describeEmptySearch', () => {
    it('should produce the bare message without filters', () => {
      expect(describeEmptySearch({ query: 'x' })).toBe('No relevant content found.');
    });

    it('should mention a lesson filter of zero', () => {
      expect(describeEmptySearch({ query: 'x', lesson_number: 0 })).toBe('No relevant content found in lesson 0.');
    });

    it('should ignore null filters', () => {
      expect(describeEmptySearch({ query: 'x', course_name: null, lesson_number: null })).toBe(
        'No relevant content found.',
      );
    });
  });

  describe('store errors', () => {
    it('should return the store error verbatim as a failed result', async () => {
      const { tool } = createTool({ searchError: 'Search error: connection refused' });

      const result = await tool.handler({ query: 'caching' });

      expect(result).toEqual({ success: false, error: 'Search error: connection refused' });
    });

    it('should surface an unresolvable course name from the store', async () => {
      const { tool } = createTool();

      const result = await tool.handler({ query: 'caching', course_name: 'Astronomy' });

      expect(result).toEqual({ success: false, error: "No course found matching 'Astronomy'" });
    });
  });

  describe('through the registry', () => {
    it('should accept null optional parameters from the model', async () => {
      const registry = createToolRegistry();
      registry.register(createTool().tool);

      const result = await registry.dispatch('search_course_content', {
        query: 'What is prompt caching?',
        course_name: null,
        lesson_number: null,
      });

      expect(result.success).toBe(true);
      expect(registry.getSources().map((s) => s.text)).toEqual([
        'Building Towards Computer Use - Lesson 5',
        'Building Towards Computer Use - Lesson 3',
        'Introduction to MCP - Lesson 1',
      ]);
    });

    it('should reject a non-integer lesson number as invalid input', async () => {
      const registry = createToolRegistry();
      registry.register(createTool().tool);

      const result = await registry.dispatch('search_course_content', { query: 'x', lesson_number: 2.5 });

      expect(result).toEqual({
        success: false,
        error: 'Invalid input for tool search_course_content: lesson_number: Expected integer, received float',
      });
    });

    it('should replace sources on a new search', async () => {
      const registry = createToolRegistry();
      registry.register(createTool().tool);

      await registry.dispatch('search_course_content', { query: 'everything' });
      await registry.dispatch('search_course_content', { query: 'mcp', course_name: 'MCP' });

      expect(registry.getSources()).toEqual([{ text: 'Introduction to MCP - Lesson 1', course_link: null, lesson_link: null }]);
    });
  });
});
