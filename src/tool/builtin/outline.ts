// pattern: Imperative Shell

/**
 * Course outline lookup tool.
 * Structural lookup only, so it never contributes sources.
 */

import { z } from 'zod';
import type { CourseOutline, CourseStore } from '../../content/types.ts';
import type { Tool } from '../types.ts';

export const OutlineInputSchema = z.object({
  course_name: z.string().min(1),
});

export type OutlineInput = z.infer<typeof OutlineInputSchema>;

export function formatOutline(outline: CourseOutline): string {
  const lines = [`Course: ${outline.course_title}`];
  if (outline.course_link) {
    lines.push(`Course Link: ${outline.course_link}`);
  }
  lines.push(`Lessons (${outline.lessons.length} total):`);
  for (const lesson of outline.lessons) {
    lines.push(`Lesson ${lesson.lesson_number}: ${lesson.lesson_title}`);
  }
  return lines.join('\n');
}

export function createOutlineTool(store: CourseStore): Tool<OutlineInput> {
  return {
    definition: {
      name: 'get_course_outline',
      description:
        'Get the complete outline of a course: title, course link, and every lesson with its number and title',
      parameters: [
        {
          name: 'course_name',
          type: 'string',
          description: "Course title (partial matches work, e.g. 'MCP', 'Computer Use')",
          required: true,
        },
      ],
    },
    input: OutlineInputSchema,
    handler: async (input) => {
      const outline = await store.getCourseOutline(input.course_name);
      if (!outline) {
        return { success: false, error: `No course found matching '${input.course_name}'` };
      }
      return { success: true, output: formatOutline(outline), sources: [] };
    },
  };
}
