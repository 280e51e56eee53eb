// pattern: Functional Core

/**
 * Course document parsing.
 *
 * A document opens with optional header lines:
 *
 *   Course Title: <title>
 *   Course Link: <url>
 *   Course Instructor: <name>
 *
 * followed by lessons, each introduced by `Lesson <n>: <title>` and an
 * optional `Lesson Link: <url>` line. Lesson text runs until the next
 * lesson marker.
 */

import { basename, extname } from 'node:path';
import { chunkText } from './chunker.ts';
import type { Course, CourseChunk, Lesson } from '../content/types.ts';

export type LessonBody = {
  lesson_number: number | null;
  text: string;
};

export type ParsedCourse = {
  course: Course;
  bodies: Array<LessonBody>;
};

const HEADER_PATTERNS = {
  title: /^course title:\s*(.*)$/i,
  link: /^course link:\s*(.*)$/i,
  instructor: /^course instructor:\s*(.*)$/i,
} as const;

const LESSON_MARKER = /^lesson\s+(\d+)\s*:\s*(.*)$/i;
const LESSON_LINK = /^lesson link:\s*(.*)$/i;

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  return trimmed.length > 0 ? trimmed : null;
}

export function parseCourseDocument(text: string, fileName: string): ParsedCourse {
  const lines = text.replace(/\r\n?/g, '\n').split('\n');
  let title: string | null = null;
  let link: string | null = null;
  let instructor: string | null = null;

  const lessons: Array<Lesson> = [];
  const bodies: Array<LessonBody> = [];
  const preamble: Array<string> = [];
  let current: { lesson: Lesson; lines: Array<string> } | null = null;

  function closeLesson(): void {
    if (current) {
      lessons.push(current.lesson);
      bodies.push({ lesson_number: current.lesson.lesson_number, text: current.lines.join('\n').trim() });
    }
  }

  for (const line of lines) {
    const trimmed = line.trim();

    const lessonMatch = LESSON_MARKER.exec(trimmed);
    if (lessonMatch) {
      closeLesson();
      current = {
        lesson: {
          lesson_number: Number(lessonMatch[1]),
          title: nonEmpty(lessonMatch[2]) ?? `Lesson ${Number(lessonMatch[1])}`,
          link: null,
        },
        lines: [],
      };
      continue;
    }

    if (current) {
      const linkMatch = LESSON_LINK.exec(trimmed);
      if (linkMatch && current.lines.length === 0 && current.lesson.link === null) {
        current.lesson.link = nonEmpty(linkMatch[1]);
        continue;
      }
      current.lines.push(line);
      continue;
    }

    const titleMatch = HEADER_PATTERNS.title.exec(trimmed);
    if (titleMatch && title === null) {
      title = nonEmpty(titleMatch[1]);
      continue;
    }
    const linkMatch = HEADER_PATTERNS.link.exec(trimmed);
    if (linkMatch && link === null) {
      link = nonEmpty(linkMatch[1]);
      continue;
    }
    const instructorMatch = HEADER_PATTERNS.instructor.exec(trimmed);
    if (instructorMatch && instructor === null) {
      instructor = nonEmpty(instructorMatch[1]);
      continue;
    }
    preamble.push(line);
  }
  closeLesson();

  // without lesson markers the whole body is course-level text
  if (lessons.length === 0) {
    bodies.push({ lesson_number: null, text: preamble.join('\n').trim() });
  }

  return {
    course: {
      title: title ?? basename(fileName, extname(fileName)),
      link,
      instructor,
      lessons,
    },
    bodies: bodies.filter((body) => body.text.length > 0),
  };
}

/**
 * Chunk every lesson body. Chunk indices run across the whole course.
 */
export function buildCourseChunks(
  parsed: ParsedCourse,
  chunkSize: number,
  chunkOverlap: number,
): Array<CourseChunk> {
  const chunks: Array<CourseChunk> = [];
  for (const body of parsed.bodies) {
    for (const content of chunkText(body.text, chunkSize, chunkOverlap)) {
      chunks.push({
        content,
        course_title: parsed.course.title,
        lesson_number: body.lesson_number,
        chunk_index: chunks.length,
      });
    }
  }
  return chunks;
}
