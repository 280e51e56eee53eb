// pattern: Functional Core

export { chunkText, splitSentences } from './chunker.ts';
export { buildCourseChunks, parseCourseDocument } from './parser.ts';
export type { LessonBody, ParsedCourse } from './parser.ts';
export { ingestFolder, listCourseFiles, COURSE_FILE_EXTENSIONS } from './loader.ts';
export type { IngestOptions, IngestSummary } from './loader.ts';
