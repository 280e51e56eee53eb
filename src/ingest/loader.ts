// pattern: Imperative Shell

/**
 * Folder ingestion: parse every course document in a directory, chunk it
 * and hand it to the course store.
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { buildCourseChunks, parseCourseDocument } from './parser.ts';
import type { CourseStore } from '../content/types.ts';

export const COURSE_FILE_EXTENSIONS: ReadonlyArray<string> = ['.txt', '.md'];

export type IngestOptions = {
  store: CourseStore;
  chunk_size: number;
  chunk_overlap: number;
  clearExisting?: boolean;
};

export type IngestSummary = {
  courses: number;
  chunks: number;
};

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export async function listCourseFiles(folder: string): Promise<Array<string>> {
  const entries = await readdir(folder, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && COURSE_FILE_EXTENSIONS.includes(extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort();
}

export async function ingestFolder(folder: string, options: IngestOptions): Promise<IngestSummary> {
  const { store } = options;

  if (!(await isDirectory(folder))) {
    console.warn(`[ingest] folder not found: ${folder}`);
    return { courses: 0, chunks: 0 };
  }

  if (options.clearExisting) {
    console.log('[ingest] clearing existing course data');
    await store.clearAll();
  }

  const existing = new Set(await store.getExistingCourseTitles());
  const summary: IngestSummary = { courses: 0, chunks: 0 };

  for (const fileName of await listCourseFiles(folder)) {
    try {
      const text = await readFile(join(folder, fileName), 'utf-8');
      const parsed = parseCourseDocument(text, fileName);
      const title = parsed.course.title;

      if (existing.has(title)) {
        console.log(`[ingest] course already loaded: ${title}`);
        continue;
      }

      const chunks = buildCourseChunks(parsed, options.chunk_size, options.chunk_overlap);
      await store.addCourse(parsed.course, chunks);
      existing.add(title);

      summary.courses++;
      summary.chunks += chunks.length;
      console.log(`[ingest] added course: ${title} (${chunks.length} chunks)`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ingest] failed to load ${fileName}: ${message}`);
    }
  }

  return summary;
}
