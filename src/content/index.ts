// pattern: Functional Core

export type {
  ChunkMetadata,
  Course,
  CourseAnalytics,
  CourseChunk,
  CourseOutline,
  CourseStore,
  Lesson,
  SearchHit,
  SearchQuery,
  SearchResults,
} from './types.ts';
export { createPostgresCourseStore } from './postgres-store.ts';
export type { PostgresCourseStoreOptions } from './postgres-store.ts';
