// pattern: Functional Core

/**
 * Course content types and the CourseStore port.
 * The store owns course-name resolution, filtering and ranking; tools only
 * format what it returns.
 */

export type Lesson = {
  lesson_number: number;
  title: string;
  link: string | null;
};

export type Course = {
  title: string;
  link: string | null;
  instructor: string | null;
  lessons: ReadonlyArray<Lesson>;
};

export type CourseChunk = {
  content: string;
  course_title: string;
  lesson_number: number | null;
  chunk_index: number;
};

export type ChunkMetadata = {
  course_title: string | null;
  lesson_number: number | null;
  chunk_index: number;
};

export type SearchHit = {
  content: string;
  metadata: ChunkMetadata;
  distance: number;
};

export type SearchQuery = {
  query: string;
  course_name?: string | null;
  lesson_number?: number | null;
  limit?: number;
};

/**
 * An empty `hits` list is a valid outcome, distinct from an error.
 */
export type SearchResults =
  | { kind: 'hits'; hits: ReadonlyArray<SearchHit> }
  | { kind: 'error'; error: string };

export type CourseOutline = {
  course_title: string;
  course_link: string | null;
  lessons: ReadonlyArray<{ lesson_number: number; lesson_title: string }>;
};

export type CourseAnalytics = {
  total_courses: number;
  course_titles: Array<string>;
};

export interface CourseStore {
  search(query: SearchQuery): Promise<SearchResults>;
  resolveCourseTitle(name: string): Promise<string | null>;
  getCourseLink(courseTitle: string): Promise<string | null>;
  getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | null>;
  getCourseOutline(courseName: string): Promise<CourseOutline | null>;

  addCourse(course: Course, chunks: ReadonlyArray<CourseChunk>): Promise<void>;
  getExistingCourseTitles(): Promise<Array<string>>;
  getCourseCount(): Promise<number>;
  clearAll(): Promise<void>;
}
