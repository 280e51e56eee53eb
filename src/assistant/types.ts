// pattern: Functional Core

import type { CourseAnalytics } from '../content/types.ts';
import type { IngestSummary } from '../ingest/loader.ts';
import type { Source } from '../tool/types.ts';

export type QueryResult = {
  answer: string;
  sources: Array<Source>;
  session_id: string;
};

export type CourseAssistant = {
  query(question: string, sessionId?: string | null): Promise<QueryResult>;
  getCourseAnalytics(): Promise<CourseAnalytics>;
  addCourseFolder(path: string, clearExisting?: boolean): Promise<IngestSummary>;
};
