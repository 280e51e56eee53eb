// pattern: Functional Core

export type { CourseAssistant, QueryResult } from './types.ts';
export { buildQueryPrompt, createCourseAssistant } from './assistant.ts';
export type { CourseAssistantDependencies } from './assistant.ts';
