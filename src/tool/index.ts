// pattern: Imperative Shell

import type { CourseStore } from '../content/types.ts';
import { createToolRegistry } from './registry.ts';
import { createSearchTool } from './builtin/search.ts';
import { createOutlineTool } from './builtin/outline.ts';
import type { ToolRegistry } from './types.ts';

export type {
  ToolParameterType,
  ToolParameter,
  ToolDefinition,
  Source,
  ToolResult,
  Tool,
  ToolRegistry,
} from './types.ts';

export { createToolRegistry } from './registry.ts';
export { createSearchTool } from './builtin/search.ts';
export { createOutlineTool } from './builtin/outline.ts';

/**
 * Registry with both course tools. Build one per query: the source trail it
 * collects belongs to that query alone.
 */
export function createCourseToolRegistry(store: CourseStore): ToolRegistry {
  const registry = createToolRegistry();
  registry.register(createSearchTool(store));
  registry.register(createOutlineTool(store));
  return registry;
}
