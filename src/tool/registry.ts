// pattern: Imperative Shell

/**
 * ToolRegistry implementation.
 * Manages tool registration, input decoding, dispatch, and the per-tool
 * source trail collected from dispatch results.
 */

import type { ZodError } from 'zod';
import type { ToolDefinition as ModelToolDefinition } from '../model/types.ts';
import type {
  Source,
  Tool,
  ToolDefinition,
  ToolResult,
  ToolRegistry,
} from './types.ts';

type RegisteredTool = {
  definition: ToolDefinition;
  invoke: (params: Record<string, unknown>) => Promise<ToolResult>;
};

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function createToolRegistry(): ToolRegistry {
  const tools = new Map<string, RegisteredTool>();
  const trails = new Map<string, ReadonlyArray<Source>>();

  return {
    register<TInput>(tool: Tool<TInput>): void {
      const name = tool.definition.name;
      if (tools.has(name)) {
        throw new Error(`tool already registered: ${name}`);
      }

      tools.set(name, {
        definition: tool.definition,
        async invoke(params) {
          const decoded = tool.input.safeParse(params);
          if (!decoded.success) {
            return {
              success: false,
              error: `Invalid input for tool ${name}: ${formatIssues(decoded.error)}`,
            };
          }
          return tool.handler(decoded.data);
        },
      });
    },

    getDefinitions(): Array<ToolDefinition> {
      return Array.from(tools.values()).map((tool) => tool.definition);
    },

    toModelTools(): Array<ModelToolDefinition> {
      return Array.from(tools.values()).map(({ definition }) => {
        const properties: Record<string, unknown> = {};
        const required: Array<string> = [];

        for (const param of definition.parameters) {
          properties[param.name] = {
            type: param.type,
            description: param.description,
            ...(param.enum_values && { enum: param.enum_values }),
          };

          if (param.required) {
            required.push(param.name);
          }
        }

        return {
          name: definition.name,
          description: definition.description,
          input_schema: {
            type: 'object',
            properties,
            required,
          },
        };
      });
    },

    async dispatch(
      name: string,
      params: Record<string, unknown>,
    ): Promise<ToolResult> {
      const tool = tools.get(name);
      if (!tool) {
        return {
          success: false,
          error: `Tool '${name}' not found`,
        };
      }

      let result: ToolResult;
      try {
        result = await tool.invoke(params);
      } catch (error) {
        result = {
          success: false,
          error: `Error executing tool ${name}: ${error instanceof Error ? error.message : String(error)}`,
        };
      }

      // each run replaces the tool's previous trail, failures leave it empty
      trails.set(name, result.success ? result.sources : []);
      return result;
    },

    getSources(): Array<Source> {
      const sources: Array<Source> = [];
      for (const name of tools.keys()) {
        sources.push(...(trails.get(name) ?? []));
      }
      return sources;
    },

    clearSources(): void {
      trails.clear();
    },
  };
}
