// pattern: Imperative Shell

/**
 * ToolRegistry implementation.
 * Manages tool registration, parameter validation, dispatch, and the JSON Schema view sent to the model.
 */

import type {
  ModelTool,
  Tool,
  ToolContext,
  ToolParameterType,
  ToolResult,
  ToolRegistry,
} from './types.js';
import { BackendUnavailableError, isAbortError } from '../errors.js';

function validateParameterType(value: unknown, expectedType: ToolParameterType): boolean {
  switch (expectedType) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
    case 'array':
      return Array.isArray(value);
    default:
      return false;
  }
}

function failure(error: string): ToolResult {
  return { success: false, output: '', error };
}

export function createToolRegistry(initial: ReadonlyArray<Tool> = []): ToolRegistry {
  const tools = new Map<string, Tool>();

  const registry: ToolRegistry = {
    register(tool: Tool): void {
      if (tools.has(tool.definition.name)) {
        throw new Error(`tool already registered: ${tool.definition.name}`);
      }
      tools.set(tool.definition.name, tool);
    },

    names(): Array<string> {
      return Array.from(tools.keys());
    },

    async dispatch(
      name: string,
      params: Record<string, unknown>,
      context: ToolContext = {},
    ): Promise<ToolResult> {
      const tool = tools.get(name);
      if (!tool) {
        return failure(`unknown tool: ${name}`);
      }

      for (const param of tool.definition.parameters) {
        if (param.required && !(param.name in params)) {
          return failure(`missing required parameter: ${param.name}`);
        }
      }

      for (const param of tool.definition.parameters) {
        if (!(param.name in params)) {
          continue;
        }
        const value = params[param.name];
        if (!validateParameterType(value, param.type)) {
          return failure(`invalid type for parameter ${param.name}: expected ${param.type}, got ${typeof value}`);
        }
        if (param.enum_values && typeof value === 'string' && !param.enum_values.includes(value)) {
          return failure(`invalid value for parameter ${param.name}: expected one of ${param.enum_values.join(', ')}`);
        }
      }

      try {
        return await tool.handler(params, context);
      } catch (error) {
        // An unreachable backend or an interrupt ends the turn; anything else is reported to the model.
        if (error instanceof BackendUnavailableError || isAbortError(error, context.signal)) {
          throw error;
        }
        return failure(`handler error: ${error instanceof Error ? error.message : String(error)}`);
      }
    },

    toModelTools(): Array<ModelTool> {
      return Array.from(tools.values()).map((tool) => {
        const properties: Record<string, unknown> = {};
        const required: Array<string> = [];

        for (const param of tool.definition.parameters) {
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
          name: tool.definition.name,
          description: tool.definition.description,
          input_schema: {
            type: 'object',
            properties,
            required,
          },
        };
      });
    },
  };

  for (const tool of initial) {
    registry.register(tool);
  }

  return registry;
}
