// pattern: Functional Core

/**
 * Tool system types for registration, dispatch, and model integration.
 * A registry is the dispatch table of one agent: the model can only reach
 * the handlers registered here, by name.
 */

export type ToolParameterType = 'string' | 'number' | 'boolean' | 'object' | 'array';

export type ToolParameter = {
  name: string;
  type: ToolParameterType;
  description: string;
  required: boolean;
  enum_values?: ReadonlyArray<string>;
};

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: ReadonlyArray<ToolParameter>;
};

export type ToolResult = {
  success: boolean;
  output: string;
  error?: string;
};

export type ToolContext = {
  signal?: AbortSignal;
};

export type ToolHandler = (params: Record<string, unknown>, context: ToolContext) => Promise<ToolResult>;

export type Tool = {
  definition: ToolDefinition;
  handler: ToolHandler;
};

export type ModelTool = {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
};

export interface ToolRegistry {
  register(tool: Tool): void;
  names(): Array<string>;
  dispatch(name: string, params: Record<string, unknown>, context?: ToolContext): Promise<ToolResult>;
  toModelTools(): Array<ModelTool>;
}
