// pattern: Functional Core

export type {
  ToolParameterType,
  ToolParameter,
  ToolDefinition,
  ToolResult,
  ToolContext,
  ToolHandler,
  Tool,
  ModelTool,
  ToolRegistry,
} from './types.js';

export { createToolRegistry } from './registry.js';
export { createMarketTools, MARKET_TOOL_NAMES, type MarketTools } from './builtin/market.js';
