// pattern: Functional Core

/**
 * Agent module exports
 */

export type {
  Agent,
  AgentConfig,
  AgentDependencies,
  AgentEvent,
  ToolCallEvent,
  ToolResultEvent,
  TurnContext,
} from './types.js';
export { createAgent } from './agent.js';
export { buildTurnMessages, formatPeerMessage, maxRoundsWarning, emptyReplyPlaceholder } from './context.js';
export { createAnalystRoster, decisionInstructions, ANALYST_NAMES, type RosterDependencies } from './roster.js';
