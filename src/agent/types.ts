// pattern: Functional Core

/**
 * Agent types for the turn loop.
 * An agent is created once and reused by every run; all per-run state lives in
 * the transcript handed to each turn.
 */

import type { ModelProvider } from '../model/types.js';
import type { ToolRegistry } from '../tool/types.js';
import type { TranscriptMessage } from '../conversation/types.js';

export type AgentConfig = {
  model_name: string;
  max_tokens: number;
  max_tool_rounds: number;
  temperature?: number;
};

export type ToolCallEvent = {
  type: 'tool_call';
  agent: string;
  turnIndex: number;
  toolUseId: string;
  name: string;
  input: Record<string, unknown>;
};

export type ToolResultEvent = {
  type: 'tool_result';
  agent: string;
  turnIndex: number;
  toolUseId: string;
  name: string;
  output: string;
  isError: boolean;
};

export type AgentEvent = ToolCallEvent | ToolResultEvent;

export type TurnContext = {
  readonly task: string;
  readonly turnIndex: number;
  readonly signal?: AbortSignal;
  readonly onEvent?: (event: AgentEvent) => void;
};

export type AgentDependencies = {
  name: string;
  instructions: string;
  model: ModelProvider;
  registry: ToolRegistry;
  config: AgentConfig;
};

export type Agent = {
  readonly name: string;
  readonly instructions: string;
  readonly tools: ReadonlyArray<string>;
  takeTurn(transcript: ReadonlyArray<TranscriptMessage>, context: TurnContext): Promise<TranscriptMessage>;
};
