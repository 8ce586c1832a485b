// pattern: Functional Core

/**
 * Group conversation types: the transcript, run lifecycle, and the events a
 * run reports while it is in progress.
 */

import type { Agent, ToolCallEvent, ToolResultEvent } from '../agent/types.js';
import type { TerminationCondition } from '../termination/types.js';

export type TranscriptMessage = {
  readonly sender: string;
  readonly content: string;
  readonly turnIndex: number;
};

export type RunState = 'idle' | 'running' | 'terminated' | 'failed';

export type RunStartedEvent = {
  type: 'run_started';
  runId: string;
  subject: string;
  task: string;
  agents: ReadonlyArray<string>;
};

export type MessageEvent = {
  type: 'message';
  runId: string;
  message: TranscriptMessage;
};

export type RunTerminatedEvent = {
  type: 'run_terminated';
  runId: string;
  reason: string;
  messageCount: number;
};

export type RunFailedEvent = {
  type: 'run_failed';
  runId: string;
  agent: string;
  turnIndex: number;
  error: string;
};

export type RunEvent =
  | RunStartedEvent
  | (ToolCallEvent & { runId: string })
  | (ToolResultEvent & { runId: string })
  | MessageEvent
  | RunTerminatedEvent
  | RunFailedEvent;

export type RunEventSink = (event: RunEvent) => void;

export type StartOptions = {
  readonly signal?: AbortSignal;
  readonly onEvent?: RunEventSink;
};

export type RunResult = {
  readonly runId: string;
  readonly transcript: ReadonlyArray<TranscriptMessage>;
  readonly stopReason: string;
};

export type ConversationRunOptions = {
  readonly subject: string;
  readonly task: string;
  readonly agents: ReadonlyArray<Agent>;
  readonly termination: TerminationCondition;
  readonly id?: string;
};

export interface ConversationRun {
  readonly id: string;
  readonly subject: string;
  readonly task: string;
  readonly state: RunState;
  readonly transcript: ReadonlyArray<TranscriptMessage>;
  start(options?: StartOptions): Promise<RunResult>;
}

export type TeamOptions = {
  readonly agents: ReadonlyArray<Agent>;
  readonly termination: TerminationCondition;
};

export interface Team {
  readonly agents: ReadonlyArray<Agent>;
  readonly termination: TerminationCondition;
  newRun(subject: string): ConversationRun;
}
