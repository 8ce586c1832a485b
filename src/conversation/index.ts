// pattern: Functional Core

export type {
  TranscriptMessage,
  RunState,
  RunEvent,
  RunEventSink,
  RunStartedEvent,
  MessageEvent,
  RunTerminatedEvent,
  RunFailedEvent,
  StartOptions,
  RunResult,
  ConversationRun,
  ConversationRunOptions,
  Team,
  TeamOptions,
} from './types.js';
export { createConversationRun, validateRoster, agentForTurn } from './run.js';
export { createRoundRobinTeam, analysisTask } from './team.js';
