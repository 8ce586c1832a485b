// pattern: Functional Core

export {
  runRealtimeAnalysis,
  abortableSleep,
  formatClock,
  type RealtimeOptions,
  type RealtimeSummary,
  type Sleep,
} from './realtime.js';
