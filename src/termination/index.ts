// pattern: Functional Core

export type {
  TerminationCondition,
  TextMentionCondition,
  MaxMessagesCondition,
  OrCondition,
  AndCondition,
  Utterance,
} from './types.js';
export {
  textMention,
  maxMessages,
  anyOf,
  allOf,
  defaultTermination,
  stopReason,
  shouldStop,
  describeCondition,
} from './evaluator.js';
