// pattern: Functional Core

/**
 * Evaluation and construction of termination conditions.
 * Every condition is derived from the transcript alone, so evaluation is
 * repeatable and a condition that holds keeps holding as messages are appended.
 */

import type { TerminationCondition, Utterance } from './types.js';

export function textMention(text: string): TerminationCondition {
  if (text === '') {
    throw new Error('text_mention requires a non-empty text');
  }
  return Object.freeze({ kind: 'text_mention', text });
}

export function maxMessages(max: number): TerminationCondition {
  if (!Number.isInteger(max) || max < 1) {
    throw new Error(`max_messages requires a positive integer, got ${max}`);
  }
  return Object.freeze({ kind: 'max_messages', max });
}

export function anyOf(...conditions: ReadonlyArray<TerminationCondition>): TerminationCondition {
  if (conditions.length === 0) {
    throw new Error('or requires at least one condition');
  }
  return Object.freeze({ kind: 'or', conditions: Object.freeze([...conditions]) });
}

export function allOf(...conditions: ReadonlyArray<TerminationCondition>): TerminationCondition {
  if (conditions.length === 0) {
    throw new Error('and requires at least one condition');
  }
  return Object.freeze({ kind: 'and', conditions: Object.freeze([...conditions]) });
}

/**
 * Stop when the decision phrase appears or the message cap is reached.
 */
export function defaultTermination(stopPhrase = 'Decision Made', max = 15): TerminationCondition {
  return anyOf(textMention(stopPhrase), maxMessages(max));
}

/**
 * The reason the condition holds for this transcript, or null when it does not.
 * For `or` the first satisfied child explains; for `and` every child's reason is joined.
 */
export function stopReason(
  condition: TerminationCondition,
  transcript: ReadonlyArray<Utterance>,
): string | null {
  switch (condition.kind) {
    case 'text_mention':
      return transcript.some((message) => message.content.includes(condition.text))
        ? `Text '${condition.text}' mentioned`
        : null;

    case 'max_messages':
      return transcript.length >= condition.max
        ? `Maximum number of messages ${condition.max} reached, current message count: ${transcript.length}`
        : null;

    case 'or': {
      for (const child of condition.conditions) {
        const reason = stopReason(child, transcript);
        if (reason !== null) {
          return reason;
        }
      }
      return null;
    }

    case 'and': {
      const reasons: Array<string> = [];
      for (const child of condition.conditions) {
        const reason = stopReason(child, transcript);
        if (reason === null) {
          return null;
        }
        reasons.push(reason);
      }
      return reasons.join(', ');
    }
  }
}

export function shouldStop(condition: TerminationCondition, transcript: ReadonlyArray<Utterance>): boolean {
  return stopReason(condition, transcript) !== null;
}

export function describeCondition(condition: TerminationCondition): string {
  switch (condition.kind) {
    case 'text_mention':
      return `mention of '${condition.text}'`;
    case 'max_messages':
      return `${condition.max} messages`;
    case 'or':
      return condition.conditions.map(describeCondition).join(' or ');
    case 'and':
      return `(${condition.conditions.map(describeCondition).join(' and ')})`;
  }
}
