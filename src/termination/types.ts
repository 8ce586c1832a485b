// pattern: Functional Core

/**
 * Termination conditions form a small expression tree.
 * Leaves inspect the transcript; `or` and `and` nodes combine their children.
 */

export type TextMentionCondition = {
  readonly kind: 'text_mention';
  readonly text: string;
};

export type MaxMessagesCondition = {
  readonly kind: 'max_messages';
  readonly max: number;
};

export type OrCondition = {
  readonly kind: 'or';
  readonly conditions: ReadonlyArray<TerminationCondition>;
};

export type AndCondition = {
  readonly kind: 'and';
  readonly conditions: ReadonlyArray<TerminationCondition>;
};

export type TerminationCondition = TextMentionCondition | MaxMessagesCondition | OrCondition | AndCondition;

/**
 * The only part of a transcript message the evaluator looks at.
 */
export type Utterance = {
  readonly content: string;
};
