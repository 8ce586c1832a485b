// pattern: Functional Core

import { describe, it, expect } from 'vitest';
import {
  allOf,
  anyOf,
  defaultTermination,
  describeCondition,
  maxMessages,
  shouldStop,
  stopReason,
  textMention,
} from './evaluator.js';
import type { TerminationCondition, Utterance } from './types.js';

function transcriptOf(...contents: Array<string>): Array<Utterance> {
  return contents.map((content) => ({ content }));
}

describe('termination primitives', () => {
  it('text mention matches a case-sensitive substring of any message', () => {
    const condition = textMention('Decision Made');

    expect(shouldStop(condition, transcriptOf('trend up', 'Final call. Decision Made'))).toBe(true);
    expect(shouldStop(condition, transcriptOf('decision made'))).toBe(false);
    expect(shouldStop(condition, [])).toBe(false);
  });

  it('max messages fires at the cap', () => {
    const condition = maxMessages(3);

    expect(shouldStop(condition, transcriptOf('a', 'b'))).toBe(false);
    expect(shouldStop(condition, transcriptOf('a', 'b', 'c'))).toBe(true);
    expect(shouldStop(condition, transcriptOf('a', 'b', 'c', 'd'))).toBe(true);
  });

  it('rejects a non-positive cap and an empty phrase', () => {
    expect(() => maxMessages(0)).toThrow('max_messages requires a positive integer, got 0');
    expect(() => maxMessages(2.5)).toThrow();
    expect(() => textMention('')).toThrow('text_mention requires a non-empty text');
  });

  it('combinators require at least one child', () => {
    expect(() => anyOf()).toThrow('or requires at least one condition');
    expect(() => allOf()).toThrow('and requires at least one condition');
  });
});

describe('stopReason', () => {
  it('explains a text mention', () => {
    expect(stopReason(textMention('Decision Made'), transcriptOf('Decision Made'))).toBe(
      "Text 'Decision Made' mentioned",
    );
  });

  it('explains the message cap with the current count', () => {
    const transcript = transcriptOf(...Array.from({ length: 15 }, (_, i) => `m${i}`));

    expect(stopReason(maxMessages(15), transcript)).toBe(
      'Maximum number of messages 15 reached, current message count: 15',
    );
  });

  it('or reports the first satisfied child', () => {
    const condition = anyOf(textMention('STOP'), maxMessages(2));

    expect(stopReason(condition, transcriptOf('a', 'b'))).toBe(
      'Maximum number of messages 2 reached, current message count: 2',
    );
    expect(stopReason(condition, transcriptOf('STOP', 'b'))).toBe("Text 'STOP' mentioned");
    expect(stopReason(condition, transcriptOf('a'))).toBeNull();
  });

  it('and needs every child and joins their reasons', () => {
    const condition = allOf(textMention('buy'), maxMessages(2));

    expect(stopReason(condition, transcriptOf('buy'))).toBeNull();
    expect(stopReason(condition, transcriptOf('x', 'y'))).toBeNull();
    expect(stopReason(condition, transcriptOf('buy', 'y'))).toBe(
      "Text 'buy' mentioned, Maximum number of messages 2 reached, current message count: 2",
    );
  });
});

describe('defaultTermination', () => {
  it('stops on the decision phrase before the cap', () => {
    const condition = defaultTermination();

    expect(shouldStop(condition, transcriptOf('trend', 'news', 'sentiment', 'Hold. Decision Made'))).toBe(true);
  });

  it('stops at 15 messages without the phrase', () => {
    const condition = defaultTermination();
    const fourteen = transcriptOf(...Array.from({ length: 14 }, () => 'no decision yet'));

    expect(shouldStop(condition, fourteen)).toBe(false);
    expect(shouldStop(condition, [...fourteen, { content: 'still thinking' }])).toBe(true);
  });

  it('describes itself', () => {
    expect(describeCondition(defaultTermination('Done', 4))).toBe("mention of 'Done' or 4 messages");
  });
});

describe('monotonicity', () => {
  const conditions: Array<[string, TerminationCondition]> = [
    ['text', textMention('go')],
    ['max', maxMessages(3)],
    ['or', anyOf(textMention('go'), maxMessages(4))],
    ['and', allOf(textMention('go'), maxMessages(2))],
    ['nested', anyOf(allOf(textMention('go'), maxMessages(3)), allOf(textMention('stop'), maxMessages(1)))],
  ];
  const growing = ['a', 'go', 'b', 'stop', 'c', 'd'];

  it.each(conditions)('%s never un-fires as the transcript grows', (_name, condition) => {
    let fired = false;
    for (let length = 0; length <= growing.length; length++) {
      const stop = shouldStop(condition, transcriptOf(...growing.slice(0, length)));
      if (fired) {
        expect(stop).toBe(true);
      }
      fired = fired || stop;
    }
    expect(fired).toBe(true);
  });

  it('evaluation does not depend on earlier calls', () => {
    const condition = defaultTermination('Decision Made', 2);
    const transcript = transcriptOf('x');

    expect(shouldStop(condition, transcript)).toBe(false);
    expect(shouldStop(condition, transcriptOf('x', 'y'))).toBe(true);
    expect(shouldStop(condition, transcript)).toBe(false);
  });
});
