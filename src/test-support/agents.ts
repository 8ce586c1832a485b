// pattern: Imperative Shell

/**
 * Agents with scripted replies for conversation and driver tests.
 */

import type { Agent, TurnContext } from '../agent/types.js';
import type { TranscriptMessage } from '../conversation/types.js';

export type ScriptedReply = (transcript: ReadonlyArray<TranscriptMessage>, context: TurnContext) => string | Promise<string>;

export type ScriptedAgent = Agent & {
  readonly seen: Array<{ transcriptLength: number; turnIndex: number }>;
};

export function createScriptedAgent(name: string, reply: ScriptedReply): ScriptedAgent {
  const seen: Array<{ transcriptLength: number; turnIndex: number }> = [];
  return {
    name,
    instructions: `You are ${name}.`,
    tools: [],
    seen,
    async takeTurn(transcript, context) {
      seen.push({ transcriptLength: transcript.length, turnIndex: context.turnIndex });
      const content = await reply(transcript, context);
      return Object.freeze({ sender: name, content, turnIndex: context.turnIndex });
    },
  };
}

/** An agent whose reply names itself and the turn it spoke on. */
export function createEchoAgent(name: string): ScriptedAgent {
  return createScriptedAgent(name, (_transcript, context) => `${name} speaking on turn ${context.turnIndex}`);
}
