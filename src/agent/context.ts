// pattern: Functional Core

/**
 * Context building for one agent turn.
 * The run task opens the context; the agent's own earlier replies are its
 * assistant messages and everyone else's arrive as user messages tagged with the sender.
 */

import type { Message } from '../model/types.js';
import type { TranscriptMessage } from '../conversation/types.js';

export function formatPeerMessage(message: TranscriptMessage): string {
  return `[${message.sender}] ${message.content}`;
}

export function buildTurnMessages(
  agentName: string,
  task: string,
  transcript: ReadonlyArray<TranscriptMessage>,
): Array<Message> {
  const messages: Array<Message> = [{ role: 'user', content: task }];

  for (const message of transcript) {
    if (message.sender === agentName) {
      messages.push({ role: 'assistant', content: message.content });
    } else {
      messages.push({ role: 'user', content: formatPeerMessage(message) });
    }
  }

  return messages;
}

export function maxRoundsWarning(maxRounds: number): string {
  return `[Warning: max tool rounds (${maxRounds}) reached. Stopping tool execution.]`;
}

export function emptyReplyPlaceholder(agentName: string): string {
  return `[${agentName} produced no text]`;
}
