// pattern: Functional Core

/**
 * Console rendering of run events: one chunk per message, one line per tool step.
 */

import type { RunEvent, RunEventSink } from '../conversation/types.js';

export const TOOL_OUTPUT_LIMIT = 500;

export function clip(text: string, limit: number = TOOL_OUTPUT_LIMIT): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > limit ? `${flat.slice(0, limit)}...` : flat;
}

function banner(title: string): string {
  return `---------- ${title} ----------`;
}

export function formatRunEvent(event: RunEvent): string | null {
  switch (event.type) {
    case 'run_started':
      return `${banner('user')}\n${event.task}`;
    case 'tool_call':
      return `  -> ${event.name}(${JSON.stringify(event.input)})`;
    case 'tool_result':
      return `  <- ${event.name}${event.isError ? ' [error]' : ''}: ${clip(event.output)}`;
    case 'message':
      return `${banner(`${event.message.sender} (turn ${event.message.turnIndex})`)}\n${event.message.content}`;
    case 'run_terminated':
      return banner(`stopped: ${event.reason}`);
    case 'run_failed':
      return banner(`failed: ${event.error}`);
    default:
      return null;
  }
}

export function createConsoleRenderer(
  write: (text: string) => void = (text) => {
    process.stdout.write(text);
  },
): RunEventSink {
  return (event) => {
    const text = formatRunEvent(event);
    if (text !== null) {
      write(`${text}\n`);
    }
  };
}
