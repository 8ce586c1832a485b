// pattern: Imperative Shell

/**
 * Real-time polling loop.
 * Runs one fresh conversation per cycle until the signal aborts. A failed run is
 * logged and the loop carries on after the usual wait.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { RunEventSink, Team } from '../conversation/types.js';
import { RunFailedError, isAbortError } from '../errors.js';

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export type RealtimeOptions = {
  readonly subject: string;
  readonly team: Pick<Team, 'newRun'>;
  readonly intervalSeconds: number;
  readonly signal: AbortSignal;
  readonly onEvent?: RunEventSink;
  readonly sleep?: Sleep;
  readonly now?: () => Date;
};

export type RealtimeSummary = {
  readonly cycles: number;
  readonly failures: number;
};

export const abortableSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export function formatClock(date: Date): string {
  return date.toTimeString().slice(0, 8);
}

export async function runRealtimeAnalysis(options: RealtimeOptions): Promise<RealtimeSummary> {
  const { subject, team, intervalSeconds, signal, onEvent } = options;
  const sleep = options.sleep ?? abortableSleep;
  const now = options.now ?? (() => new Date());

  let cycles = 0;
  let failures = 0;

  while (!signal.aborted) {
    cycles++;
    console.log(`\n[${formatClock(now())}] Running real-time round-robin analysis...\n`);

    try {
      await team.newRun(subject).start({ signal, onEvent });
    } catch (error) {
      if (isAbortError(error, signal)) {
        break;
      }
      if (!(error instanceof RunFailedError)) {
        throw error;
      }
      failures++;
      console.error(`cycle ${cycles} failed: ${error.message}`);
    }

    console.log(`\nWaiting ${intervalSeconds} seconds before next update...\n`);

    try {
      await sleep(intervalSeconds * 1000, signal);
    } catch (error) {
      if (isAbortError(error, signal)) {
        break;
      }
      throw error;
    }
  }

  return { cycles, failures };
}
