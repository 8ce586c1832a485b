// pattern: Imperative Shell

import { describe, it, expect, vi } from 'vitest';
import { formatClock, runRealtimeAnalysis, type Sleep } from './realtime.js';
import { createRoundRobinTeam } from '../conversation/team.js';
import type { ConversationRun, RunEvent, RunResult, Team } from '../conversation/types.js';
import { defaultTermination } from '../termination/evaluator.js';
import { BackendUnavailableError } from '../errors.js';
import { createEchoAgent, createScriptedAgent } from '../test-support/agents.js';

function quietConsole() {
  return {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };
}

/** A sleep that records the wait and aborts once `cycles` sleeps have happened. */
function sleepFor(controller: AbortController, cycles: number): Sleep & { waits: Array<number> } {
  const waits: Array<number> = [];
  const sleep = async (ms: number) => {
    waits.push(ms);
    if (waits.length >= cycles) {
      controller.abort();
    }
  };
  return Object.assign(sleep, { waits });
}

function decidingTeam(): Team {
  return createRoundRobinTeam({
    agents: [
      createEchoAgent('stock_trends_agent'),
      createEchoAgent('news_agent'),
      createEchoAgent('sentiment_agent'),
      createScriptedAgent('decision_agent', () => 'NOT INVEST. Decision Made.'),
    ],
    termination: defaultTermination(),
  });
}

describe('formatClock', () => {
  it('renders local wall-clock time', () => {
    expect(formatClock(new Date(2024, 0, 2, 9, 5, 7))).toBe('09:05:07');
  });
});

describe('runRealtimeAnalysis', () => {
  it('runs a fresh conversation every cycle and sleeps the interval between them', async () => {
    const consoleSpy = quietConsole();
    const controller = new AbortController();
    const sleep = sleepFor(controller, 3);
    const events: Array<RunEvent> = [];

    const summary = await runRealtimeAnalysis({
      subject: 'ICICIBANK.NS',
      team: decidingTeam(),
      intervalSeconds: 60,
      signal: controller.signal,
      onEvent: (event) => events.push(event),
      sleep,
      now: () => new Date(2024, 0, 2, 9, 30, 0),
    });

    expect(summary).toEqual({ cycles: 3, failures: 0 });
    expect(sleep.waits).toEqual([60000, 60000, 60000]);
    expect(events.filter((e) => e.type === 'run_terminated')).toHaveLength(3);
    expect(new Set(events.map((e) => e.runId)).size).toBe(3);
    expect(consoleSpy.log).toHaveBeenCalledWith('\n[09:30:00] Running real-time round-robin analysis...\n');
    expect(consoleSpy.log).toHaveBeenCalledWith('\nWaiting 60 seconds before next update...\n');
  });

  it('records a failed run and starts an independent one after the usual wait', async () => {
    const consoleSpy = quietConsole();
    const controller = new AbortController();
    const sleep = sleepFor(controller, 2);
    let newsTurns = 0;
    const team = createRoundRobinTeam({
      agents: [
        createEchoAgent('stock_trends_agent'),
        createScriptedAgent('news_agent', () => {
          newsTurns++;
          if (newsTurns === 1) {
            throw new BackendUnavailableError('model', 'news_agent: model backend failed: 503');
          }
          return 'news';
        }),
        createEchoAgent('sentiment_agent'),
        createScriptedAgent('decision_agent', () => 'INVEST. Decision Made.'),
      ],
      termination: defaultTermination(),
    });
    const results: Array<RunEvent> = [];

    const summary = await runRealtimeAnalysis({
      subject: 'ICICIBANK.NS',
      team,
      intervalSeconds: 60,
      signal: controller.signal,
      onEvent: (event) => results.push(event),
      sleep,
    });

    expect(summary).toEqual({ cycles: 2, failures: 1 });
    expect(sleep.waits).toEqual([60000, 60000]);
    expect(results.filter((e) => e.type === 'run_failed')).toHaveLength(1);
    const terminated = results.filter((e) => e.type === 'run_terminated');
    expect(terminated).toHaveLength(1);
    expect(consoleSpy.error).toHaveBeenCalledTimes(1);
    expect(String(consoleSpy.error.mock.calls[0]?.[0])).toMatch(/^cycle 1 failed: run .+ failed on turn 1 \(news_agent\): /);
  });

  it('exits without sleeping when interrupted mid-run', async () => {
    quietConsole();
    const controller = new AbortController();
    const sleep = vi.fn<Sleep>(async () => {});
    const team = createRoundRobinTeam({
      agents: [
        createScriptedAgent('stock_trends_agent', () => {
          controller.abort();
          return 'interrupted';
        }),
        createEchoAgent('news_agent'),
      ],
      termination: defaultTermination(),
    });

    const summary = await runRealtimeAnalysis({
      subject: 'X',
      team,
      intervalSeconds: 60,
      signal: controller.signal,
      sleep,
    });

    expect(summary).toEqual({ cycles: 1, failures: 0 });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('exits when the sleep is interrupted', async () => {
    quietConsole();
    const controller = new AbortController();
    const sleep: Sleep = async () => {
      controller.abort();
      const error = new Error('The operation was aborted');
      error.name = 'AbortError';
      throw error;
    };

    const summary = await runRealtimeAnalysis({
      subject: 'X',
      team: decidingTeam(),
      intervalSeconds: 5,
      signal: controller.signal,
      sleep,
    });

    expect(summary).toEqual({ cycles: 1, failures: 0 });
  });

  it('does not start when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const newRun = vi.fn<Team['newRun']>();

    const summary = await runRealtimeAnalysis({
      subject: 'X',
      team: { newRun },
      intervalSeconds: 60,
      signal: controller.signal,
    });

    expect(summary).toEqual({ cycles: 0, failures: 0 });
    expect(newRun).not.toHaveBeenCalled();
  });

  it('rethrows errors that are not run failures', async () => {
    quietConsole();
    const controller = new AbortController();
    const broken: ConversationRun = {
      id: 'run-x',
      subject: 'X',
      task: 'task',
      state: 'idle',
      transcript: [],
      start: async (): Promise<RunResult> => {
        throw new Error('cannot start');
      },
    };

    await expect(
      runRealtimeAnalysis({
        subject: 'X',
        team: { newRun: () => broken },
        intervalSeconds: 60,
        signal: controller.signal,
        sleep: async () => {},
      }),
    ).rejects.toThrow('cannot start');
  });

  it('interrupts the default sleep on abort', async () => {
    const consoleSpy = quietConsole();
    const controller = new AbortController();
    const done = runRealtimeAnalysis({
      subject: 'X',
      team: decidingTeam(),
      intervalSeconds: 60,
      signal: controller.signal,
    });

    await vi.waitFor(() => {
      expect(consoleSpy.log).toHaveBeenCalledWith('\nWaiting 60 seconds before next update...\n');
    });
    controller.abort();

    await expect(done).resolves.toEqual({ cycles: 1, failures: 0 });
  });
});
