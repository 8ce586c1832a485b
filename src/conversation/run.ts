// pattern: Imperative Shell

/**
 * Round-robin group conversation.
 * Turn k is taken by agents[k mod N]; every reply is appended before the
 * termination condition is evaluated for that turn.
 */

import { randomUUID } from 'node:crypto';
import type { Agent } from '../agent/types.js';
import { stopReason } from '../termination/evaluator.js';
import { RunFailedError, isAbortError } from '../errors.js';
import type {
  ConversationRun,
  ConversationRunOptions,
  RunEvent,
  RunResult,
  RunState,
  StartOptions,
  TranscriptMessage,
} from './types.js';

export function validateRoster(agents: ReadonlyArray<Agent>): void {
  if (agents.length === 0) {
    throw new Error('a conversation needs at least one agent');
  }
  const seen = new Set<string>();
  for (const agent of agents) {
    if (seen.has(agent.name)) {
      throw new Error(`duplicate agent name: ${agent.name}`);
    }
    seen.add(agent.name);
  }
}

export function agentForTurn(agents: ReadonlyArray<Agent>, turnIndex: number): Agent {
  const agent = agents[turnIndex % agents.length];
  if (!agent) {
    throw new Error(`no agent for turn ${turnIndex}`);
  }
  return agent;
}

export function createConversationRun(options: ConversationRunOptions): ConversationRun {
  const { subject, task, agents, termination } = options;
  validateRoster(agents);

  const id = options.id ?? randomUUID();
  const transcript: Array<TranscriptMessage> = [];
  let state: RunState = 'idle';

  function snapshot(): ReadonlyArray<TranscriptMessage> {
    return Object.freeze([...transcript]);
  }

  async function start(startOptions: StartOptions = {}): Promise<RunResult> {
    if (state !== 'idle') {
      throw new Error(`run ${id} cannot start from state ${state}`);
    }
    state = 'running';

    const { signal } = startOptions;
    const emit = (event: RunEvent): void => startOptions.onEvent?.(event);

    emit({ type: 'run_started', runId: id, subject, task, agents: agents.map((a) => a.name) });

    for (let turnIndex = 0; ; turnIndex++) {
      const agent = agentForTurn(agents, turnIndex);

      let content: string;
      try {
        signal?.throwIfAborted();
        const reply = await agent.takeTurn(snapshot(), {
          task,
          turnIndex,
          signal,
          onEvent: (event) => emit({ ...event, runId: id }),
        });
        content = reply.content;
      } catch (error) {
        state = 'failed';
        if (isAbortError(error, signal)) {
          throw error;
        }
        const failure = new RunFailedError(id, agent.name, turnIndex, snapshot(), { cause: error });
        emit({ type: 'run_failed', runId: id, agent: agent.name, turnIndex, error: failure.message });
        throw failure;
      }

      const message: TranscriptMessage = Object.freeze({ sender: agent.name, content, turnIndex });
      transcript.push(message);
      emit({ type: 'message', runId: id, message });

      const reason = stopReason(termination, transcript);
      if (reason !== null) {
        state = 'terminated';
        emit({ type: 'run_terminated', runId: id, reason, messageCount: transcript.length });
        return { runId: id, transcript: snapshot(), stopReason: reason };
      }
    }
  }

  return {
    id,
    subject,
    task,
    get state() {
      return state;
    },
    get transcript() {
      return snapshot();
    },
    start,
  };
}
