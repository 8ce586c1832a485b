// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { analysisTask, createRoundRobinTeam } from './team.js';
import { defaultTermination } from '../termination/evaluator.js';
import { createAgent } from '../agent/agent.js';
import { createToolRegistry } from '../tool/registry.js';
import { createEchoAgent } from '../test-support/agents.js';
import { createScriptedModel, textResponse } from '../test-support/model.js';
import type { ModelRequest } from '../model/types.js';

describe('analysisTask', () => {
  it('names the subject', () => {
    expect(analysisTask('ICICIBANK.NS')).toBe(
      'Analyze trends, real-time prices, and latest news for ICICIBANK.NS. Then make an investment decision.',
    );
  });
});

describe('createRoundRobinTeam', () => {
  it('creates an independent idle run per call', async () => {
    const team = createRoundRobinTeam({
      agents: [createEchoAgent('a'), createEchoAgent('b')],
      termination: defaultTermination('Decision Made', 3),
    });

    const first = team.newRun('INFY.NS');
    const second = team.newRun('INFY.NS');
    await first.start();

    expect(first.id).not.toBe(second.id);
    expect(first.task).toBe(analysisTask('INFY.NS'));
    expect(second.state).toBe('idle');
    expect(second.transcript).toEqual([]);
  });

  it('produces identical transcripts from deterministic agents', async () => {
    // Replies depend only on what the model is shown, so equal inputs give equal runs.
    const deterministic = (request: ModelRequest) =>
      textResponse(`${request.system} saw ${request.messages.length} messages`);
    const config = { model_name: 'gpt-4o', max_tokens: 256, max_tool_rounds: 2 };
    const agents = ['stock_trends_agent', 'news_agent', 'sentiment_agent', 'decision_agent'].map((name) =>
      createAgent({
        name,
        instructions: name,
        model: createScriptedModel(Array.from({ length: 10 }, () => deterministic)),
        registry: createToolRegistry(),
        config,
      }),
    );
    const team = createRoundRobinTeam({ agents, termination: defaultTermination('Decision Made', 6) });

    const first = await team.newRun('INFY.NS').start();
    const second = await team.newRun('INFY.NS').start();

    expect(second.transcript).toEqual(first.transcript);
    expect(first.transcript[5]).toEqual({ sender: 'news_agent', content: 'news_agent saw 6 messages', turnIndex: 5 });
    expect(second.runId).not.toBe(first.runId);
  });

  it('rejects duplicate agent names up front', () => {
    expect(() =>
      createRoundRobinTeam({ agents: [createEchoAgent('a'), createEchoAgent('a')], termination: defaultTermination() }),
    ).toThrow('duplicate agent name: a');
  });
});
