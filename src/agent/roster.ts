// pattern: Functional Core

/**
 * The four analysts, in speaking order.
 */

import { createAgent } from './agent.js';
import type { Agent, AgentConfig } from './types.js';
import type { ModelProvider } from '../model/types.js';
import type { MarketTools } from '../tool/builtin/market.js';
import { createToolRegistry } from '../tool/registry.js';

export type RosterDependencies = {
  model: ModelProvider;
  tools: MarketTools;
  config: AgentConfig;
  stopPhrase: string;
};

export const ANALYST_NAMES = ['stock_trends_agent', 'news_agent', 'sentiment_agent', 'decision_agent'] as const;

export function decisionInstructions(stopPhrase: string): string {
  return (
    'You are the Decision Agent. Combine insights from trends, real-time prices, and news ' +
    `to decide whether to INVEST or NOT INVEST. End with '${stopPhrase}'.`
  );
}

export function createAnalystRoster(deps: RosterDependencies): Array<Agent> {
  const { model, tools, config, stopPhrase } = deps;

  return [
    createAgent({
      name: 'stock_trends_agent',
      instructions:
        'You are the Stock Trends Agent. You analyze both historical and real-time data ' +
        'to summarize current stock movement patterns.',
      model,
      registry: createToolRegistry([tools.trends, tools.price]),
      config,
    }),
    createAgent({
      name: 'news_agent',
      instructions: 'You are the News Agent. Retrieve and summarize the latest relevant news for the stock.',
      model,
      registry: createToolRegistry([tools.news]),
      config,
    }),
    createAgent({
      name: 'sentiment_agent',
      instructions:
        'You are the Sentiment Agent. Summarize the overall market mood ' +
        'and investor confidence for the given stock.',
      model,
      registry: createToolRegistry(),
      config,
    }),
    createAgent({
      name: 'decision_agent',
      instructions: decisionInstructions(stopPhrase),
      model,
      registry: createToolRegistry(),
      config,
    }),
  ];
}
