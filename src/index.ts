#!/usr/bin/env node
// pattern: Imperative Shell

/**
 * market-roundtable entry point.
 * Composition root that wires the analysts and starts the real-time loop.
 */

import { existsSync, realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { config as loadDotenv } from 'dotenv';
import { loadConfig, type AppConfig } from './config/config.js';
import { ConfigurationMissingError } from './errors.js';
import { createModelProvider } from './model/factory.js';
import type { ModelProvider } from './model/types.js';
import { createSearchChain, type SearchChain } from './web/index.js';
import { createGroundingBackend, type GroundingBackend } from './grounding/index.js';
import { createYahooQuoteProvider, createMarketAdapters, type QuoteProvider } from './market/index.js';
import { createMarketTools } from './tool/index.js';
import { createAnalystRoster } from './agent/index.js';
import { createRoundRobinTeam, type Team } from './conversation/index.js';
import { defaultTermination, describeCondition } from './termination/index.js';
import { createConsoleRenderer } from './console/index.js';
import { runRealtimeAnalysis } from './driver/index.js';

export type ApplicationOverrides = {
  model?: ModelProvider;
  search?: SearchChain;
  grounding?: GroundingBackend;
  quotes?: QuoteProvider;
};

export type Application = {
  subject: string;
  intervalSeconds: number;
  team: Team;
};

/**
 * Build the team for a validated configuration.
 * Overrides replace the network-backed collaborators.
 */
export function createApplication(config: AppConfig, overrides: ApplicationOverrides = {}): Application {
  const model = overrides.model ?? createModelProvider(config.model);
  const search = overrides.search ?? createSearchChain(config.grounding);
  const grounding = overrides.grounding ?? createGroundingBackend(config.grounding, config.model, { search, model });
  const quotes = overrides.quotes ?? createYahooQuoteProvider();

  const tools = createMarketTools(createMarketAdapters({ grounding, quotes }));
  const agents = createAnalystRoster({
    model,
    tools,
    stopPhrase: config.analysis.stop_phrase,
    config: {
      model_name: config.model.name,
      max_tokens: config.model.max_tokens,
      max_tool_rounds: config.analysis.max_tool_rounds,
      temperature: config.model.temperature,
    },
  });

  const team = createRoundRobinTeam({
    agents,
    termination: defaultTermination(config.analysis.stop_phrase, config.analysis.max_messages),
  });

  return { subject: config.analysis.subject, intervalSeconds: config.analysis.interval_seconds, team };
}

export function describeApplication(app: Application): string {
  return `market-roundtable starting: ${app.subject} every ${app.intervalSeconds}s, stopping on ${describeCondition(app.team.termination)}`;
}

type SignalSource = {
  once(event: 'SIGINT' | 'SIGTERM', listener: () => void): unknown;
  off(event: 'SIGINT' | 'SIGTERM', listener: () => void): unknown;
};

/**
 * The first SIGINT or SIGTERM aborts the controller; a second one gets the default handling.
 * Returns a function that removes the handlers.
 */
export function installSignalHandlers(controller: AbortController, source: SignalSource = process): () => void {
  const onSignal = (): void => {
    console.log('\nShutting down...');
    controller.abort();
  };
  source.once('SIGINT', onSignal);
  source.once('SIGTERM', onSignal);
  return () => {
    source.off('SIGINT', onSignal);
    source.off('SIGTERM', onSignal);
  };
}

/**
 * Load configuration and run cycles until interrupted. Resolves to the exit code.
 */
export async function main(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig(undefined, env);
  } catch (error) {
    if (error instanceof ConfigurationMissingError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }

  const app = createApplication(config);
  console.log(describeApplication(app));

  const controller = new AbortController();
  const removeHandlers = installSignalHandlers(controller);

  try {
    const summary = await runRealtimeAnalysis({
      subject: app.subject,
      team: app.team,
      intervalSeconds: app.intervalSeconds,
      signal: controller.signal,
      onEvent: createConsoleRenderer(),
    });
    console.log(`stopped after ${summary.cycles} cycles (${summary.failures} failed)`);
    return 0;
  } finally {
    removeHandlers();
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && existsSync(entry) && realpathSync(entry) === fileURLToPath(import.meta.url);
}

// Run main only when this file is executed directly
if (isEntryPoint()) {
  loadDotenv();
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('Fatal error:', error);
      process.exit(1);
    },
  );
}
