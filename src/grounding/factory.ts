// pattern: Imperative Shell

import type OpenAI from 'openai';
import type { GroundingConfig, ModelConfig } from '../config/schema.js';
import type { ModelProvider } from '../model/types.js';
import type { SearchChain } from '../web/chain.js';
import { createOpenAIClient } from '../model/factory.js';
import { createAssistantsGateway } from './gateway.js';
import { createAssistantsSummarizer } from './assistants.js';
import { createModelSummarizer } from './model.js';
import { createGroundedResearch } from './research.js';
import type { GroundingBackend, Summarizer } from './types.js';

export type GroundingDependencies = {
  readonly search: SearchChain;
  readonly model: ModelProvider;
  /** Client for the assistants backend; built from the project endpoint when omitted. */
  readonly assistantsClient?: OpenAI;
};

function createSummarizer(config: GroundingConfig, modelConfig: ModelConfig, deps: GroundingDependencies): Summarizer {
  switch (config.backend) {
    case 'assistants': {
      const client = deps.assistantsClient ?? createOpenAIClient(modelConfig, config.project_endpoint);
      return createAssistantsSummarizer(createAssistantsGateway(client), {
        model: config.model,
        assistantName: 'market_research_assistant',
      });
    }
    case 'model':
      return createModelSummarizer(deps.model, { model: modelConfig.name, maxTokens: modelConfig.max_tokens });
    default:
      throw new Error(
        `Unknown grounding backend: ${String(config.backend)}. Valid backends are: 'assistants', 'model'`,
      );
  }
}

export function createGroundingBackend(
  config: GroundingConfig,
  modelConfig: ModelConfig,
  deps: GroundingDependencies,
): GroundingBackend {
  return createGroundedResearch({
    search: (query, limit, signal) => deps.search.search(query, limit, signal),
    summarizer: createSummarizer(config, modelConfig, deps),
    maxResults: config.max_results,
  });
}
