// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import OpenAI from 'openai';
import { createGroundingBackend } from './factory.js';
import type { GroundingConfig, ModelConfig } from '../config/schema.js';
import { createSearchChain } from '../web/chain.js';
import { createScriptedModel, textResponse } from '../test-support/model.js';

const modelConfig: ModelConfig = {
  provider: 'openai-compat',
  name: 'gpt-4o-mini',
  api_key: 'test-key',
  endpoint: 'http://localhost:11434/v1',
  max_tokens: 1024,
  max_retries: 0,
};

const groundingConfig: GroundingConfig = {
  backend: 'model',
  model: 'gpt-4o',
  connection: 'duckduckgo',
  max_results: 3,
};

const search = createSearchChain({}, [
  {
    name: 'fixed',
    search: async (_query, limit) => ({
      provider: 'fixed',
      results: [{ title: 'A', url: 'https://example.com/a', snippet: 'a' }].slice(0, limit),
    }),
  },
]);

describe('createGroundingBackend', () => {
  it('summarises with the chat model for the model backend', async () => {
    const model = createScriptedModel([textResponse('grounded answer')]);
    const backend = createGroundingBackend(groundingConfig, modelConfig, { search, model });

    const text = await backend.research({
      subject: 'X',
      what: 'news',
      instructions: 'Summarize the latest financial news for X.',
      prompt: 'Find the latest stock news about X.',
      query: 'X stock news',
    });

    expect(backend.name).toBe('model');
    expect(text).toBe('grounded answer');
    expect(model.requests[0]?.model).toBe('gpt-4o-mini');
    expect(model.requests[0]?.max_tokens).toBe(1024);
  });

  it('uses an ephemeral assistant for the assistants backend', () => {
    const backend = createGroundingBackend(
      { ...groundingConfig, backend: 'assistants', project_endpoint: 'https://example-project.test/v1' },
      modelConfig,
      { search, model: createScriptedModel([]), assistantsClient: new OpenAI({ apiKey: 'test-key', baseURL: 'https://example-project.test/v1' }) },
    );

    expect(backend.name).toBe('assistants');
  });
});
