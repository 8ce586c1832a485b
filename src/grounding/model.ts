// pattern: Imperative Shell

import type { ModelProvider } from '../model/types.js';
import { extractText } from '../model/types.js';
import type { Summarizer, SummaryRequest } from './types.js';
import { BackendUnavailableError, isAbortError } from '../errors.js';

export type ModelSummarizerOptions = {
  readonly model: string;
  readonly maxTokens: number;
};

/**
 * Summaries from a single chat completion: the instructions as system prompt,
 * the grounded prompt as the only user message.
 */
export function createModelSummarizer(provider: ModelProvider, options: ModelSummarizerOptions): Summarizer {
  return {
    name: 'model',
    async summarize(request: SummaryRequest): Promise<string | null> {
      try {
        const response = await provider.complete({
          system: request.instructions,
          messages: [{ role: 'user', content: request.groundedPrompt }],
          model: options.model,
          max_tokens: options.maxTokens,
          signal: request.signal,
        });
        const text = extractText(response.content);
        return text === '' ? null : text;
      } catch (error) {
        if (isAbortError(error, request.signal)) {
          throw error;
        }
        const reason = error instanceof Error ? error.message : String(error);
        throw new BackendUnavailableError('model', `grounding summary failed: ${reason}`, { cause: error });
      }
    },
  };
}
