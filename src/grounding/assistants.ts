// pattern: Imperative Shell

/**
 * Summaries through an ephemeral remote assistant.
 * Each call owns one assistant and one thread and deletes both before it returns.
 */

import type { AssistantsGateway } from './gateway.js';
import type { Summarizer, SummaryRequest } from './types.js';
import { BackendUnavailableError, isAbortError } from '../errors.js';

export type AssistantsSummarizerOptions = {
  readonly model: string;
  readonly assistantName: string;
};

async function release(what: string, id: string, remove: (id: string) => Promise<void>): Promise<void> {
  try {
    await remove(id);
  } catch (error) {
    console.error(`grounding: failed to delete ${what} ${id}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function createAssistantsSummarizer(
  gateway: AssistantsGateway,
  options: AssistantsSummarizerOptions,
): Summarizer {
  return {
    name: 'assistants',
    async summarize(request: SummaryRequest): Promise<string | null> {
      const { instructions, groundedPrompt, signal } = request;
      let assistantId: string | null = null;
      let threadId: string | null = null;

      try {
        assistantId = await gateway.createAssistant(
          { model: options.model, name: options.assistantName, instructions },
          signal,
        );
        threadId = await gateway.createThread(groundedPrompt, signal);

        const outcome = await gateway.runToCompletion(threadId, assistantId, signal);
        if (outcome.status !== 'completed') {
          const detail = outcome.lastError ? `: ${outcome.lastError}` : '';
          throw new BackendUnavailableError('grounding', `assistant run ended with status ${outcome.status}${detail}`);
        }

        return await gateway.latestAssistantText(threadId, signal);
      } catch (error) {
        if (error instanceof BackendUnavailableError || isAbortError(error, signal)) {
          throw error;
        }
        const reason = error instanceof Error ? error.message : String(error);
        throw new BackendUnavailableError('grounding', `assistants request failed: ${reason}`, { cause: error });
      } finally {
        if (threadId !== null) {
          await release('thread', threadId, (id) => gateway.deleteThread(id));
        }
        if (assistantId !== null) {
          await release('assistant', assistantId, (id) => gateway.deleteAssistant(id));
        }
      }
    },
  };
}
