// pattern: Imperative Shell

/**
 * The slice of the Assistants API that grounded research uses.
 * Keeping it narrow lets tests stand in for the remote service.
 */

import type OpenAI from "openai";

export type AssistantDefinition = {
  readonly model: string;
  readonly name: string;
  readonly instructions: string;
};

export type RunOutcome = {
  readonly status: string;
  readonly lastError: string | null;
};

export interface AssistantsGateway {
  createAssistant(definition: AssistantDefinition, signal?: AbortSignal): Promise<string>;
  deleteAssistant(assistantId: string): Promise<void>;
  createThread(userMessage: string, signal?: AbortSignal): Promise<string>;
  deleteThread(threadId: string): Promise<void>;
  runToCompletion(threadId: string, assistantId: string, signal?: AbortSignal): Promise<RunOutcome>;
  /** Text of the newest assistant message on the thread, or null if it has none. */
  latestAssistantText(threadId: string, signal?: AbortSignal): Promise<string | null>;
}

export function createAssistantsGateway(client: OpenAI): AssistantsGateway {
  return {
    async createAssistant(definition, signal) {
      const assistant = await client.beta.assistants.create(
        { model: definition.model, name: definition.name, instructions: definition.instructions },
        { signal },
      );
      return assistant.id;
    },

    async deleteAssistant(assistantId) {
      await client.beta.assistants.del(assistantId);
    },

    async createThread(userMessage, signal) {
      const thread = await client.beta.threads.create(
        { messages: [{ role: "user", content: userMessage }] },
        { signal },
      );
      return thread.id;
    },

    async deleteThread(threadId) {
      await client.beta.threads.del(threadId);
    },

    async runToCompletion(threadId, assistantId, signal) {
      const run = await client.beta.threads.runs.createAndPoll(threadId, { assistant_id: assistantId }, { signal });
      return { status: run.status, lastError: run.last_error?.message ?? null };
    },

    async latestAssistantText(threadId, signal) {
      const page = await client.beta.threads.messages.list(threadId, { order: "desc", limit: 20 }, { signal });
      const message = page.data.find((m) => m.role === "assistant");
      if (!message) {
        return null;
      }
      const text = message.content
        .flatMap((block) => (block.type === "text" ? [block.text.value] : []))
        .join("\n");
      return text === "" ? null : text;
    },
  };
}
