// pattern: Imperative Shell

import OpenAI, { AzureOpenAI } from "openai";
import type { ModelConfig } from "../config/schema.js";
import type { ModelProvider } from "./types.js";
import { createOpenAIChatAdapter } from "./openai-chat.js";

/**
 * Build the SDK client for the configured provider.
 * Shared by the chat adapter and the grounding assistants gateway.
 */
export function createOpenAIClient(config: ModelConfig, endpointOverride?: string): OpenAI {
  switch (config.provider) {
    case "azure-openai":
      return new AzureOpenAI({
        apiKey: config.api_key,
        endpoint: endpointOverride ?? config.endpoint,
        apiVersion: config.api_version,
        maxRetries: config.max_retries,
      });
    case "openai-compat":
      return new OpenAI({
        apiKey: config.api_key,
        baseURL: endpointOverride ?? config.endpoint,
        maxRetries: config.max_retries,
      });
    default:
      throw new Error(
        `Unknown model provider: ${String(config.provider)}. Valid providers are: 'azure-openai', 'openai-compat'`
      );
  }
}

export function createModelProvider(config: ModelConfig, client: OpenAI = createOpenAIClient(config)): ModelProvider {
  return createOpenAIChatAdapter((body, options) => client.chat.completions.create(body, options));
}
