// pattern: Imperative Shell

import type { SearchProvider, SearchResponse } from "./types.js";
import type { SearchConnection } from "../config/schema.js";
import { createBraveAdapter } from "./providers/brave.js";
import { createTavilyAdapter } from "./providers/tavily.js";
import { createDuckDuckGoAdapter } from "./providers/duckduckgo.js";
import { BackendUnavailableError } from "../errors.js";

export type SearchChainConfig = {
  readonly connection?: SearchConnection;
  readonly brave_api_key?: string;
  readonly tavily_api_key?: string;
};

export type SearchChain = {
  search(query: string, limit: number, signal?: AbortSignal): Promise<SearchResponse>;
  readonly providers: ReadonlyArray<string>;
};

/**
 * Providers in the order they are tried: the configured connection first,
 * then every other configured provider, with DuckDuckGo as the keyless fallback.
 */
export function resolveProviders(config: SearchChainConfig): Array<SearchProvider> {
  const providers: Array<SearchProvider> = [];

  if (config.brave_api_key) {
    providers.push(createBraveAdapter(config.brave_api_key));
  }
  if (config.tavily_api_key) {
    providers.push(createTavilyAdapter(config.tavily_api_key));
  }
  providers.push(createDuckDuckGoAdapter());

  const preferred = providers.find((p) => p.name === config.connection);
  return preferred ? [preferred, ...providers.filter((p) => p !== preferred)] : providers;
}

export function createSearchChain(
  config: SearchChainConfig,
  providers: ReadonlyArray<SearchProvider> = resolveProviders(config),
): SearchChain {
  return {
    providers: providers.map((p) => p.name),

    async search(query: string, limit: number, signal?: AbortSignal): Promise<SearchResponse> {
      const errors: Array<{ provider: string; error: string }> = [];

      for (const provider of providers) {
        try {
          return await provider.search(query, limit, signal);
        } catch (err) {
          if (signal?.aborted) {
            throw err;
          }
          errors.push({
            provider: provider.name,
            error: err instanceof Error ? err.message : String(err),
          });
        }
      }

      const summary = errors
        .map((e) => `${e.provider}: ${e.error}`)
        .join("; ");
      throw new BackendUnavailableError("search", `all search providers failed: ${summary}`);
    },
  };
}
