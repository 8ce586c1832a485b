// pattern: Functional Core

/**
 * Shared types for web search.
 * These types define the port interface that all search provider adapters normalise to.
 */

export type SearchResult = {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
  readonly score?: number;
};

export type SearchResponse = {
  readonly results: ReadonlyArray<SearchResult>;
  readonly provider: string;
};

export interface SearchProvider {
  readonly name: string;
  search(query: string, limit: number, signal?: AbortSignal): Promise<SearchResponse>;
}

export const SEARCH_TIMEOUT_MS = 30000;

/**
 * Per-request signal: the caller's interrupt combined with the provider timeout.
 */
export function requestSignal(signal: AbortSignal | undefined, timeoutMs: number = SEARCH_TIMEOUT_MS): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}
