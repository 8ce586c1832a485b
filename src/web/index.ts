// pattern: Functional Core

export type { SearchResult, SearchResponse } from "./types.js";
export { type SearchProvider, requestSignal, SEARCH_TIMEOUT_MS } from "./types.js";
export { createSearchChain, resolveProviders, type SearchChain, type SearchChainConfig } from "./chain.js";
export { createBraveAdapter } from "./providers/brave.js";
export { createTavilyAdapter } from "./providers/tavily.js";
export { createDuckDuckGoAdapter } from "./providers/duckduckgo.js";
