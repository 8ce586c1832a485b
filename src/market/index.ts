// pattern: Functional Core

export type { AdapterOptions, DataAdapter, MarketAdapters, Quote, QuoteProvider } from './types.js';
export { createYahooQuoteProvider, latestBar, type YahooQuoteOptions } from './quote.js';
export {
  createMarketAdapters,
  createTrendAdapter,
  createNewsAdapter,
  createPriceAdapter,
  formatQuote,
  formatExchangeTime,
} from './adapters.js';
