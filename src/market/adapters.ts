// pattern: Imperative Shell

/**
 * The three data adapters the analysts call through their tools.
 */

import type { GroundingBackend } from '../grounding/types.js';
import type { DataAdapter, MarketAdapters, Quote, QuoteProvider } from './types.js';
import { dataUnavailable } from '../errors.js';

export function formatExchangeTime(timestamp: number, gmtoffset: number): string {
  return new Date((timestamp + gmtoffset) * 1000).toISOString().replace('T', ' ').slice(0, 19);
}

export function formatQuote(subject: string, quote: Quote): string {
  const price = quote.currency ? `${quote.currency} ${quote.price.toFixed(2)}` : quote.price.toFixed(2);
  return `As of ${formatExchangeTime(quote.timestamp, quote.gmtoffset)} ${quote.timezone}, the real-time price of ${subject} is ${price}.`;
}

export function createTrendAdapter(grounding: GroundingBackend): DataAdapter {
  return (subject, options = {}) =>
    grounding.research({
      subject,
      what: 'trends',
      instructions: `Summarize recent price movements and trends for ${subject}.`,
      prompt: `Get stock price trends for ${subject}.`,
      query: `${subject} stock price trend`,
      signal: options.signal,
    });
}

export function createNewsAdapter(grounding: GroundingBackend): DataAdapter {
  return (subject, options = {}) =>
    grounding.research({
      subject,
      what: 'news',
      instructions: `Summarize the latest financial news for ${subject}.`,
      prompt: `Find the latest stock news about ${subject}.`,
      query: `${subject} stock news`,
      signal: options.signal,
    });
}

export function createPriceAdapter(quotes: QuoteProvider): DataAdapter {
  return async (subject, options = {}) => {
    const quote = await quotes.latest(subject, options.signal);
    return quote ? formatQuote(subject, quote) : dataUnavailable('real-time price', subject);
  };
}

export function createMarketAdapters(deps: { grounding: GroundingBackend; quotes: QuoteProvider }): MarketAdapters {
  return {
    trends: createTrendAdapter(deps.grounding),
    price: createPriceAdapter(deps.quotes),
    news: createNewsAdapter(deps.grounding),
  };
}
