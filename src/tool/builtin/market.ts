// pattern: Imperative Shell

/**
 * Market data tools.
 * Each tool takes the instrument symbol and answers with the adapter's text.
 */

import type { Tool } from '../types.js';
import type { DataAdapter, MarketAdapters } from '../../market/types.js';

export const MARKET_TOOL_NAMES = {
  trends: 'stock_price_trends_tool',
  price: 'realtime_stock_price_tool',
  news: 'news_analysis_tool',
} as const;

export type MarketTools = {
  readonly trends: Tool;
  readonly price: Tool;
  readonly news: Tool;
};

function createMarketTool(name: string, description: string, what: string, adapter: DataAdapter): Tool {
  return {
    definition: {
      name,
      description,
      parameters: [
        {
          name: 'stock_name',
          type: 'string',
          description: 'Ticker symbol of the instrument, e.g. ICICIBANK.NS',
          required: true,
        },
      ],
    },
    handler: async (params, context) => {
      const stockName = params['stock_name'];
      if (typeof stockName !== 'string' || stockName.trim() === '') {
        return { success: false, output: '', error: 'stock_name must be a non-empty string' };
      }

      console.log(`[${name}] fetching ${what} for ${stockName}...`);
      const output = await adapter(stockName, { signal: context.signal });
      return { success: true, output };
    },
  };
}

export function createMarketTools(adapters: MarketAdapters): MarketTools {
  return {
    trends: createMarketTool(
      MARKET_TOOL_NAMES.trends,
      'Summarize recent price movements and trends for a stock, grounded in a live web search.',
      'trends',
      adapters.trends,
    ),
    price: createMarketTool(
      MARKET_TOOL_NAMES.price,
      'Get the latest one-minute closing price of a stock for the current trading day.',
      'real-time price',
      adapters.price,
    ),
    news: createMarketTool(
      MARKET_TOOL_NAMES.news,
      'Summarize the latest financial news about a stock, grounded in a live web search.',
      'news',
      adapters.news,
    ),
  };
}
