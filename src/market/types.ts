// pattern: Functional Core

/**
 * Market data types.
 * A data adapter answers with text for the conversation; "no data" is a
 * sentence, not an exception.
 */

export type AdapterOptions = {
  readonly signal?: AbortSignal;
};

export type DataAdapter = (subject: string, options?: AdapterOptions) => Promise<string>;

export type MarketAdapters = {
  readonly trends: DataAdapter;
  readonly price: DataAdapter;
  readonly news: DataAdapter;
};

export type Quote = {
  readonly symbol: string;
  readonly price: number;
  readonly currency: string | null;
  /** Bar open time, seconds since the epoch. */
  readonly timestamp: number;
  /** Exchange offset from UTC in seconds. */
  readonly gmtoffset: number;
  readonly timezone: string;
};

export interface QuoteProvider {
  readonly name: string;
  /** Latest one-minute bar of the current trading day, or null when the symbol has none. */
  latest(symbol: string, signal?: AbortSignal): Promise<Quote | null>;
}
