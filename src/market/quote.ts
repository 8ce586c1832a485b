// pattern: Imperative Shell

import { z } from "zod";
import type { Quote, QuoteProvider } from "./types.js";
import { BackendUnavailableError } from "../errors.js";
import { requestSignal } from "../web/types.js";

const DEFAULT_BASE_URL = "https://query1.finance.yahoo.com/v8/finance/chart/";
const USER_AGENT = "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";
const QUOTE_TIMEOUT_MS = 15000;

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({
            symbol: z.string(),
            currency: z.string().nullish(),
            gmtoffset: z.number().default(0),
            timezone: z.string().default("UTC"),
          }),
          timestamp: z.array(z.number()).default([]),
          indicators: z.object({
            quote: z.array(z.object({ close: z.array(z.number().nullable()).default([]) })).default([]),
          }),
        }),
      )
      .nullish(),
  }),
});

type ChartResult = NonNullable<z.infer<typeof ChartResponseSchema>["chart"]["result"]>[number];

/**
 * The newest bar that has both a timestamp and a close. Yahoo pads the
 * current minute with nulls until it settles.
 */
export function latestBar(result: ChartResult): { timestamp: number; close: number } | null {
  const closes = result.indicators.quote[0]?.close ?? [];
  for (let i = Math.min(closes.length, result.timestamp.length) - 1; i >= 0; i--) {
    const close = closes[i];
    const timestamp = result.timestamp[i];
    if (typeof close === "number" && timestamp !== undefined) {
      return { timestamp, close };
    }
  }
  return null;
}

export type YahooQuoteOptions = {
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
};

export function createYahooQuoteProvider(options: YahooQuoteOptions = {}): QuoteProvider {
  const baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
  const timeoutMs = options.timeoutMs ?? QUOTE_TIMEOUT_MS;

  return {
    name: "yahoo",
    async latest(symbol: string, signal?: AbortSignal): Promise<Quote | null> {
      const url = new URL(encodeURIComponent(symbol), baseUrl);
      url.searchParams.set("range", "1d");
      url.searchParams.set("interval", "1m");

      let response: Response;
      try {
        response = await fetch(url, {
          headers: { "User-Agent": USER_AGENT, Accept: "application/json" },
          signal: requestSignal(signal, timeoutMs),
        });
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        const reason = error instanceof Error ? error.message : String(error);
        throw new BackendUnavailableError("quotes", `quote request failed: ${reason}`, { cause: error });
      }

      // Unknown symbols answer 404.
      if (response.status === 404) {
        return null;
      }
      if (!response.ok) {
        throw new BackendUnavailableError("quotes", `quote request failed: ${response.status} ${response.statusText}`);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new BackendUnavailableError("quotes", "quote response is not JSON", { cause: error });
      }

      const parsed = ChartResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new BackendUnavailableError("quotes", `unexpected quote response: ${parsed.error.message}`);
      }

      const result = parsed.data.chart.result?.[0];
      if (!result) {
        return null;
      }

      const bar = latestBar(result);
      if (!bar) {
        return null;
      }

      return {
        symbol: result.meta.symbol,
        price: bar.close,
        currency: result.meta.currency ?? null,
        timestamp: bar.timestamp,
        gmtoffset: result.meta.gmtoffset,
        timezone: result.meta.timezone,
      };
    },
  };
}
