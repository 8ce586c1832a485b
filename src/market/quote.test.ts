// pattern: Imperative Shell

import { describe, it, expect } from "vitest";
import { createYahooQuoteProvider } from "./quote.js";
import { BackendUnavailableError } from "../errors.js";
import { jsonResponse, stubFetch } from "../test-support/fetch.js";

function chart(closes: Array<number | null>, timestamps: Array<number>, meta: Record<string, unknown> = {}) {
  return {
    chart: {
      result: [
        {
          meta: { symbol: "ICICIBANK.NS", currency: "INR", gmtoffset: 19800, timezone: "IST", ...meta },
          timestamp: timestamps,
          indicators: { quote: [{ close: closes }] },
        },
      ],
      error: null,
    },
  };
}

describe("createYahooQuoteProvider", () => {
  it("returns the newest settled one-minute close", async () => {
    stubFetch({
      "query1.finance.yahoo.com": () =>
        jsonResponse(chart([1201.5, 1203.25, null], [1700000000, 1700000060, 1700000120])),
    });

    const quote = await createYahooQuoteProvider().latest("ICICIBANK.NS");

    expect(quote).toEqual({
      symbol: "ICICIBANK.NS",
      price: 1203.25,
      currency: "INR",
      timestamp: 1700000060,
      gmtoffset: 19800,
      timezone: "IST",
    });
  });

  it("requests the intraday one-minute range for the encoded symbol", async () => {
    const requests = stubFetch({ "finance.yahoo.com": () => jsonResponse(chart([1], [1700000000])) });

    await createYahooQuoteProvider().latest("^NSEI");

    const url = new URL(requests[0]?.url ?? "");
    expect(url.pathname).toBe("/v8/finance/chart/%5ENSEI");
    expect(url.searchParams.get("range")).toBe("1d");
    expect(url.searchParams.get("interval")).toBe("1m");
  });

  it("returns null for an unknown symbol", async () => {
    stubFetch({
      "finance.yahoo.com": () =>
        jsonResponse({ chart: { result: null, error: { code: "Not Found", description: "No data found" } } }, 404),
    });

    await expect(createYahooQuoteProvider().latest("NOPE.NS")).resolves.toBeNull();
  });

  it("returns null when the day has no settled bars", async () => {
    stubFetch({ "finance.yahoo.com": () => jsonResponse(chart([null, null], [1700000000, 1700000060])) });

    await expect(createYahooQuoteProvider().latest("ICICIBANK.NS")).resolves.toBeNull();
  });

  it("returns null for an empty result list", async () => {
    stubFetch({ "finance.yahoo.com": () => jsonResponse({ chart: { result: [], error: null } }) });

    await expect(createYahooQuoteProvider().latest("ICICIBANK.NS")).resolves.toBeNull();
  });

  it("raises BackendUnavailableError on a server error", async () => {
    stubFetch({
      "finance.yahoo.com": () => new Response("oops", { status: 502, statusText: "Bad Gateway" }),
    });

    const error = await createYahooQuoteProvider().latest("ICICIBANK.NS").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendUnavailableError);
    expect(error).toMatchObject({ backend: "quotes", message: "quote request failed: 502 Bad Gateway" });
  });

  it("raises BackendUnavailableError when the network fails", async () => {
    stubFetch({
      "finance.yahoo.com": () => {
        throw new TypeError("fetch failed");
      },
    });

    await expect(createYahooQuoteProvider().latest("ICICIBANK.NS")).rejects.toThrow(
      "quote request failed: fetch failed",
    );
  });

  it("raises BackendUnavailableError on a malformed body", async () => {
    stubFetch({ "finance.yahoo.com": () => jsonResponse({ chart: { result: [{ meta: {} }] } }) });

    await expect(createYahooQuoteProvider().latest("ICICIBANK.NS")).rejects.toBeInstanceOf(BackendUnavailableError);
  });

  it("passes an abort through unchanged", async () => {
    const controller = new AbortController();
    const abort = new Error("aborted");
    stubFetch({
      "finance.yahoo.com": () => {
        controller.abort();
        throw abort;
      },
    });

    await expect(createYahooQuoteProvider().latest("ICICIBANK.NS", controller.signal)).rejects.toBe(abort);
  });
});
