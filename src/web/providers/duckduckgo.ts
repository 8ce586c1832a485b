// pattern: Imperative Shell

import { parseHTML } from "linkedom";
import { requestSignal, type SearchProvider, type SearchResponse, type SearchResult } from "../types.js";

const USER_AGENT = "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

type ResultNode = {
  readonly textContent: string | null;
  getAttribute(name: string): string | null;
};

type ResultElement = {
  querySelector(selector: string): ResultNode | null;
};

// null when a redirect href cannot be parsed; the result is skipped
function extractUrl(href: string): string | null {
  if (!href.includes("uddg=")) {
    return href;
  }
  try {
    return new URL(href, "https://duckduckgo.com").searchParams.get("uddg") ?? href;
  } catch {
    return null;
  }
}

export function createDuckDuckGoAdapter(): SearchProvider {
  return {
    name: "duckduckgo",
    async search(query: string, limit: number, signal?: AbortSignal): Promise<SearchResponse> {
      const response = await fetch("https://html.duckduckgo.com/html/", {
        method: "POST",
        headers: {
          "User-Agent": USER_AGENT,
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: `q=${encodeURIComponent(query)}`,
        signal: requestSignal(signal),
      });

      if (!response.ok) {
        throw new Error(`duckduckgo search failed: ${response.status} ${response.statusText}`);
      }

      const { document } = parseHTML(await response.text());
      const resultElements: Array<ResultElement> = Array.from(document.querySelectorAll(".result"));
      const results: Array<SearchResult> = [];

      for (const el of resultElements) {
        if (results.length >= limit) break;

        const anchor = el.querySelector(".result__a");
        if (!anchor) continue;

        const title = anchor.textContent?.trim() ?? "";
        const url = extractUrl(anchor.getAttribute("href") ?? "");
        const snippet = el.querySelector(".result__snippet")?.textContent?.trim() ?? "";

        if (title && url) {
          results.push({ title, url, snippet });
        }
      }

      return { results, provider: "duckduckgo" };
    },
  };
}
