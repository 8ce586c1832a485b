// pattern: Imperative Shell

import { z } from "zod";
import { requestSignal, type SearchProvider, type SearchResponse } from "../types.js";

const TavilyApiResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string(),
        url: z.string(),
        content: z.string(),
        score: z.number(),
      }),
    )
    .default([]),
});

export function createTavilyAdapter(apiKey: string): SearchProvider {
  return {
    name: "tavily",
    async search(query: string, limit: number, signal?: AbortSignal): Promise<SearchResponse> {
      const response = await fetch("https://api.tavily.com/search", {
        method: "POST",
        headers: {
          "Authorization": `Bearer ${apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          query,
          topic: "news",
          max_results: limit,
          search_depth: "basic",
        }),
        signal: requestSignal(signal),
      });

      if (!response.ok) {
        throw new Error(`tavily search failed: ${response.status} ${response.statusText}`);
      }

      const data = TavilyApiResponseSchema.parse(await response.json());
      const results = data.results.map((r) => ({
        title: r.title,
        url: r.url,
        snippet: r.content,
        score: r.score,
      }));

      return { results, provider: "tavily" };
    },
  };
}
