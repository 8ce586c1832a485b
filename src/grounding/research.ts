// pattern: Imperative Shell

import type { SearchResponse } from '../web/types.js';
import type { GroundingBackend, ResearchRequest, Summarizer } from './types.js';
import { buildGroundedPrompt } from './findings.js';
import { dataUnavailable } from '../errors.js';

type SearchFn = (query: string, limit: number, signal?: AbortSignal) => Promise<SearchResponse>;

export type GroundedResearchOptions = {
  readonly search: SearchFn;
  readonly summarizer: Summarizer;
  readonly maxResults: number;
};

/**
 * Search first, then summarise what was found. Searches that find nothing and
 * summaries without text both answer with the no-data sentence.
 */
export function createGroundedResearch(options: GroundedResearchOptions): GroundingBackend {
  const { search, summarizer, maxResults } = options;

  return {
    name: summarizer.name,
    async research(request: ResearchRequest): Promise<string> {
      const { subject, what, instructions, prompt, query, signal } = request;

      const response = await search(query, maxResults, signal);
      if (response.results.length === 0) {
        return dataUnavailable(what, subject);
      }

      const summary = await summarizer.summarize({
        instructions,
        groundedPrompt: buildGroundedPrompt(prompt, response.results),
        signal,
      });

      return summary === null || summary.trim() === '' ? dataUnavailable(what, subject) : summary;
    },
  };
}
