// pattern: Functional Core

/**
 * Grounded research: web findings summarised into a short answer for the
 * conversation.
 */

export type ResearchRequest = {
  readonly subject: string;
  /** Noun phrase for the no-data sentence, e.g. "trends". */
  readonly what: string;
  readonly instructions: string;
  readonly prompt: string;
  readonly query: string;
  readonly signal?: AbortSignal;
};

export interface GroundingBackend {
  readonly name: string;
  research(request: ResearchRequest): Promise<string>;
}

export type SummaryRequest = {
  readonly instructions: string;
  readonly groundedPrompt: string;
  readonly signal?: AbortSignal;
};

/**
 * Turns a grounded prompt into text. Null means the backend answered without any.
 */
export type Summarizer = {
  readonly name: string;
  summarize(request: SummaryRequest): Promise<string | null>;
};
