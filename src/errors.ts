// pattern: Functional Core

/**
 * Error kinds shared across the analysis pipeline.
 *
 * "No data" is not an error: adapters answer with the sentence built by
 * `dataUnavailable` and the conversation carries on.
 */

import type { TranscriptMessage } from './conversation/types.js';

export type BackendKind = 'model' | 'search' | 'quotes' | 'grounding';

export class BackendUnavailableError extends Error {
  constructor(
    public readonly backend: BackendKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'BackendUnavailableError';
  }
}

export class RunFailedError extends Error {
  constructor(
    public readonly runId: string,
    public readonly agent: string,
    public readonly turnIndex: number,
    public readonly transcript: ReadonlyArray<TranscriptMessage>,
    options: { cause: unknown },
  ) {
    super(`run ${runId} failed on turn ${turnIndex} (${agent}): ${describeCause(options.cause)}`, options);
    this.name = 'RunFailedError';
  }
}

export class ConfigurationMissingError extends Error {
  constructor(public readonly issues: ReadonlyArray<string>) {
    super(`configuration missing or invalid:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigurationMissingError';
  }
}

export function dataUnavailable(what: string, subject: string): string {
  return `Could not fetch ${what} for ${subject}.`;
}

export function isAbortError(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) {
    return true;
  }
  return error instanceof Error && error.name === 'AbortError';
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
