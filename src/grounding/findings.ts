// pattern: Functional Core

import type { SearchResult } from '../web/types.js';

export function formatFinding(result: SearchResult, index: number): string {
  const lines = [`${index + 1}. ${result.title}`, `   ${result.url}`];
  if (result.snippet) {
    lines.push(`   ${result.snippet}`);
  }
  return lines.join('\n');
}

export function buildGroundedPrompt(prompt: string, findings: ReadonlyArray<SearchResult>): string {
  return [
    prompt,
    '',
    'Base your answer only on these web search findings, citing sources by number:',
    '',
    findings.map(formatFinding).join('\n'),
  ].join('\n');
}
