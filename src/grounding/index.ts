// pattern: Functional Core

export type { GroundingBackend, ResearchRequest, Summarizer, SummaryRequest } from './types.js';
export type { AssistantsGateway, AssistantDefinition, RunOutcome } from './gateway.js';
export { createAssistantsGateway } from './gateway.js';
export { createAssistantsSummarizer } from './assistants.js';
export { createModelSummarizer } from './model.js';
export { createGroundedResearch } from './research.js';
export { buildGroundedPrompt, formatFinding } from './findings.js';
export { createGroundingBackend, type GroundingDependencies } from './factory.js';
