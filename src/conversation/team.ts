// pattern: Functional Core

import { createConversationRun, validateRoster } from './run.js';
import type { ConversationRun, Team, TeamOptions } from './types.js';

export function analysisTask(subject: string): string {
  return `Analyze trends, real-time prices, and latest news for ${subject}. Then make an investment decision.`;
}

/**
 * A fixed roster and termination policy, reused for every cycle.
 * Each run starts from an empty transcript.
 */
export function createRoundRobinTeam(options: TeamOptions): Team {
  const agents = Object.freeze([...options.agents]);
  validateRoster(agents);

  return {
    agents,
    termination: options.termination,
    newRun(subject: string): ConversationRun {
      return createConversationRun({
        subject,
        task: analysisTask(subject),
        agents,
        termination: options.termination,
      });
    },
  };
}
