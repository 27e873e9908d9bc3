import type { ExperimentDescriptor, SubmittedJob } from '../schema/index.js';
import type { Submitter } from './client.js';

export type SubmitterCall =
  | { kind: 'experiment'; exp: ExperimentDescriptor; tool: string }
  | { kind: 'allCompetitors'; exp: ExperimentDescriptor };

/**
 * Mock submitter for testing.
 * Records every call and returns no jobs.
 */
export function createMockSubmitter(): Submitter & { readonly calls: SubmitterCall[] } {
  const calls: SubmitterCall[] = [];

  return {
    calls,
    async submitExperiment(exp, tool): Promise<SubmittedJob[]> {
      calls.push({ kind: 'experiment', exp, tool });
      return [];
    },
    async submitAllCompetitors(exp): Promise<SubmittedJob[]> {
      calls.push({ kind: 'allCompetitors', exp });
      return [];
    },
  };
}
