import type { ExperimentDescriptor, SubmittedJob } from '../schema/index.js';
import { EXPERIMENT } from '../config/defaults.js';
import type { Submitter } from '../submit/client.js';
import type { Logger } from '../utils/logger.js';
import type { Prompter } from './confirm.js';
import { confirm } from './confirm.js';

// ── Public types ─────────────────────────────────────────────

export interface DispatchDeps {
  prompter: Prompter;
  submitter: Submitter;
  logger: Logger;
}

export interface DispatchResult {
  allCompetitors: boolean;
  submitted: string[];
  skipped: string[];
  jobs: SubmittedJob[];
}

// ── Questions ────────────────────────────────────────────────

export const ALL_COMPETITORS_QUESTION = 'Continue? :';

export function toolQuestion(tool: string): string {
  return `Submit experiments with >>> ${tool} <<< Y/N:`;
}

// ── Dispatch ─────────────────────────────────────────────────

/**
 * Ask for confirmation and submit, either once through the all-competitors
 * path or tool by tool in the order given.
 * Only the first entry is checked for the `all` sentinel.
 */
export async function dispatchSubmissions(
  exp: ExperimentDescriptor,
  tools: readonly string[],
  deps: DispatchDeps,
): Promise<DispatchResult> {
  const { prompter, submitter, logger } = deps;

  if (tools[0] === EXPERIMENT.ALL_TOOLS_SENTINEL) {
    logger.warn('Will call the all-competitors executable that runs the experiment with all tools!!');
    const ignored = tools.slice(1);
    if (ignored.length > 0) {
      logger.detail(`Ignoring the other tools given: ${ignored.join(', ')}`);
    }

    const result: DispatchResult = {
      allCompetitors: true,
      submitted: [],
      skipped: [],
      jobs: [],
    };

    if (!(await confirm(prompter, ALL_COMPETITORS_QUESTION))) {
      logger.info('Not submitting experiments, aborting...');
      result.skipped.push(EXPERIMENT.ALL_COMPETITORS_LABEL);
      return result;
    }

    result.jobs.push(...(await submitter.submitAllCompetitors(exp)));
    result.submitted.push(EXPERIMENT.ALL_COMPETITORS_LABEL);
    return result;
  }

  const result: DispatchResult = {
    allCompetitors: false,
    submitted: [],
    skipped: [],
    jobs: [],
  };

  for (const tool of tools) {
    if (!(await confirm(prompter, toolQuestion(tool)))) {
      logger.info('Not submitting experiments...');
      result.skipped.push(tool);
      continue;
    }

    result.jobs.push(...(await submitter.submitExperiment(exp, tool)));
    result.submitted.push(tool);
  }

  return result;
}
