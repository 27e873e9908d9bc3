import type { ExperimentDescriptor, SubmitArgs } from '../schema/index.js';
import { EXIT_CODES } from '../config/defaults.js';
import { MissingInputError } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import type { Submitter } from '../submit/client.js';
import type { Prompter } from './confirm.js';
import type { DispatchResult } from './dispatch.js';
import { dispatchSubmissions } from './dispatch.js';
import type { ValidationEnv, ValidationWarning } from './validate.js';
import { describeWarning, validateInputs } from './validate.js';
import { buildExperiment, formatExperiment } from './experiment.js';

// ── Public types ─────────────────────────────────────────────

export interface SubmitDeps extends ValidationEnv {
  prompter: Prompter;
  submitter: Submitter;
  logger: Logger;
  /** Where the experiment summary goes, one line per call. */
  print: (line: string) => void;
  scriptName: string;
}

export interface SubmitResult {
  exitCode: number;
  warnings: ValidationWarning[];
  experiment?: ExperimentDescriptor | undefined;
  dispatch?: DispatchResult | undefined;
}

// ── Pipeline ─────────────────────────────────────────────────

/**
 * validate → build → print → confirm and submit → exit.
 * A missing input file ends the run before anything is built.
 */
export async function runSubmit(
  args: SubmitArgs,
  deps: SubmitDeps,
): Promise<SubmitResult> {
  const { logger } = deps;

  let warnings: ValidationWarning[];
  try {
    ({ warnings } = validateInputs(args, deps));
  } catch (err) {
    if (err instanceof MissingInputError) {
      for (const warning of err.warnings) {
        logger.warn(describeWarning(warning));
      }
      logger.error(`${err.message}\nAborting...`);
      return { exitCode: err.exitCode, warnings: [...err.warnings] };
    }
    throw err;
  }

  for (const warning of warnings) {
    logger.warn(describeWarning(warning));
  }

  const experiment = buildExperiment(args);
  for (const line of formatExperiment(experiment)) {
    deps.print(line);
  }

  const dispatch = await dispatchSubmissions(experiment, args.tools, deps);

  logger.info(`Exiting ${deps.scriptName} script`);
  return { exitCode: EXIT_CODES.SUCCESS, warnings, experiment, dispatch };
}
