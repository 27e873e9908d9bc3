import { EXIT_CODES } from './config/defaults.js';
import type { ValidationWarning } from './core/validate.js';

// ── Fatal errors ─────────────────────────────────────────────
// Each carries the process exit code the CLI reports for it.

export class MissingInputError extends Error {
  readonly exitCode = EXIT_CODES.MISSING_INPUT;

  constructor(
    readonly fileName: string,
    /** Warnings found before the file was looked up. */
    readonly warnings: readonly ValidationWarning[] = [],
  ) {
    super(`file ${fileName} does not exist.`);
    this.name = 'MissingInputError';
  }
}

export class UsageError extends Error {
  readonly exitCode = EXIT_CODES.USAGE;

  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class ConfigError extends Error {
  readonly exitCode = EXIT_CODES.CONFIG;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class SubmissionError extends Error {
  readonly exitCode = EXIT_CODES.SUBMISSION;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SubmissionError';
  }
}

export class PromptClosedError extends Error {
  readonly exitCode = EXIT_CODES.SUBMISSION;

  constructor() {
    super('Input closed before a Y/N answer was given');
    this.name = 'PromptClosedError';
  }
}

export function exitCodeOf(err: unknown): number {
  if (
    err instanceof MissingInputError ||
    err instanceof UsageError ||
    err instanceof ConfigError ||
    err instanceof SubmissionError ||
    err instanceof PromptClosedError
  ) {
    return err.exitCode;
  }
  return EXIT_CODES.SUBMISSION;
}
