import type { ExperimentDescriptor, FileConfig, SubmittedJob } from '../schema/index.js';

// ── Submitter interface ──────────────────────────────────────

export interface Submitter {
  /** Submit one job per block count, running the experiment with one tool. */
  submitExperiment(exp: ExperimentDescriptor, tool: string): Promise<SubmittedJob[]>;
  /** Submit one job per block count, each running every competitor tool. */
  submitAllCompetitors(exp: ExperimentDescriptor): Promise<SubmittedJob[]>;
}

// ── Command runner ───────────────────────────────────────────

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>;

// ── Settings ─────────────────────────────────────────────────

export interface SubmitSettings extends FileConfig {
  /** Write job scripts without handing them to the scheduler. */
  dryRun: boolean;
}
