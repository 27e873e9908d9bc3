import { execFile } from 'node:child_process';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { promisify } from 'node:util';

import type { ExperimentDescriptor, JobSpec, SubmittedJob } from '../schema/index.js';
import { experimentDescriptorSchema } from '../schema/index.js';
import { SubmissionError } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import type { CommandRunner, Submitter, SubmitSettings } from './client.js';
import { JobNameRegistry, planAllCompetitorJobs, planJobs } from './jobs.js';
import { renderJobScript } from './script.js';

// ── Default runner ───────────────────────────────────────────

const execFileAsync = promisify(execFile);

export const execCommand: CommandRunner = async (command, args) => {
  const { stdout, stderr } = await execFileAsync(command, [...args], { encoding: 'utf-8' });
  return { stdout, stderr };
};

// ── Output parsing ───────────────────────────────────────────

export function parseJobId(output: string): string | null {
  const match = /Submitted batch job (\d+)/.exec(output);
  return match?.[1] ?? null;
}

// ── Submitter ────────────────────────────────────────────────

export interface BatchSubmitterDeps {
  logger: Logger;
  runner?: CommandRunner | undefined;
}

export function createBatchSubmitter(
  settings: SubmitSettings,
  deps: BatchSubmitterDeps,
): Submitter {
  const runner = deps.runner ?? execCommand;
  const { logger } = deps;
  // Shared by every call so a repeated tool does not overwrite earlier scripts.
  const names = new JobNameRegistry();

  function checkDescriptor(exp: ExperimentDescriptor): void {
    const result = experimentDescriptorSchema.safeParse(exp);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new SubmissionError(`Refusing to submit invalid experiment: ${issues}`);
    }
  }

  async function submitJob(job: JobSpec): Promise<SubmittedJob> {
    await mkdir(path.dirname(job.scriptPath), { recursive: true });
    await writeFile(job.scriptPath, renderJobScript(job, settings), { encoding: 'utf-8', mode: 0o755 });

    if (settings.dryRun) {
      logger.written(job.name);
      return { ...job, jobId: null };
    }

    let stdout: string;
    try {
      ({ stdout } = await runner(settings.submitCommand, [job.scriptPath]));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new SubmissionError(
        `${settings.submitCommand} failed for job ${job.name}: ${message}`,
        { cause: err },
      );
    }

    const jobId = parseJobId(stdout);
    if (jobId === null) {
      logger.warn(`could not read a job id from ${settings.submitCommand} output for ${job.name}`);
    }
    logger.submitted(job.name, jobId);
    return { ...job, jobId };
  }

  async function submitAll(jobs: readonly JobSpec[]): Promise<SubmittedJob[]> {
    await mkdir(settings.outputDir, { recursive: true });
    const submitted: SubmittedJob[] = [];
    // Sequential: the scheduler sees jobs in k order.
    for (const job of jobs) {
      submitted.push(await submitJob(job));
    }
    return submitted;
  }

  return {
    async submitExperiment(exp, tool) {
      checkDescriptor(exp);
      return submitAll(planJobs(exp, tool, settings, names));
    },
    async submitAllCompetitors(exp) {
      checkDescriptor(exp);
      return submitAll(planAllCompetitorJobs(exp, settings, names));
    },
  };
}
