/**
 * Submission backend.
 * Turns an experiment into batch job scripts and hands them to the scheduler.
 * Only module allowed to run scheduler commands.
 */

export * from './client.js';
export { planJobs, planAllCompetitorJobs, jobName, JobNameRegistry } from './jobs.js';
export { renderJobScript, shellQuote } from './script.js';
export { createBatchSubmitter, execCommand, parseJobId } from './batch.js';
export type { BatchSubmitterDeps } from './batch.js';
export { createMockSubmitter } from './mock.js';
export type { SubmitterCall } from './mock.js';
