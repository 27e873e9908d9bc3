/**
 * Core orchestration module.
 * Coordinates validate → build → confirm → submit.
 * No CLI parsing, no terminal or scheduler IO of its own: everything is injected.
 */

export { validateInputs, describeWarning, fileExtension } from './validate.js';
export type { ValidationWarning, ValidationResult, ValidationEnv } from './validate.js';
export { buildExperiment, formatExperiment } from './experiment.js';
export { confirm, createScriptedPrompter, RETRY_QUESTION } from './confirm.js';
export type { Prompter } from './confirm.js';
export { dispatchSubmissions, toolQuestion, ALL_COMPETITORS_QUESTION } from './dispatch.js';
export type { DispatchDeps, DispatchResult } from './dispatch.js';
export { runSubmit } from './submit.js';
export type { SubmitDeps, SubmitResult } from './submit.js';
