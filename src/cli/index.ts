/**
 * CLI module — thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export { registerSubmitCommand } from './run.js';
export { normalizeArgv, parseSubmitArgs } from './args.js';
export { createTerminalPrompter } from './prompt.js';
export type { TerminalPrompter } from './prompt.js';
