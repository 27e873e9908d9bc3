/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated.
 */

export {
  EXPERIMENT,
  PARTITIONER,
  SCHEDULER,
  EXIT_CODES,
  DEFAULT_CONFIG_PATH,
} from './defaults.js';
export { loadConfigFile, applyEnvOverrides } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
