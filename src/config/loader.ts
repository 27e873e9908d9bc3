import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { ConfigError } from '../errors.js';
import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';

// ── Public API ──────────────────────────────────────────────

export interface LoadConfigOptions {
  /** Treat a missing file as an empty config instead of an error. */
  allowMissing?: boolean | undefined;
}

/**
 * Load and validate a `.partsubmit.yaml` (or JSON) config file.
 * Throws a ConfigError if the file is unreadable or invalid.
 */
export async function loadConfigFile(
  configPath: string,
  options: LoadConfigOptions = {},
): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (options.allowMissing && isNotFound(err)) {
      return fileConfigSchema.parse({});
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config file ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot parse config file ${configPath}: ${message}`);
  }

  const result = fileConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${configPath}: ${issues}`);
  }
  return result.data;
}

// ── Env overrides ───────────────────────────────────────────

export function applyEnvOverrides(
  config: FileConfig,
  env: NodeJS.ProcessEnv = process.env,
): FileConfig {
  const account = env['PARTSUBMIT_ACCOUNT'];
  const partition = env['PARTSUBMIT_PARTITION'];
  const submitCommand = env['PARTSUBMIT_SUBMIT_COMMAND'];

  return {
    ...config,
    ...(account ? { account } : {}),
    ...(partition ? { partition } : {}),
    ...(submitCommand ? { submitCommand } : {}),
  };
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
