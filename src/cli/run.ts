import { existsSync } from 'node:fs';
import path from 'node:path';

import type { Command } from 'commander';

import { applyEnvOverrides, DEFAULT_CONFIG_PATH, EXPERIMENT, loadConfigFile } from '../config/index.js';
import { runSubmit } from '../core/index.js';
import { exitCodeOf } from '../errors.js';
import { createBatchSubmitter } from '../submit/index.js';
import { createLogger } from '../utils/logger.js';
import { parseSubmitArgs } from './args.js';
import { createTerminalPrompter } from './prompt.js';

// ── Option shape ─────────────────────────────────────────────

interface SubmitOptions {
  tools: string[];
  fileName: string;
  numBlocks: string[];
  fileFormat: string;
  dimensions: string;
  config: string;
  dryRun?: true;
}

// ── Command registration ─────────────────────────────────────

export function registerSubmitCommand(program: Command): void {
  program
    .command('submit', { isDefault: true })
    .description(
      'Submit batch jobs for the selected tools for a single file and one or more values of k',
    )
    .option(
      '-t, --tools <names...>',
      'Name of the tools, e.g. Geographer, parMetisGraph, parMetisGeom, or "all" for every competitor',
      [EXPERIMENT.DEFAULT_TOOL],
    )
    .requiredOption('-f, --fileName <path>', 'The file/graph to be partitioned')
    .requiredOption('-k, --numBlocks <k...>', 'The number of blocks/parts to partition to')
    .requiredOption('--fileFormat <code>', 'The format of the file given (also -ff)')
    .requiredOption('-d, --dimensions <d>', 'The dimensions of the coordinates')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--dry-run', 'Write job scripts without submitting them')
    .action(async (opts: SubmitOptions, command: Command) => {
      const logger = createLogger();
      const prompter = createTerminalPrompter();

      try {
        // 1. Typed arguments
        const args = parseSubmitArgs({
          tools: opts.tools,
          fileName: opts.fileName,
          numBlocks: opts.numBlocks,
          fileFormat: opts.fileFormat,
          dimensions: opts.dimensions,
        });

        // 2. Config: file, then env, then flags
        const fileConfig = await loadConfigFile(opts.config, {
          allowMissing: command.getOptionValueSource('config') === 'default',
        });
        const settings = {
          ...applyEnvOverrides(fileConfig),
          dryRun: opts.dryRun ?? false,
        };

        // 3. Validate, build, confirm, submit
        const submitter = createBatchSubmitter(settings, { logger });
        const { exitCode } = await runSubmit(args, {
          fileExists: (fileName) => existsSync(fileName),
          prompter,
          submitter,
          logger,
          print: (line) => process.stdout.write(line + '\n'),
          scriptName: path.basename(process.argv[1] ?? command.name()),
        });

        process.exitCode = exitCode;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        process.stderr.write(`Error: ${message}\n`);
        process.exitCode = exitCodeOf(err);
      } finally {
        prompter.close();
      }
    });
}
