#!/usr/bin/env node

/**
 * partsubmit CLI entry point.
 * Thin wrapper — all logic delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { normalizeArgv, registerSubmitCommand } from './index.js';

const program = new Command();

program
  .name('partsubmit')
  .description(
    'Submit graph-partitioning benchmark jobs to a batch scheduler for one file, several block counts and several tools.',
  )
  .version('0.1.0');

registerSubmitCommand(program);

await program.parseAsync(normalizeArgv(process.argv));
