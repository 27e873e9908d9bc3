import path from 'node:path';

import type { JobSpec } from '../schema/index.js';
import type { SubmitSettings } from './client.js';

// ── Shell quoting ────────────────────────────────────────────

const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

export function shellQuote(word: string): string {
  if (word.length > 0 && SAFE_WORD.test(word)) {
    return word;
  }
  return `'${word.replace(/'/g, `'\\''`)}'`;
}

// ── Batch script ─────────────────────────────────────────────

export function renderJobScript(job: JobSpec, settings: SubmitSettings): string {
  const lines = [
    '#!/bin/bash',
    `#SBATCH --job-name=${job.name}`,
    `#SBATCH --output=${path.join(settings.outputDir, `${job.name}.%j.out`)}`,
    `#SBATCH --nodes=${String(job.nodes)}`,
    `#SBATCH --ntasks=${String(job.tasks)}`,
    `#SBATCH --time=${settings.walltime}`,
  ];

  if (settings.account !== undefined) {
    lines.push(`#SBATCH --account=${settings.account}`);
  }
  if (settings.partition !== undefined) {
    lines.push(`#SBATCH --partition=${settings.partition}`);
  }

  lines.push('', job.command.map(shellQuote).join(' '), '');
  return lines.join('\n');
}
