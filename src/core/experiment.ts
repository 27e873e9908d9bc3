import path from 'node:path';

import type { ExperimentDescriptor, SubmitArgs } from '../schema/index.js';
import { formatName } from '../schema/index.js';
import { EXPERIMENT } from '../config/defaults.js';

// ── Builder ──────────────────────────────────────────────────

/**
 * Build the descriptor for one input file and its k values.
 * Does not re-validate: advisory warnings have already been reported, and
 * the submitter checks the invariants at its own boundary.
 */
export function buildExperiment(
  args: Pick<SubmitArgs, 'fileName' | 'numBlocks' | 'fileFormat' | 'dimensions'>,
): ExperimentDescriptor {
  const size = args.numBlocks.length;
  const graphName = path.basename(args.fileName);

  return Object.freeze({
    experimentType: EXPERIMENT.TYPE,
    dimension: args.dimensions,
    fileFormatCode: args.fileFormat,
    identifier: EXPERIMENT.UNASSIGNED_ID,
    blockCounts: [...args.numBlocks],
    size,
    paths: Array.from({ length: size }, () => args.fileName),
    graphNames: Array.from({ length: size }, () => graphName),
  });
}

// ── Summary ──────────────────────────────────────────────────

export function formatExperiment(exp: ExperimentDescriptor): string[] {
  const format = formatName(exp.fileFormatCode);
  const lines = [
    `Experiment type: ${String(exp.experimentType)}, ID: ${String(exp.identifier)}`,
    `Dimension: ${String(exp.dimension)}`,
    `File format: ${String(exp.fileFormatCode)}${format !== undefined ? ` (${format})` : ''}`,
    `Number of runs: ${String(exp.size)}`,
  ];

  exp.blockCounts.forEach((k, i) => {
    lines.push(`  k= ${String(k)}\t${exp.graphNames[i] ?? ''}\t${exp.paths[i] ?? ''}`);
  });

  return lines;
}
