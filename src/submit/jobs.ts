import path from 'node:path';

import type { ExperimentDescriptor, JobSpec } from '../schema/index.js';
import { EXPERIMENT } from '../config/defaults.js';
import type { SubmitSettings } from './client.js';

// ── Naming ───────────────────────────────────────────────────

function safeName(text: string): string {
  return text.replace(/[^A-Za-z0-9_.-]/g, '_');
}

/** Graph name without its extension, safe for file and job names. */
function jobStem(graphName: string): string {
  const stem = graphName.includes('.')
    ? graphName.slice(0, graphName.lastIndexOf('.'))
    : graphName;
  return safeName(stem);
}

export function jobName(tool: string, graphName: string, blockCount: number): string {
  return `${safeName(tool)}_${jobStem(graphName)}_k${String(blockCount)}`;
}

/**
 * Job names already handed out. A repeated name gets `_2`, `_3`, ...
 * so no two jobs share a script or an output file.
 */
export class JobNameRegistry {
  private readonly taken = new Set<string>();

  claim(base: string): string {
    let name = base;
    for (let n = 2; this.taken.has(name); n++) {
      name = `${base}_${String(n)}`;
    }
    this.taken.add(name);
    return name;
  }
}

// ── Command lines ────────────────────────────────────────────

function commonArgs(
  exp: ExperimentDescriptor,
  k: number,
  index: number,
  settings: SubmitSettings,
): string[] {
  return [
    '--graphFile',
    exp.paths[index] ?? '',
    '--fileFormat',
    String(exp.fileFormatCode),
    '--dimensions',
    String(exp.dimension),
    '--numBlocks',
    String(k),
    '--repeatTimes',
    String(settings.repeatTimes),
  ];
}

function executableFor(tool: string, settings: SubmitSettings): string {
  const configured = settings.executables[tool];
  if (configured !== undefined) {
    return configured;
  }
  return tool === EXPERIMENT.DEFAULT_TOOL ? tool : settings.competitorsExecutable;
}

function toolArgs(tool: string, settings: SubmitSettings): string[] {
  if (tool === EXPERIMENT.DEFAULT_TOOL) {
    return [
      '--initialPartition',
      String(settings.initialPartition),
      '--initialMigration',
      String(settings.initialMigration),
      '--storeInfo',
    ];
  }
  return ['--tool', tool];
}

function planOne(
  exp: ExperimentDescriptor,
  k: number,
  index: number,
  tool: string,
  program: string,
  extraArgs: readonly string[],
  settings: SubmitSettings,
  names: JobNameRegistry,
): JobSpec {
  const name = names.claim(jobName(tool, exp.graphNames[index] ?? '', k));

  return {
    name,
    tool,
    blockCount: k,
    nodes: Math.ceil(k / settings.coresPerNode),
    tasks: k,
    command: [
      settings.launcher,
      '-n',
      String(k),
      program,
      ...commonArgs(exp, k, index, settings),
      ...extraArgs,
      '--outFile',
      path.join(settings.outputDir, `${name}.info`),
    ],
    scriptPath: path.join(settings.jobDir, `${name}.sh`),
  };
}

// ── Planning ─────────────────────────────────────────────────

/** One job per block count, in the order the counts were given. */
export function planJobs(
  exp: ExperimentDescriptor,
  tool: string,
  settings: SubmitSettings,
  names: JobNameRegistry = new JobNameRegistry(),
): JobSpec[] {
  const program = executableFor(tool, settings);
  const extra = toolArgs(tool, settings);
  return exp.blockCounts.map((k, i) =>
    planOne(exp, k, i, tool, program, extra, settings, names),
  );
}

export function planAllCompetitorJobs(
  exp: ExperimentDescriptor,
  settings: SubmitSettings,
  names: JobNameRegistry = new JobNameRegistry(),
): JobSpec[] {
  const extra = ['--tools', settings.competitorTools.join(',')];
  return exp.blockCounts.map((k, i) =>
    planOne(
      exp,
      k,
      i,
      EXPERIMENT.ALL_COMPETITORS_LABEL,
      settings.allCompetitorsExecutable,
      extra,
      settings,
      names,
    ),
  );
}
