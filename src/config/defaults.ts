/**
 * Default configuration values.
 * Scheduler and partitioner values are overridable via config file.
 */

export const EXPERIMENT = {
  /** Experiment kind for "single file, explicit k-list" runs. */
  TYPE: 2,
  UNASSIGNED_ID: -1,
  DEFAULT_TOOL: 'Geographer',
  ALL_TOOLS_SENTINEL: 'all',
  ALL_COMPETITORS_LABEL: 'allCompetitors',
  BLOCK_COUNT_MULTIPLE: 16,
  COMPETITOR_TOOLS: [
    'parMetisGraph',
    'parMetisGeom',
    'parMetisSfc',
    'zoltanRcb',
    'zoltanRib',
    'zoltanMJ',
    'zoltanHsfc',
  ],
} as const;

export const PARTITIONER = {
  REPEAT_TIMES: 5,
  // k-means; the only initial partition this submission path supports
  INITIAL_PARTITION: 3,
  // space-filling curve
  INITIAL_MIGRATION: 0,
  COMPETITORS_EXECUTABLE: 'competitorsMain',
  ALL_COMPETITORS_EXECUTABLE: 'allCompetitorsMain',
} as const;

export const SCHEDULER = {
  SUBMIT_COMMAND: 'sbatch',
  CORES_PER_NODE: 16,
  WALLTIME: '00:30:00',
  JOB_DIR: 'jobs',
  OUTPUT_DIR: 'output',
  LAUNCHER: 'mpiexec',
} as const;

export const EXIT_CODES = {
  SUCCESS: 0,
  MISSING_INPUT: 1,
  USAGE: 2,
  CONFIG: 3,
  SUBMISSION: 4,
} as const;

export const DEFAULT_CONFIG_PATH = '.partsubmit.yaml';
