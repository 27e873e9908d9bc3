import { z } from 'zod';

import { EXPERIMENT, PARTITIONER, SCHEDULER } from '../config/defaults.js';

// ── Scheduler block ─────────────────────────────────────────

export const walltimeSchema = z
  .string()
  .regex(/^\d{1,3}:\d{2}:\d{2}$/, { message: 'walltime must look like HH:MM:SS' });

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  submitCommand: z.string().min(1).optional().default(SCHEDULER.SUBMIT_COMMAND),
  account: z.string().min(1).optional(),
  partition: z.string().min(1).optional(),
  walltime: walltimeSchema.optional().default(SCHEDULER.WALLTIME),
  coresPerNode: z.number().int().positive().optional().default(SCHEDULER.CORES_PER_NODE),
  jobDir: z.string().min(1).optional().default(SCHEDULER.JOB_DIR),
  outputDir: z.string().min(1).optional().default(SCHEDULER.OUTPUT_DIR),
  launcher: z.string().min(1).optional().default(SCHEDULER.LAUNCHER),
  repeatTimes: z.number().int().positive().optional().default(PARTITIONER.REPEAT_TIMES),
  initialPartition: z.number().int().nonnegative().optional().default(PARTITIONER.INITIAL_PARTITION),
  initialMigration: z.number().int().nonnegative().optional().default(PARTITIONER.INITIAL_MIGRATION),
  executables: z.record(z.string().min(1)).optional().default({}),
  competitorsExecutable: z.string().min(1).optional().default(PARTITIONER.COMPETITORS_EXECUTABLE),
  allCompetitorsExecutable: z
    .string()
    .min(1)
    .optional()
    .default(PARTITIONER.ALL_COMPETITORS_EXECUTABLE),
  competitorTools: z
    .array(z.string().min(1))
    .min(1)
    .optional()
    .default([...EXPERIMENT.COMPETITOR_TOOLS]),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
