import { z } from 'zod';

// ── JobSpec ─────────────────────────────────────────────────

export const jobSpecSchema = z.object({
  name: z.string().min(1),
  tool: z.string().min(1),
  blockCount: z.number().int().positive(),
  nodes: z.number().int().positive(),
  tasks: z.number().int().positive(),
  command: z.array(z.string()).min(1),
  scriptPath: z.string().min(1),
});

export type JobSpec = z.infer<typeof jobSpecSchema>;

// ── SubmittedJob ────────────────────────────────────────────

export const submittedJobSchema = jobSpecSchema.extend({
  jobId: z.string().min(1).nullable(),
});

export type SubmittedJob = z.infer<typeof submittedJobSchema>;
