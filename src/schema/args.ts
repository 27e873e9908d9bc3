import { z } from 'zod';

// ── Integer parsing ─────────────────────────────────────────
// Numeric options arrive as strings; only plain integer literals pass.

const integerString = (option: string) =>
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, { message: `${option} expects an integer` })
    .transform(Number)
    .refine(Number.isSafeInteger, { message: `${option} is out of range` });

// ── Submit arguments ────────────────────────────────────────

export const submitArgsSchema = z.object({
  tools: z.array(z.string().min(1)).min(1, { message: '--tools needs at least one name' }),
  fileName: z.string().min(1, { message: '--fileName must not be empty' }),
  numBlocks: z
    .array(integerString('--numBlocks'))
    .min(1, { message: '--numBlocks needs at least one value' }),
  fileFormat: integerString('--fileFormat'),
  dimensions: integerString('--dimensions'),
});

export type RawSubmitArgs = z.input<typeof submitArgsSchema>;
export type SubmitArgs = z.output<typeof submitArgsSchema>;
