import { z } from 'zod';

// ── File formats ────────────────────────────────────────────
// Codes as read by the partitioner's --fileFormat option.

export const FILE_FORMATS = {
  AUTO: 0,
  METIS: 1,
  ADCIRC: 2,
  OCEAN: 3,
  MATRIXMARKET: 4,
  TEEC: 5,
  BINARY: 6,
  EDGELIST: 7,
  BINARYEDGELIST: 8,
  EDGELISTDIST: 9,
} as const;

export type FileFormatName = keyof typeof FILE_FORMATS;

/** File extension each format code expects, where it expects one. */
export const FORMAT_EXTENSIONS: Readonly<Record<number, string>> = {
  [FILE_FORMATS.METIS]: 'graph',
  [FILE_FORMATS.BINARY]: 'bgf',
};

const FORMAT_NAMES: readonly FileFormatName[] = [
  'AUTO',
  'METIS',
  'ADCIRC',
  'OCEAN',
  'MATRIXMARKET',
  'TEEC',
  'BINARY',
  'EDGELIST',
  'BINARYEDGELIST',
  'EDGELISTDIST',
];

export function formatName(code: number): FileFormatName | undefined {
  return FORMAT_NAMES.find((name) => FILE_FORMATS[name] === code);
}

// ── ExperimentDescriptor ────────────────────────────────────
// Shape only. Out-of-range values (dimension <= 0, negative format, k not a
// multiple of 16) are advisory and reported by input validation.

export const experimentDescriptorSchema = z
  .object({
    experimentType: z.number().int(),
    dimension: z.number().int(),
    fileFormatCode: z.number().int(),
    identifier: z.number().int(),
    blockCounts: z.array(z.number().int()).min(1),
    size: z.number().int().min(1),
    paths: z.array(z.string().min(1)),
    graphNames: z.array(z.string().min(1)),
  })
  .refine(
    (exp) =>
      exp.blockCounts.length === exp.size &&
      exp.paths.length === exp.size &&
      exp.graphNames.length === exp.size,
    { message: 'blockCounts, paths and graphNames must all have `size` entries' },
  );

export type ExperimentDescriptor = Readonly<z.infer<typeof experimentDescriptorSchema>>;
