import type { SubmitArgs } from '../schema/index.js';
import { FORMAT_EXTENSIONS } from '../schema/index.js';
import { EXPERIMENT } from '../config/defaults.js';
import { MissingInputError } from '../errors.js';

// ── Public types ─────────────────────────────────────────────

export type ValidationWarning =
  | { kind: 'format-mismatch'; fileFormat: number; extension: string; expected: string }
  | { kind: 'block-count'; blockCount: number }
  | { kind: 'dimension'; dimensions: number }
  | { kind: 'file-format'; fileFormat: number };

export interface ValidationResult {
  warnings: ValidationWarning[];
}

export interface ValidationEnv {
  fileExists(fileName: string): boolean;
}

// ── Helpers ──────────────────────────────────────────────────

/** Text after the last dot, or the whole name when there is none. */
export function fileExtension(fileName: string): string {
  return fileName.split('.').at(-1) ?? fileName;
}

export function describeWarning(warning: ValidationWarning): string {
  switch (warning.kind) {
    case 'format-mismatch':
      return `file format ${String(warning.fileFormat)} expects a .${warning.expected} file but got .${warning.extension}; file format and file given probably do not agree.`;
    case 'block-count':
      return `k= ${String(warning.blockCount)} is not a multiple of ${String(EXPERIMENT.BLOCK_COUNT_MULTIPLE)}`;
    case 'dimension':
      return `wrong value for dimension: ${String(warning.dimensions)}`;
    case 'file-format':
      return `wrong value for fileFormat: ${String(warning.fileFormat)}`;
  }
}

// ── Validation ───────────────────────────────────────────────

/**
 * Heuristic checks on the submit arguments.
 * Everything is advisory except a missing input file, which throws.
 */
export function validateInputs(
  args: SubmitArgs,
  env: ValidationEnv,
): ValidationResult {
  const warnings: ValidationWarning[] = [];

  const extension = fileExtension(args.fileName);
  const expected = FORMAT_EXTENSIONS[args.fileFormat];
  if (expected !== undefined && extension !== expected) {
    warnings.push({
      kind: 'format-mismatch',
      fileFormat: args.fileFormat,
      extension,
      expected,
    });
  }

  if (!env.fileExists(args.fileName)) {
    throw new MissingInputError(args.fileName, warnings);
  }

  for (const k of args.numBlocks) {
    if (k % EXPERIMENT.BLOCK_COUNT_MULTIPLE !== 0) {
      warnings.push({ kind: 'block-count', blockCount: k });
    }
  }

  if (args.dimensions <= 0) {
    warnings.push({ kind: 'dimension', dimensions: args.dimensions });
  }

  if (args.fileFormat < 0) {
    warnings.push({ kind: 'file-format', fileFormat: args.fileFormat });
  }

  return { warnings };
}
