import { submitArgsSchema } from '../schema/index.js';
import type { RawSubmitArgs, SubmitArgs } from '../schema/index.js';
import { UsageError } from '../errors.js';

// ── Legacy short flags ───────────────────────────────────────
// commander takes one-letter short flags only; `-ff` is spelled out here.

const LONG_FORMS: Readonly<Record<string, string>> = {
  '-ff': '--fileFormat',
};

/**
 * Rewrite multi-letter short flags to their long form.
 * Everything after a bare `--` is left alone.
 */
export function normalizeArgv(argv: readonly string[]): string[] {
  const out: string[] = [];
  let passthrough = false;

  for (const arg of argv) {
    if (passthrough) {
      out.push(arg);
      continue;
    }
    if (arg === '--') {
      passthrough = true;
      out.push(arg);
      continue;
    }

    const eqIndex = arg.indexOf('=');
    const flag = eqIndex === -1 ? arg : arg.slice(0, eqIndex);
    const long = LONG_FORMS[flag];
    out.push(long === undefined ? arg : long + arg.slice(flag.length));
  }

  return out;
}

// ── Typed arguments ──────────────────────────────────────────

export function parseSubmitArgs(raw: RawSubmitArgs): SubmitArgs {
  const result = submitArgsSchema.safeParse(raw);
  if (!result.success) {
    const message = result.error.issues
      .map((issue) =>
        issue.path[0] === 'numBlocks' && issue.path.length > 1
          ? `${issue.message} (got "${String(raw.numBlocks[Number(issue.path[1])])}")`
          : issue.message,
      )
      .join('; ');
    throw new UsageError(message);
  }
  return result.data;
}
