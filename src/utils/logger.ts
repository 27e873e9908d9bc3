/**
 * Live execution logger for partsubmit.
 *
 * Status output goes to stderr so stdout carries only the experiment summary
 * and the confirmation prompts. Emoji prefixes give instant visual context in
 * the terminal.
 */

// ── Public types ─────────────────────────────────────────────

export interface Logger {
  info(message: string): void;
  detail(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  submitted(name: string, jobId: string | null): void;
  written(name: string): void;
}

export type LineSink = (line: string) => void;

// ── Factory ──────────────────────────────────────────────────

export function createLogger(
  write: LineSink = (line) => process.stderr.write(line + '\n'),
): Logger {
  return {
    info(message) {
      write(`ℹ️  ${message}`);
    },
    detail(message) {
      write(`   ${message}`);
    },
    warn(message) {
      write(`⚠️  WARNING: ${message}`);
    },
    error(message) {
      write(`💥 ERROR: ${message}`);
    },
    submitted(name, jobId) {
      write(`🚀 ${name} submitted as job ${jobId ?? '(unknown id)'}`);
    },
    written(name) {
      write(`📝 ${name} written (not submitted)`);
    },
  };
}

/**
 * Logger that keeps every line in memory.
 * Used by tests and by callers that want to inspect output afterwards.
 */
export function createBufferLogger(): Logger & { readonly lines: string[] } {
  const lines: string[] = [];
  return Object.assign(createLogger((line) => lines.push(line)), { lines });
}
