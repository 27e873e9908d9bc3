import { createInterface } from 'node:readline/promises';
import type { Readable, Writable } from 'node:stream';

import type { Prompter } from '../core/confirm.js';
import { PromptClosedError } from '../errors.js';

export interface TerminalPrompter extends Prompter {
  close(): void;
}

/**
 * Prompter reading answers line by line from a terminal or a pipe.
 * Lines typed ahead of a question are buffered, not dropped.
 * Rejects with PromptClosedError when input ends before an answer.
 */
export function createTerminalPrompter(
  input: Readable = process.stdin,
  output: Writable = process.stdout,
): TerminalPrompter {
  const rl = createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(question: string): Promise<string> {
      output.write(question);
      const next = await lines.next();
      if (next.done === true) {
        throw new PromptClosedError();
      }
      return next.value;
    },
    close() {
      rl.close();
    },
  };
}
