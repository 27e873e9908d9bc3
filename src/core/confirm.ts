// ── Prompter capability ──────────────────────────────────────

export interface Prompter {
  ask(question: string): Promise<string>;
}

export const RETRY_QUESTION = 'Please type Y/y or N/n: ';

const YES = new Set(['Y', 'y']);
const NO = new Set(['N', 'n']);

/**
 * Ask until the answer is exactly one of Y/y/N/n.
 * There is no retry limit: the operator is expected to answer.
 */
export async function confirm(prompter: Prompter, question: string): Promise<boolean> {
  let answer = await prompter.ask(question);
  while (!YES.has(answer) && !NO.has(answer)) {
    answer = await prompter.ask(RETRY_QUESTION);
  }
  return YES.has(answer);
}

/**
 * Prompter replaying canned answers in order.
 * Throws once the answers run out so a test can never hang.
 */
export function createScriptedPrompter(
  answers: readonly string[],
): Prompter & { readonly questions: string[] } {
  const questions: string[] = [];
  let callIndex = 0;

  return {
    questions,
    async ask(question: string): Promise<string> {
      questions.push(question);
      const answer = answers[callIndex];
      callIndex++;
      if (answer === undefined) {
        throw new Error(`No scripted answer left for: ${question}`);
      }
      return answer;
    },
  };
}
