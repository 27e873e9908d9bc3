import { describe, expect, it } from 'vitest';

import { RETRY_QUESTION, confirm, createScriptedPrompter } from '../confirm.js';

describe('confirm', () => {
  it.each([
    { answer: 'y', expected: true },
    { answer: 'Y', expected: true },
    { answer: 'n', expected: false },
    { answer: 'N', expected: false },
  ])('should read $answer as $expected', async ({ answer, expected }) => {
    const prompter = createScriptedPrompter([answer]);
    expect(await confirm(prompter, 'Go?')).toBe(expected);
    expect(prompter.questions).toEqual(['Go?']);
  });

  it('should re-ask until a valid answer is given', async () => {
    const prompter = createScriptedPrompter(['maybe', 'yes', '', 'maybe', 'n']);
    expect(await confirm(prompter, 'Go?')).toBe(false);
    expect(prompter.questions).toEqual([
      'Go?',
      RETRY_QUESTION,
      RETRY_QUESTION,
      RETRY_QUESTION,
      RETRY_QUESTION,
    ]);
  });

  it('should keep asking while answers stay invalid', async () => {
    const prompter = createScriptedPrompter(['maybe', 'maybe', 'maybe']);
    await expect(confirm(prompter, 'Go?')).rejects.toThrow('No scripted answer left');
    expect(prompter.questions).toHaveLength(4);
  });
});
