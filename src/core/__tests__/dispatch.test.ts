import { describe, expect, it } from 'vitest';

import { createMockSubmitter } from '../../submit/mock.js';
import { createBufferLogger } from '../../utils/logger.js';
import { createScriptedPrompter } from '../confirm.js';
import { ALL_COMPETITORS_QUESTION, dispatchSubmissions, toolQuestion } from '../dispatch.js';
import { buildExperiment } from '../experiment.js';

const exp = buildExperiment({ fileName: 'graph1.graph', numBlocks: [16, 32], fileFormat: 1, dimensions: 2 });

function setup(answers: readonly string[]) {
  return {
    prompter: createScriptedPrompter(answers),
    submitter: createMockSubmitter(),
    logger: createBufferLogger(),
  };
}

describe('dispatchSubmissions', () => {
  it('should submit only the confirmed tool', async () => {
    const deps = setup(['y', 'n']);

    const result = await dispatchSubmissions(exp, ['Geographer', 'parMetisGraph'], deps);

    expect(deps.submitter.calls).toEqual([{ kind: 'experiment', exp, tool: 'Geographer' }]);
    expect(result.submitted).toEqual(['Geographer']);
    expect(result.skipped).toEqual(['parMetisGraph']);
    expect(result.allCompetitors).toBe(false);
    expect(deps.prompter.questions).toEqual([
      toolQuestion('Geographer'),
      toolQuestion('parMetisGraph'),
    ]);
    expect(deps.logger.lines).toEqual(['ℹ️  Not submitting experiments...']);
  });

  it('should ask and submit in the order the tools were given', async () => {
    const deps = setup(['y', 'y', 'y']);

    await dispatchSubmissions(exp, ['zoltanRcb', 'Geographer', 'parMetisGeom'], deps);

    expect(deps.submitter.calls.map((c) => (c.kind === 'experiment' ? c.tool : c.kind))).toEqual([
      'zoltanRcb',
      'Geographer',
      'parMetisGeom',
    ]);
  });

  it('should not submit anything while the answer stays invalid', async () => {
    const deps = setup(['maybe', 'maybe', 'maybe']);

    await expect(dispatchSubmissions(exp, ['Geographer'], deps)).rejects.toThrow(
      'No scripted answer left',
    );
    expect(deps.submitter.calls).toEqual([]);
  });

  it('should submit once the invalid answers are followed by a valid one', async () => {
    const deps = setup(['maybe', 'Y']);

    const result = await dispatchSubmissions(exp, ['Geographer'], deps);

    expect(result.submitted).toEqual(['Geographer']);
    expect(deps.submitter.calls).toHaveLength(1);
  });

  it('should take the all-competitors path when confirmed', async () => {
    const deps = setup(['y']);

    const result = await dispatchSubmissions(exp, ['all'], deps);

    expect(deps.submitter.calls).toEqual([{ kind: 'allCompetitors', exp }]);
    expect(result).toEqual({
      allCompetitors: true,
      submitted: ['allCompetitors'],
      skipped: [],
      jobs: [],
    });
    expect(deps.prompter.questions).toEqual([ALL_COMPETITORS_QUESTION]);
  });

  it('should not call the all-competitors path when declined', async () => {
    const deps = setup(['n']);

    const result = await dispatchSubmissions(exp, ['all'], deps);

    expect(deps.submitter.calls).toEqual([]);
    expect(result.skipped).toEqual(['allCompetitors']);
    expect(deps.logger.lines).toEqual([
      '⚠️  WARNING: Will call the all-competitors executable that runs the experiment with all tools!!',
      'ℹ️  Not submitting experiments, aborting...',
    ]);
  });

  it('should ignore tools listed after the all sentinel', async () => {
    const deps = setup(['y']);

    await dispatchSubmissions(exp, ['all', 'Geographer'], deps);

    expect(deps.submitter.calls).toEqual([{ kind: 'allCompetitors', exp }]);
    expect(deps.logger.lines[1]).toBe('   Ignoring the other tools given: Geographer');
  });

  it('should treat all as a plain tool name when it is not first', async () => {
    const deps = setup(['n', 'y']);

    await dispatchSubmissions(exp, ['Geographer', 'all'], deps);

    expect(deps.submitter.calls).toEqual([{ kind: 'experiment', exp, tool: 'all' }]);
  });
});
