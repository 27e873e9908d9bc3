import { describe, expect, it } from 'vitest';

import { buildExperiment } from '../../core/experiment.js';
import { fileConfigSchema } from '../../schema/index.js';
import type { SubmitSettings } from '../client.js';
import { JobNameRegistry, jobName, planAllCompetitorJobs, planJobs } from '../jobs.js';

const settings: SubmitSettings = { ...fileConfigSchema.parse({}), dryRun: false };

const exp = buildExperiment({ fileName: 'graph1.graph', numBlocks: [16, 40], fileFormat: 1, dimensions: 2 });

describe('jobName', () => {
  it('should drop the extension and replace unsafe characters', () => {
    expect(jobName('Geographer', 'my graph.v2.bgf', 64)).toBe('Geographer_my_graph.v2_k64');
  });

  it('should clean the tool name too', () => {
    expect(jobName('my tool/v2', 'g.graph', 16)).toBe('my_tool_v2_g_k16');
  });
});

describe('JobNameRegistry', () => {
  it('should suffix names it has already handed out', () => {
    const names = new JobNameRegistry();
    expect([names.claim('a'), names.claim('a'), names.claim('a'), names.claim('b')]).toEqual([
      'a',
      'a_2',
      'a_3',
      'b',
    ]);
  });
});

describe('planJobs', () => {
  it('should plan one Geographer job per block count', () => {
    const jobs = planJobs(exp, 'Geographer', settings);

    expect(jobs).toHaveLength(2);
    expect(jobs[0]).toEqual({
      name: 'Geographer_graph1_k16',
      tool: 'Geographer',
      blockCount: 16,
      nodes: 1,
      tasks: 16,
      command: [
        'mpiexec',
        '-n',
        '16',
        'Geographer',
        '--graphFile',
        'graph1.graph',
        '--fileFormat',
        '1',
        '--dimensions',
        '2',
        '--numBlocks',
        '16',
        '--repeatTimes',
        '5',
        '--initialPartition',
        '3',
        '--initialMigration',
        '0',
        '--storeInfo',
        '--outFile',
        'output/Geographer_graph1_k16.info',
      ],
      scriptPath: 'jobs/Geographer_graph1_k16.sh',
    });
  });

  it('should give a repeated block count its own script and output file', () => {
    const repeated = buildExperiment({ fileName: 'graph1.graph', numBlocks: [16, 16], fileFormat: 1, dimensions: 2 });

    const jobs = planJobs(repeated, 'Geographer', settings);

    expect(jobs.map((j) => j.scriptPath)).toEqual([
      'jobs/Geographer_graph1_k16.sh',
      'jobs/Geographer_graph1_k16_2.sh',
    ]);
    expect(jobs[1]?.command.at(-1)).toBe('output/Geographer_graph1_k16_2.info');
  });

  it('should round the node count up', () => {
    const jobs = planJobs(exp, 'Geographer', settings);
    expect(jobs[1]?.nodes).toBe(3);
    expect(jobs[1]?.tasks).toBe(40);
  });

  it('should run other tools through the competitors executable', () => {
    const [job] = planJobs(exp, 'parMetisGraph', settings);

    expect(job?.command.slice(0, 4)).toEqual(['mpiexec', '-n', '16', 'competitorsMain']);
    expect(job?.command.slice(-4)).toEqual([
      '--tool',
      'parMetisGraph',
      '--outFile',
      'output/parMetisGraph_graph1_k16.info',
    ]);
  });

  it('should prefer a configured executable', () => {
    const [job] = planJobs(exp, 'zoltanRcb', {
      ...settings,
      executables: { zoltanRcb: '/opt/zoltan/rcb' },
    });

    expect(job?.command[3]).toBe('/opt/zoltan/rcb');
  });
});

describe('planAllCompetitorJobs', () => {
  it('should pass every competitor tool to the all-competitors executable', () => {
    const jobs = planAllCompetitorJobs(exp, { ...settings, competitorTools: ['parMetisGeom', 'zoltanMJ'] });

    expect(jobs.map((j) => j.name)).toEqual([
      'allCompetitors_graph1_k16',
      'allCompetitors_graph1_k40',
    ]);
    expect(jobs[0]?.command[3]).toBe('allCompetitorsMain');
    expect(jobs[0]?.command.slice(-4)).toEqual([
      '--tools',
      'parMetisGeom,zoltanMJ',
      '--outFile',
      'output/allCompetitors_graph1_k16.info',
    ]);
  });
});
