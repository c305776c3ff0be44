/**
 * Tests for the trial runner
 */

import * as fs from 'fs';
import * as path from 'path';
import { NO_MEASUREMENT_EXIT_STATUS, TrialRunner, TrialRunnerOptions, renderPrepareStep } from '../src/trials/runner';
import { SIGNALLED_EXIT_CODE } from '../src/trials/timing-engine';
import { CacheStagingError } from '../src/errors';
import { PrepareStep, StagedInput } from '../src/cache/controller';
import { ToolRegistry } from '../src/tools/registry';
import { ToolAdapter } from '../src/tools/adapter';
import { createScenario } from '../src/matrix/builder';
import { TestScenario } from '../src/types';
import { sha256 } from '../src/utils/hash';
import { ScriptedEngine, ShellEngine, makeTempDir, writeExecutable } from './fixtures';

function stagedInput(scenario: TestScenario, file: string, prepareEachRun: PrepareStep[] = []): StagedInput & { toolCalls: () => number } {
  let calls = 0;
  return {
    scenario,
    path: file,
    status: {
      scenario,
      method: 'ram-copy',
      outcome: { kind: 'achieved', method: 'ram-copy' },
      timestamp: new Date('2024-01-31T09:45:12Z'),
      originalFile: file,
      stagedFile: file,
    },
    prepareEachRun,
    beforeTool: async () => {
      calls++;
    },
    release: async () => {},
    toolCalls: () => calls,
  };
}

function registryOf(...ids: string[]): ToolRegistry {
  return new ToolRegistry(ids.map(id => new ToolAdapter({ id, path: `/tools/${id}.sh` })));
}

describe('Trial Runner', () => {
  let workDir: string;
  let outputsDir: string;
  let engine: ScriptedEngine;

  const options = (overrides: Partial<TrialRunnerOptions> = {}): TrialRunnerOptions => ({
    engine,
    warmup: 1,
    minRuns: 2,
    coldRuns: 3,
    scratchDirs: ['ref', 'tmp'],
    workDir,
    ...overrides,
  });

  beforeEach(() => {
    workDir = makeTempDir('trials');
    outputsDir = path.join(workDir, 'results', '1m', 'hot_raw_outputs');
    fs.mkdirSync(outputsDir, { recursive: true });
    engine = new ScriptedEngine();
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  describe('runPlan', () => {
    it('should use warmup and minimum runs for hot scenarios', () => {
      const runner = new TrialRunner(registryOf('a'), options());
      expect(runner.runPlan(createScenario('1m', 'raw', 'hot'))).toEqual({
        warmup: 1,
        runs: { kind: 'min', runs: 2 },
      });
    });

    it('should use a fixed run count and no warmup otherwise', () => {
      const runner = new TrialRunner(registryOf('a'), options());
      const plan = { warmup: 0, runs: { kind: 'exact', runs: 3 } };
      expect(runner.runPlan(createScenario('1m', 'raw', 'cold'))).toEqual(plan);
      expect(runner.runPlan(createScenario('1m', 'raw', 'really-cold'))).toEqual(plan);
    });
  });

  describe('prepareCommand', () => {
    it('should clean scratch directories, then repeat the staging steps', () => {
      const runner = new TrialRunner(registryOf('a'), options());
      const staged = stagedInput(createScenario('1m', 'raw', 'cold'), '/data/1m.fastq', [
        { kind: 'evict', argv: ['vmtouch', '-e', '/data/1m.fastq'] },
      ]);

      expect(runner.prepareCommand(staged)).toBe('rm -rf ref tmp && vmtouch -e /data/1m.fastq >/dev/null');
    });

    it('should render copy steps with quoting', () => {
      expect(renderPrepareStep({ kind: 'copy', argv: ['cp', '/data/my file.fastq', '/tmp/x'] }))
        .toBe(`cp '/data/my file.fastq' /tmp/x >/dev/null`);
    });

    it('should be empty without scratch directories or steps', () => {
      const runner = new TrialRunner(registryOf('a'), options({ scratchDirs: [] }));
      expect(runner.prepareCommand(stagedInput(createScenario('1m', 'raw', 'hot'), '/x'))).toBe('');
    });
  });

  describe('runScenario', () => {
    it('should measure every tool in id order with the scenario plan', async () => {
      const runner = new TrialRunner(registryOf('zeta', 'alpha'), options());
      const staged = stagedInput(createScenario('1m', 'raw', 'cold'), '/ram/1m.fastq');

      await runner.runScenario(staged, outputsDir);

      expect(engine.requests.map(r => r.name)).toEqual(['alpha', 'zeta']);
      expect(engine.requests[0]).toMatchObject({
        command: `/tools/alpha.sh /ram/1m.fastq > ${path.join(outputsDir, 'alpha.txt')} 2>&1`,
        warmup: 0,
        runs: { kind: 'exact', runs: 3 },
        prepare: 'rm -rf ref tmp',
        conclude: 'rm -rf ref tmp',
        cwd: workDir,
      });
      expect(staged.toolCalls()).toBe(2);
    });

    it('should isolate a failing tool from the others', async () => {
      engine.exitCodes.set('b', [0, 3]);
      engine.failures.set('c', new Error('hyperfine failed: timed out after 1000ms'));
      const runner = new TrialRunner(registryOf('a', 'b', 'c', 'd'), options());

      const results = await runner.runScenario(stagedInput(createScenario('1m', 'raw', 'hot'), '/ram/1m.fastq'), outputsDir);

      expect(results.map(r => [r.toolId, r.exitStatus, r.error])).toEqual([
        ['a', 0, undefined],
        ['b', 3, 'Tool b exited with status 3'],
        ['c', -1, 'hyperfine failed: timed out after 1000ms'],
        ['d', 0, undefined],
      ]);
      expect(results[1].statistics?.samples).toBe(2);
      expect(results[2].statistics).toBeNull();
      expect(results[2].exitCodes).toEqual([]);
    });

    it('should keep a run with no measurement apart from a signalled run', async () => {
      engine.exitCodes.set('a', [0, SIGNALLED_EXIT_CODE]);
      engine.failures.set('b', new Error('hyperfine failed: no JSON export written'));
      const runner = new TrialRunner(registryOf('a', 'b'), options());

      const results = await runner.runScenario(stagedInput(createScenario('1m', 'raw', 'hot'), '/ram/1m.fastq'), outputsDir);

      expect(results.map(r => r.exitStatus)).toEqual([SIGNALLED_EXIT_CODE, NO_MEASUREMENT_EXIT_STATUS]);
      expect(SIGNALLED_EXIT_CODE).not.toBe(NO_MEASUREMENT_EXIT_STATUS);
    });

    it('should end the scenario when re-staging between tools fails', async () => {
      fs.mkdirSync(path.join(workDir, 'tmp'));
      const staged = stagedInput(createScenario('1m', 'raw', 'really-cold'), '/ram/1m.fastq');
      let calls = 0;
      staged.beforeTool = async () => {
        calls++;
        if (calls === 2) {
          throw new CacheStagingError('1m/really-cold_raw', 'regeneration failed: disk full');
        }
      };
      const runner = new TrialRunner(registryOf('a', 'b', 'c'), options());

      await expect(runner.runScenario(staged, outputsDir))
        .rejects.toThrow('Cannot stage input for 1m/really-cold_raw: regeneration failed: disk full');
      expect(engine.requests.map(r => r.name)).toEqual(['a']);
      expect(fs.existsSync(path.join(workDir, 'tmp'))).toBe(false);
    });

    it('should remove scratch directories left in the working directory', async () => {
      fs.mkdirSync(path.join(workDir, 'ref', 'genome'), { recursive: true });
      fs.mkdirSync(path.join(workDir, 'tmp'));
      const runner = new TrialRunner(registryOf('a'), options());

      await runner.runScenario(stagedInput(createScenario('1m', 'raw', 'hot'), '/ram/1m.fastq'), outputsDir);

      expect(fs.existsSync(path.join(workDir, 'ref'))).toBe(false);
      expect(fs.existsSync(path.join(workDir, 'tmp'))).toBe(false);
    });

    it('should capture the last run output and its digest', async () => {
      const shell = new ShellEngine();
      const toolsDir = path.join(workDir, 'tools');
      const counter = writeExecutable(toolsDir, 'counter.sh', 'echo "lines=$(grep -c \'\' "$1")"');
      const broken = writeExecutable(toolsDir, 'broken.sh', 'echo "cannot parse" >&2\nexit 5');
      const registry = new ToolRegistry([
        new ToolAdapter({ id: 'counter', path: counter }),
        new ToolAdapter({ id: 'broken', path: broken }),
      ]);
      const input = path.join(workDir, 'in.fastq');
      fs.writeFileSync(input, '@r1\nACGT\n+\nIIII\n');

      const runner = new TrialRunner(registry, options({ engine: shell }));
      const results = await runner.runScenario(stagedInput(createScenario('1m', 'raw', 'hot'), input), outputsDir);

      const [brokenResult, counterResult] = results;
      expect(counterResult.exitCodes).toEqual([0, 0]);
      expect(fs.readFileSync(path.join(outputsDir, 'counter.txt'), 'utf-8')).toBe('lines=4\n');
      expect(counterResult.outputDigest).toBe(sha256('lines=4\n'));

      expect(brokenResult.exitStatus).toBe(5);
      expect(brokenResult.exitCodes).toEqual([5, 5]);
      expect(fs.readFileSync(path.join(outputsDir, 'broken.txt'), 'utf-8')).toBe('cannot parse\n');
    });
  });
});
