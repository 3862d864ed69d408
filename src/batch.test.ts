import { readFile, readdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { planBatch, runBatch } from './batch.js';
import type { BatchProgress } from './batch.js';
import { ConfigError, ResourceError } from './framework/errors.js';
import { createRandom } from './framework/random.js';
import { meshDefaults } from './stages/mesh.js';
import { SUMMARY_FILE } from './summary.js';
import type { GenerationResult } from './summary.js';
import { FakeEngine, captureLogs, makeTempDir, removeTempDir, testConfig } from './test-utils.js';
import type { FakeEngineOptions, LogCapture } from './test-utils.js';

const FIRST_MODEL = 'batch_model_K_ch_2.500_W_ch_3.000.mph';

function fakeEngine(options: Partial<FakeEngineOptions> = {}): FakeEngine {
  return new FakeEngine({ knownParameters: ['K_ch', 'W_ch'], ...options });
}

function failures(results: readonly GenerationResult[]): Array<{ index: number; type: string; message: string }> {
  return results.flatMap(r => (r.success ? [] : [{ index: r.index, ...r.error }]));
}

describe('runBatch', () => {
  let dir = '';
  let logs: LogCapture;

  beforeEach(async () => {
    dir = await makeTempDir();
    logs = captureLogs();
  });

  afterEach(async () => {
    logs.stop();
    await removeTempDir(dir);
  });

  describe('successful run', () => {
    it('generates every planned model in enumeration order', async () => {
      const engine = fakeEngine();
      const { summary, summaryPath } = await runBatch(testConfig(dir), engine);

      expect(summary.results.map(r => (r.success ? r.fileName : r.error.message))).toEqual([
        'batch_model_K_ch_2.500_W_ch_3.000.mph',
        'batch_model_K_ch_2.500_W_ch_4.000.mph',
        'batch_model_K_ch_3.000_W_ch_3.000.mph',
        'batch_model_K_ch_3.000_W_ch_4.000.mph',
      ]);
      expect(summary.results.map(r => r.index)).toEqual([1, 2, 3, 4]);
      expect(summary.totals).toEqual({
        theoretical: 4,
        planned: 4,
        attempted: 4,
        succeeded: 4,
        failed: 0,
        excludedByFilter: 0,
        truncated: 0,
        targetCount: 100,
        underDelivered: true,
        interrupted: false,
      });
      expect(summary.successRate).toBe(1);
      expect(summary.seed).toBe(7);
      expect(summaryPath).toBe(join(dir, SUMMARY_FILE));
    });

    it('sets parameters with units and connects once', async () => {
      const engine = fakeEngine();
      await runBatch(testConfig(dir), engine);

      expect(engine.assignments.filter(a => a.load === 1)).toEqual([
        { load: 1, name: 'K_ch', expression: '2.5[mm]' },
        { load: 1, name: 'W_ch', expression: '3[mm]' },
      ]);
      expect(engine.connects).toBe(1);
      expect(engine.disconnects).toBe(1);
      expect(engine.loads).toBe(4);
      expect(engine.closes).toBe(4);
    });

    it('sets bare values when no unit is configured', async () => {
      const engine = fakeEngine();
      const config = { ...testConfig(dir), parameterUnits: {} };
      await runBatch(config, engine);
      expect(engine.assignments[0]).toEqual({ load: 1, name: 'K_ch', expression: '2.5' });
    });

    it('writes model, metadata and summary files', async () => {
      await runBatch(testConfig(dir), fakeEngine());

      const files = (await readdir(dir)).sort();
      expect(files).toContain(FIRST_MODEL);
      expect(files).toContain('batch_model_K_ch_2.500_W_ch_3.000_metadata.json');
      expect(files).toContain(SUMMARY_FILE);
      expect(files.filter(f => f.endsWith('.mph'))).toHaveLength(4);

      const metadata = JSON.parse(await readFile(join(dir, 'batch_model_K_ch_2.500_W_ch_3.000_metadata.json'), 'utf-8'));
      expect(metadata.index).toBe(1);
      expect(metadata.modelParameters).toEqual({ K_ch: 2.5, W_ch: 3.0 });
      expect(metadata.templateSource).toBe('template.mph');
      expect(metadata.engine).toBe('fake');
      expect(metadata.meshParameters.interiorMeshSize).toBe(0.5);
      expect(metadata.meshParameters.axes.stream_depth).toEqual({ dimension: 3, rawCells: 6, cells: 6, meshSize: 0.5 });

      const persisted = JSON.parse(await readFile(join(dir, SUMMARY_FILE), 'utf-8'));
      expect(persisted.totals.succeeded).toBe(4);
      expect(persisted.configuration.template_model).toBe('template.mph');
    });

    it('records the saved file size when verifying output', async () => {
      const { summary } = await runBatch(testConfig(dir), fakeEngine());
      const [first] = summary.results;
      // "fake model 1\n"
      expect(first.success && first.outputBytes).toBe(13);
    });

    it('reports progress every interval', async () => {
      const progress: BatchProgress[] = [];
      await runBatch(testConfig(dir), fakeEngine(), { onProgress: p => progress.push(p) });
      expect(progress).toEqual([
        { completed: 2, total: 4, succeeded: 2, failed: 0 },
        { completed: 4, total: 4, succeeded: 4, failed: 0 },
      ]);
    });

    it('reports completion when the total is not a multiple of the interval', async () => {
      const progress: BatchProgress[] = [];
      const config = testConfig(dir, { execution_settings: { progress_interval: 3 } });
      await runBatch(config, fakeEngine(), { onProgress: p => progress.push(p) });
      expect(progress.map(p => p.completed)).toEqual([3, 4]);
    });

    it('skips parameters the model does not declare', async () => {
      const engine = new FakeEngine({ knownParameters: ['K_ch'] });
      const { summary } = await runBatch(testConfig(dir), engine);
      expect(summary.totals.succeeded).toBe(4);
      expect(engine.assignments.every(a => a.name === 'K_ch')).toBe(true);
      expect(logs.messages('warn').filter(m => m === 'Parameter W_ch not found in model, skipping')).toHaveLength(4);
    });
  });

  describe('failure isolation', () => {
    it('records a failing combination and continues', async () => {
      const engine = fakeEngine({ failOn: { setParameter: [2] } });
      const { summary } = await runBatch(testConfig(dir), engine);

      expect(failures(summary.results)).toEqual([
        { index: 2, type: 'CombinationError', message: 'fake setParameter failure on load 2' },
      ]);
      expect(summary.totals).toMatchObject({ attempted: 4, succeeded: 3, failed: 1 });
      expect(summary.successRate).toBe(0.75);
      expect(engine.closes).toBe(engine.loads);
    });

    it('closes nothing when the template fails to load', async () => {
      const engine = fakeEngine({ failOn: { load: [3] } });
      const { summary } = await runBatch(testConfig(dir), engine);

      expect(failures(summary.results).map(f => f.index)).toEqual([3]);
      expect(engine.loads).toBe(4);
      expect(engine.closes).toBe(3);
    });

    it('fails the combination on a meshing error under abort', async () => {
      const engine = fakeEngine({ failOn: { runMesh: [1] } });
      const { summary } = await runBatch(testConfig(dir), engine);

      expect(failures(summary.results)).toEqual([
        { index: 1, type: 'CombinationError', message: 'Meshing failed: fake runMesh failure on load 1' },
      ]);
      expect(engine.saved).toHaveLength(3);
    });

    it('saves with a warning on a meshing error under continue', async () => {
      const engine = fakeEngine({ failOn: { runMesh: [1] } });
      const config = testConfig(dir, { execution_settings: { error_tolerance: 'continue' } });
      const { summary } = await runBatch(config, engine);

      const [first] = summary.results;
      expect(first.success).toBe(true);
      expect(first.success && first.warnings).toEqual([
        'Meshing failed, continuing: fake runMesh failure on load 1',
      ]);
      expect(summary.totals.succeeded).toBe(4);
    });

    it('fails a combination whose output file is missing', async () => {
      const engine = fakeEngine({ skipWriteOn: [1] });
      const { summary } = await runBatch(testConfig(dir), engine);

      expect(failures(summary.results)).toEqual([
        { index: 1, type: 'CombinationError', message: `Output file was not created: ${join(dir, FIRST_MODEL)}` },
      ]);
    });

    it('trusts the engine when output verification is off', async () => {
      const engine = fakeEngine({ skipWriteOn: [1] });
      const config = testConfig(dir, { post_processing: { verify_output: false } });
      const { summary } = await runBatch(config, engine);

      const [first] = summary.results;
      expect(first.success).toBe(true);
      expect(first.success && first.outputBytes).toBeUndefined();
    });

    it('keeps the outcome when closing the session fails', async () => {
      const engine = fakeEngine({ failOn: { close: [1] } });
      const { summary } = await runBatch(testConfig(dir), engine);

      expect(summary.totals.succeeded).toBe(4);
      expect(engine.closes).toBe(4);
      expect(logs.messages('warn')).toContain('Failed to close model session');
    });

    it('times out a hanging save and still closes the session', async () => {
      const engine = fakeEngine({ hangOn: { operation: 'save', load: 2 } });
      const config = testConfig(dir, { execution_settings: { timeout_seconds: 0.2 } });
      const { summary } = await runBatch(config, engine);

      const failed = failures(summary.results);
      expect(failed).toHaveLength(1);
      expect(failed[0].index).toBe(2);
      expect(failed[0].type).toBe('TimeoutError');
      expect(failed[0].message).toBe('Combination 2 timed out after 200 ms');
      expect(engine.closes).toBe(4);
      expect(engine.saved).toHaveLength(3);
    });

    it('finishes an overrunning save before the next combination and removes its files', async () => {
      const engine = fakeEngine({ slowSaveOn: { load: 1, ms: 300 } });
      const config = testConfig(dir, { execution_settings: { timeout_seconds: 0.2 } });
      const { summary } = await runBatch(config, engine);

      expect(failures(summary.results)).toEqual([
        { index: 1, type: 'TimeoutError', message: 'Combination 1 timed out after 200 ms' },
      ]);
      expect(summary.totals).toMatchObject({ attempted: 4, succeeded: 3, failed: 1 });
      expect(engine.maxActiveSaves).toBe(1);
      expect(engine.closes).toBe(4);

      const files = await readdir(dir);
      expect(files).not.toContain(FIRST_MODEL);
      expect(files).not.toContain('batch_model_K_ch_2.500_W_ch_3.000_metadata.json');
      expect(files.filter(f => f.endsWith('.mph'))).toHaveLength(3);
      expect(files.filter(f => f.endsWith('_metadata.json'))).toHaveLength(3);
    });

    it('times out a hanging load', async () => {
      const engine = fakeEngine({ hangOn: { operation: 'load', load: 1 } });
      const config = testConfig(dir, { execution_settings: { timeout_seconds: 0.2 } });
      const { summary } = await runBatch(config, engine);

      expect(failures(summary.results)).toEqual([
        { index: 1, type: 'TimeoutError', message: 'Combination 1 timed out after 200 ms' },
      ]);
      expect(engine.closes).toBe(3);
    });
  });

  describe('fatal errors', () => {
    it('fails before processing when the engine cannot connect', async () => {
      const engine = fakeEngine({ connectError: new Error('license server unreachable') });
      await expect(runBatch(testConfig(dir), engine)).rejects.toThrow(ResourceError);
      expect(engine.loads).toBe(0);
      expect(engine.disconnects).toBe(0);
    });

    it('fails when the output directory cannot be created', async () => {
      const blocker = join(dir, 'occupied');
      await writeFile(blocker, 'not a directory', 'utf-8');
      const engine = fakeEngine();

      await expect(runBatch(testConfig(join(blocker, 'out')), engine)).rejects.toThrow(
        /^Cannot create output directory/
      );
      expect(engine.connects).toBe(0);
    });

    it('flushes the summary and disconnects on a configuration error mid-run', async () => {
      const engine = fakeEngine();
      const config = { ...testConfig(dir), mesh: { ...meshDefaults, axes: { depth: 'depth' } } };

      await expect(runBatch(config, engine)).rejects.toThrow(ConfigError);
      expect(engine.closes).toBe(1);
      expect(engine.disconnects).toBe(1);

      const persisted = JSON.parse(await readFile(join(dir, SUMMARY_FILE), 'utf-8'));
      expect(persisted.totals.attempted).toBe(0);
      expect(persisted.totals.interrupted).toBe(true);
    });
  });

  describe('cancellation', () => {
    it('writes an empty interrupted summary when aborted up front', async () => {
      const controller = new AbortController();
      controller.abort();
      const engine = fakeEngine();
      const progress: BatchProgress[] = [];

      const { summary } = await runBatch(testConfig(dir), engine, {
        signal: controller.signal,
        onProgress: p => progress.push(p),
      });

      expect(summary.results).toEqual([]);
      expect(summary.totals).toMatchObject({ planned: 4, attempted: 0, interrupted: true });
      expect(engine.loads).toBe(0);
      expect(engine.disconnects).toBe(1);
      expect(progress).toEqual([{ completed: 0, total: 4, succeeded: 0, failed: 0 }]);
    });

    it('abandons the combination in flight on interrupt and still flushes', async () => {
      const stop = new AbortController();
      const interrupt = new AbortController();
      const engine = fakeEngine({ hangOn: { operation: 'save', load: 2 } });

      const pending = runBatch(testConfig(dir), engine, { signal: stop.signal, interrupt: interrupt.signal });
      await vi.waitFor(() => expect(engine.loads).toBe(2));
      stop.abort();
      interrupt.abort(new Error('Interrupted by user'));
      const { summary } = await pending;

      expect(failures(summary.results)).toEqual([
        { index: 2, type: 'CombinationError', message: 'Interrupted by user' },
      ]);
      expect(summary.totals).toMatchObject({ attempted: 2, succeeded: 1, interrupted: true });
      expect(engine.closes).toBe(2);
      expect(engine.disconnects).toBe(1);

      const persisted = JSON.parse(await readFile(join(dir, SUMMARY_FILE), 'utf-8'));
      expect(persisted.totals.interrupted).toBe(true);
    });

    it('stops between combinations', async () => {
      const controller = new AbortController();
      const { summary } = await runBatch(testConfig(dir), fakeEngine(), {
        signal: controller.signal,
        onProgress: p => {
          if (p.completed === 2) controller.abort();
        },
      });

      expect(summary.totals).toMatchObject({ attempted: 2, succeeded: 2, interrupted: true });
    });
  });

  describe('sampling', () => {
    const filterSpace = {
      parameters: { K_ch: [2.0, 3.0], W_ch: [2.0, 3.0], W_rib: [8.0, 10.0] },
      batch_filtering: {
        exclude_condition: 'K_ch > 2.4 and W_ch > 2.4 and W_rib > 9',
        sample_rate: 1.0,
        target_count: 868,
      },
    };

    it('excludes the one matching combination and under-delivers', async () => {
      const engine = fakeEngine();
      const { summary } = await runBatch(testConfig(dir, filterSpace), engine);

      expect(summary.totals).toMatchObject({
        theoretical: 8,
        excludedByFilter: 1,
        planned: 7,
        succeeded: 7,
        targetCount: 868,
        underDelivered: true,
      });
      const names = summary.results.map(r => (r.success ? r.fileName : ''));
      expect(names).not.toContain('batch_model_K_ch_3.000_W_ch_3.000_W_rib_10.000.mph');
      expect(logs.messages('warn')).toContain('Parameter W_rib not found in model, skipping');
    });

    it('plans identically for identical seeds', () => {
      const config = testConfig(dir, { ...filterSpace, batch_filtering: { sample_rate: 0.5, target_count: 3 } });
      const first = planBatch(config, createRandom(5));
      const second = planBatch(config, createRandom(5));
      expect(first.combinations).toHaveLength(3);
      expect(second.combinations).toEqual(first.combinations);
    });

    it('takes the seed override for the run', async () => {
      const { summary } = await runBatch(testConfig(dir), fakeEngine(), { seed: 99 });
      expect(summary.seed).toBe(99);
    });

    it('encodes small and large values in scientific notation', async () => {
      const config = testConfig(dir, { parameters: { K_ch: [0.0034], W_ch: [2500000] } });
      const { summary } = await runBatch(config, fakeEngine());
      const [first] = summary.results;
      expect(first.success && first.fileName).toBe('batch_model_K_ch_3.400e-3_W_ch_2.500e6.mph');
    });
  });
});
