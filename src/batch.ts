/**
 * Batch Orchestrator
 *
 * Plans the run (enumerate → filter/sample), then drives the Model Engine
 * through every planned combination strictly in sequence:
 *
 *   load template → set parameters → mesh → save → verify → metadata → close
 *
 * Each combination is isolated: any failure is recorded in its
 * GenerationResult and the loop moves on. Only ConfigError and ResourceError
 * end the run. A combination past its deadline is aborted and its outputs
 * removed before the next one starts. The session is closed exactly once per
 * successful load, the engine is always disconnected, and the summary is
 * flushed on every exit path that got past setup.
 */

import { mkdir, rm, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import type { BatchConfig } from './config.js';
import type { ModelEngine, ModelSession } from './engine/types.js';
import {
  CombinationError,
  ResourceError,
  SweepError,
  ToleranceError,
  describeError,
  isFatal,
} from './framework/errors.js';
import { createModuleLogger } from './framework/logger.js';
import { createRandom } from './framework/random.js';
import { withDeadline, withScope } from './framework/scope.js';
import type { Combination, RandomSource } from './framework/types.js';
import { percent } from './primitives/math.js';
import { countCombinations, generateCombinations } from './stages/combinations.js';
import { filteringStage } from './stages/filtering.js';
import type { FilterOutcome } from './stages/filtering.js';
import { meshStage } from './stages/mesh.js';
import type { MeshParams } from './stages/mesh.js';
import { namingStage } from './stages/naming.js';
import { buildSummary, writeSummary } from './summary.js';
import type { GenerationResult, GenerationSuccess, SummaryReport } from './summary.js';

const log = createModuleLogger('batch');

// =============================================================================
// PLAN
// =============================================================================

export interface BatchPlan {
  /** Size of the full Cartesian product */
  theoretical: number;

  /** Combinations to process, in processing order */
  combinations: Combination[];

  filter: FilterOutcome;
}

/**
 * Enumerate the parameter space and apply filtering and the target cap.
 * Pure apart from logging: the same config and random sequence give the
 * same plan.
 */
export function planBatch(config: BatchConfig, random: RandomSource): BatchPlan {
  const theoretical = countCombinations(config.parameters);
  const all = generateCombinations(config.parameters);
  log.info({ theoretical }, `Generated ${theoretical} theoretical combinations`);

  const filter = filteringStage.run({ combinations: all, random }, config.filtering);

  log.info(
    { matched: filter.matched, excluded: filter.excluded, truncated: filter.truncated },
    `Filtered to ${filter.combinations.length} combinations (target ${filter.targetCount})`
  );
  if (filter.underDelivered) {
    log.warn(
      { planned: filter.combinations.length, target: filter.targetCount },
      `Only ${filter.combinations.length} combinations remain, below the target of ${filter.targetCount}`
    );
  }

  return { theoretical, combinations: filter.combinations, filter };
}

// =============================================================================
// SINGLE COMBINATION
// =============================================================================

export interface BatchProgress {
  completed: number;
  total: number;
  succeeded: number;
  failed: number;
}

export interface RunOptions {
  /** Overrides batch_filtering.seed */
  seed?: number;

  /** Checked before each combination; abort stops the loop */
  signal?: AbortSignal;

  /** Aborts the combination in flight; it is recorded as failed */
  interrupt?: AbortSignal;

  onProgress?: (progress: BatchProgress) => void;
}

export interface BatchReport {
  summary: SummaryReport;
  summaryPath: string;
}

export interface RunContext {
  config: BatchConfig;
  engine: ModelEngine;

  /** Aborts the combination in flight */
  interrupt?: AbortSignal;
}

function expressionFor(value: number, unit: string | undefined): string {
  return unit ? `${value}[${unit}]` : String(value);
}

function stemOf(fileName: string, extension: string): string {
  return extension !== '' && fileName.endsWith(extension) ? fileName.slice(0, -extension.length) : fileName;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function applyParameters(
  ctx: RunContext,
  session: ModelSession,
  combination: Combination,
  index: number,
  signal: AbortSignal
): Promise<void> {
  const known = new Set(await session.parameterNames());

  for (const [name, value] of Object.entries(combination)) {
    signal.throwIfAborted();
    if (!known.has(name)) {
      log.warn({ index, param: name }, `Parameter ${name} not found in model, skipping`);
      continue;
    }
    const previous = await session.getParameter(name);
    const expression = expressionFor(value, ctx.config.parameterUnits[name]);
    await session.setParameter(name, expression);
    log.debug({ index, param: name }, `Set ${name}: ${previous || '(unset)'} -> ${expression}`);
  }
}

async function applyMesh(
  ctx: RunContext,
  session: ModelSession,
  mesh: MeshParams,
  index: number,
  warnings: string[],
  signal: AbortSignal
): Promise<void> {
  try {
    await session.runMesh(mesh, signal);
  } catch (err) {
    if (signal.aborted) throw err;
    if (ctx.config.execution.errorTolerance === 'continue') {
      const tolerated = new ToleranceError(`Meshing failed, continuing: ${messageOf(err)}`, { index });
      log.warn({ index, error: err }, tolerated.message);
      warnings.push(tolerated.message);
      return;
    }
    throw new CombinationError(`Meshing failed: ${messageOf(err)}`, { index });
  }

  if (session.meshStatistics) {
    try {
      const stats = await session.meshStatistics();
      log.debug({ index, ...stats }, 'Mesh statistics');
    } catch (err) {
      log.warn({ index, error: err }, 'Mesh statistics unavailable');
    }
  }
}

async function discardOutputs(paths: readonly string[], index: number): Promise<void> {
  for (const path of paths) {
    try {
      await rm(path, { force: true });
    } catch (err) {
      log.warn({ index, path, error: err }, `Could not remove ${path} of an aborted combination`);
    }
  }
}

async function generateModel(
  ctx: RunContext,
  session: ModelSession,
  combination: Combination,
  index: number,
  started: number,
  signal: AbortSignal
): Promise<GenerationSuccess> {
  const { config } = ctx;
  const warnings: string[] = [];

  // A session loaded after the deadline is released without being used
  signal.throwIfAborted();
  await applyParameters(ctx, session, combination, index, signal);

  signal.throwIfAborted();
  const mesh = meshStage.run(combination, config.mesh);
  await applyMesh(ctx, session, mesh, index, warnings, signal);

  signal.throwIfAborted();
  const fileName = namingStage.run(combination, config.naming);
  const outputPath = join(config.outputDirectory, fileName);
  const metadataPath = join(config.outputDirectory, `${stemOf(fileName, config.naming.extension)}_metadata.json`);

  let outputBytes: number | undefined;
  try {
    await session.save(outputPath, signal);
    signal.throwIfAborted();

    if (config.verifyOutput) {
      try {
        outputBytes = (await stat(outputPath)).size;
      } catch (err) {
        throw new CombinationError(`Output file was not created: ${outputPath}`, { index, cause: messageOf(err) });
      }
    }

    const metadata = {
      index,
      modelParameters: combination,
      parameterUnits: config.parameterUnits,
      meshParameters: mesh,
      generatedAt: new Date().toISOString(),
      templateSource: config.templateModel,
      engine: ctx.engine.name,
      outputBytes,
    };
    signal.throwIfAborted();
    await writeFile(metadataPath, JSON.stringify(metadata, null, 2) + '\n', { encoding: 'utf-8', signal });
  } catch (err) {
    // An aborted combination leaves no files behind
    if (signal.aborted) await discardOutputs([outputPath, metadataPath], index);
    throw err;
  }

  return {
    index,
    combination,
    success: true,
    fileName,
    outputPath,
    metadataPath,
    outputBytes,
    warnings,
    durationMs: Date.now() - started,
  };
}

/**
 * Process one combination. Never throws for a combination-level failure;
 * ConfigError and ResourceError propagate.
 */
export async function processCombination(
  ctx: RunContext,
  combination: Combination,
  index: number,
  total: number
): Promise<GenerationResult> {
  const started = Date.now();
  const budget = ctx.config.execution.timeoutMs;
  const label = `Combination ${index}`;

  log.info({ index, total, combination }, `Processing combination ${index}/${total}`);

  try {
    const result = await withDeadline(
      signal =>
        withScope(
          {
            acquire: () => ctx.engine.load(ctx.config.templateModel, signal),
            release: session => session.close(),
            onReleaseError: err => log.warn({ index, error: err }, 'Failed to close model session'),
          },
          session => generateModel(ctx, session, combination, index, started, signal)
        ),
      {
        timeoutMs: budget,
        label,
        signal: ctx.interrupt,
        onAbandoned: () =>
          log.warn({ index }, `${label} did not stop within ${budget} ms of being aborted; moving on`),
      }
    );
    log.info({ index, fileName: result.fileName }, `Saved ${result.fileName}`);
    return result;
  } catch (err) {
    if (isFatal(err)) throw err;

    const failure = err instanceof SweepError ? err : new CombinationError(messageOf(err), { index });
    log.error({ index, combination, error: failure }, `Combination ${index} failed: ${failure.message}`);
    return {
      index,
      combination,
      success: false,
      error: describeError(failure),
      durationMs: Date.now() - started,
    };
  }
}

// =============================================================================
// RUN
// =============================================================================

/**
 * Execute a full batch run and write `generation_summary.json`.
 */
export async function runBatch(config: BatchConfig, engine: ModelEngine, options: RunOptions = {}): Promise<BatchReport> {
  const random = createRandom(options.seed ?? config.seed);
  const plan = planBatch(config, random);
  const total = plan.combinations.length;

  try {
    await mkdir(config.outputDirectory, { recursive: true });
  } catch (err) {
    throw new ResourceError(`Cannot create output directory ${config.outputDirectory}: ${messageOf(err)}`, {
      path: config.outputDirectory,
    });
  }

  try {
    await engine.connect();
  } catch (err) {
    throw new ResourceError(`Cannot connect to ${engine.name} engine: ${messageOf(err)}`, { engine: engine.name });
  }
  log.info({ engine: engine.name, seed: random.seed }, `Connected to ${engine.name} engine`);

  const ctx: RunContext = { config, engine, interrupt: options.interrupt };
  const results: GenerationResult[] = [];
  let succeeded = 0;
  let lastReported = -1;

  const report = (): void => {
    const progress: BatchProgress = { completed: results.length, total, succeeded, failed: results.length - succeeded };
    lastReported = progress.completed;
    log.info(
      { ...progress },
      `Progress: ${progress.completed}/${total} (${percent(progress.completed, total)}), ${succeeded} succeeded`
    );
    options.onProgress?.(progress);
  };

  const flush = async (interrupted: boolean): Promise<BatchReport> => {
    const summary = buildSummary({
      seed: random.seed,
      theoretical: plan.theoretical,
      planned: total,
      excludedByFilter: plan.filter.excluded,
      truncated: plan.filter.truncated,
      targetCount: plan.filter.targetCount,
      underDelivered: plan.filter.underDelivered,
      interrupted,
      configuration: config.source,
      results,
    });
    const summaryPath = await writeSummary(summary, config.outputDirectory);
    return { summary, summaryPath };
  };

  try {
    let interrupted = false;

    for (const [i, combination] of plan.combinations.entries()) {
      if (options.signal?.aborted) {
        interrupted = true;
        log.warn({ completed: results.length, total }, 'Run aborted, stopping before the next combination');
        break;
      }

      let result: GenerationResult;
      try {
        result = await processCombination(ctx, combination, i + 1, total);
      } catch (err) {
        log.error({ index: i + 1, error: err }, 'Fatal error, stopping run');
        await flush(true).catch(flushErr =>
          log.error({ error: flushErr }, 'Summary for completed work could not be written')
        );
        throw err;
      }

      results.push(result);
      if (result.success) succeeded++;
      if (results.length % config.execution.progressInterval === 0) report();
    }

    if (results.length !== lastReported) report();

    const outcome = await flush(interrupted);
    log.info(
      { succeeded, failed: results.length - succeeded, summaryPath: outcome.summaryPath },
      `Batch complete: ${succeeded}/${results.length} succeeded`
    );
    return outcome;
  } finally {
    try {
      await engine.disconnect();
    } catch (err) {
      log.warn({ engine: engine.name, error: err }, 'Engine disconnect failed');
    }
  }
}
