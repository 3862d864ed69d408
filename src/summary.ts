/**
 * Run results and the summary artifact.
 */

import { writeFile } from 'fs/promises';
import { join } from 'path';
import { ResourceError } from './framework/errors.js';
import type { Combination } from './framework/types.js';
import { percent } from './primitives/math.js';

// =============================================================================
// RESULTS
// =============================================================================

export interface GenerationSuccess {
  /** 1-based position in processing order */
  index: number;
  combination: Combination;
  success: true;
  fileName: string;
  outputPath: string;
  metadataPath: string;
  /** Size of the saved model, when output verification is on */
  outputBytes?: number;
  /** Non-fatal problems, e.g. a tolerated meshing failure */
  warnings: string[];
  durationMs: number;
}

export interface GenerationFailure {
  index: number;
  combination: Combination;
  success: false;
  error: { type: string; message: string };
  durationMs: number;
}

export type GenerationResult = GenerationSuccess | GenerationFailure;

// =============================================================================
// SUMMARY
// =============================================================================

export const SUMMARY_FILE = 'generation_summary.json';

export interface SummaryTotals {
  theoretical: number;
  planned: number;
  attempted: number;
  succeeded: number;
  failed: number;
  excludedByFilter: number;
  truncated: number;
  targetCount: number;
  underDelivered: boolean;
  /** The run stopped before every planned combination was attempted */
  interrupted: boolean;
}

export interface SummaryReport {
  generatedAt: string;
  seed: number;
  totals: SummaryTotals;
  /** succeeded / attempted, 0 when nothing was attempted */
  successRate: number;
  configuration: Record<string, unknown>;
  results: GenerationResult[];
}

export interface SummaryInput {
  seed: number;
  theoretical: number;
  planned: number;
  excludedByFilter: number;
  truncated: number;
  targetCount: number;
  underDelivered: boolean;
  interrupted: boolean;
  configuration: Record<string, unknown>;
  results: readonly GenerationResult[];
}

export function buildSummary(input: SummaryInput, generatedAt: Date = new Date()): SummaryReport {
  const succeeded = input.results.filter(r => r.success).length;
  const attempted = input.results.length;

  return {
    generatedAt: generatedAt.toISOString(),
    seed: input.seed,
    totals: {
      theoretical: input.theoretical,
      planned: input.planned,
      attempted,
      succeeded,
      failed: attempted - succeeded,
      excludedByFilter: input.excludedByFilter,
      truncated: input.truncated,
      targetCount: input.targetCount,
      underDelivered: input.underDelivered,
      interrupted: input.interrupted,
    },
    successRate: attempted > 0 ? succeeded / attempted : 0,
    configuration: input.configuration,
    results: [...input.results],
  };
}

/**
 * Persist the report as `generation_summary.json` in `directory`.
 */
export async function writeSummary(report: SummaryReport, directory: string): Promise<string> {
  const path = join(directory, SUMMARY_FILE);
  try {
    await writeFile(path, JSON.stringify(report, null, 2) + '\n', 'utf-8');
  } catch (err) {
    throw new ResourceError(`Cannot write summary ${path}: ${err instanceof Error ? err.message : String(err)}`, {
      path,
    });
  }
  return path;
}

/**
 * Human-readable lines for the end-of-run console report.
 */
export function formatSummary(report: SummaryReport): string[] {
  const t = report.totals;
  const lines = [
    `Theoretical combinations: ${t.theoretical}`,
    `Excluded by filter:       ${t.excludedByFilter}`,
    `Truncated to target:      ${t.truncated}`,
    `Planned (target ${t.targetCount}):    ${t.planned}`,
    `Attempted:                ${t.attempted}`,
    `Succeeded:                ${t.succeeded} (${percent(t.succeeded, t.attempted)})`,
    `Failed:                   ${t.failed}`,
  ];
  if (t.underDelivered) {
    lines.push(`Note: ${t.planned} planned is below the target of ${t.targetCount}`);
  }
  if (t.interrupted) {
    lines.push(`Note: run interrupted after ${t.attempted} of ${t.planned}`);
  }
  return lines;
}
