/**
 * Stage interface - the core abstraction
 *
 * Each configurable pipeline stage is a self-contained unit with:
 * - Typed parameters (validated once, at config load)
 * - Defaults for every option it reads
 * - A pure run function (no side effects, no hidden state)
 */

import type { ParameterSpace, ValidationResult } from './types.js';

/**
 * Stage definition interface
 *
 * @template TParams - Stage's parameter type
 * @template TInput - What the stage consumes per call
 * @template TOutput - What the stage produces per call
 */
export interface Stage<TParams extends object, TInput, TOutput> {
  /** Unique stage identifier */
  readonly name: string;

  /** Human-readable description */
  readonly description: string;

  /** Default parameters */
  readonly defaults: TParams;

  /**
   * Validate parameters against the swept parameter space.
   * Called once, before any combination is processed.
   */
  validate(params: Partial<TParams>, space: ParameterSpace): ValidationResult;

  /**
   * Merge partial params with defaults
   */
  mergeParams(partial: Partial<TParams>): TParams;

  /**
   * MUST be pure: same input and params, same output
   */
  run(input: TInput, params: TParams): TOutput;
}

/**
 * Helper to create a stage with better type inference
 */
export function defineStage<TParams extends object, TInput, TOutput>(
  definition: Stage<TParams, TInput, TOutput>
): Stage<TParams, TInput, TOutput> {
  return definition;
}
