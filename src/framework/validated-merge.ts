/**
 * Validate-on-Construct Pattern
 *
 * Stage parameters are validated when the configuration is built, so invalid
 * params never reach a run. mergeParams() output is what gets validated.
 */

import { ConfigError } from './errors.js';
import { createModuleLogger } from './logger.js';
import type { Stage } from './stage.js';
import type { ParameterSpace } from './types.js';

const log = createModuleLogger('config');

/**
 * Wraps a stage's merge + validate into a single operation.
 * Throws ConfigError on validation errors, logs warnings.
 *
 * @param stage - Stage whose params are being built
 * @param space - Parameter space the params refer to
 * @param partial - Partial params to merge
 * @returns Fully merged and validated params
 */
export function validatedMerge<TParams extends object, TInput, TOutput>(
  stage: Stage<TParams, TInput, TOutput>,
  space: ParameterSpace,
  partial: Partial<TParams>
): TParams {
  const merged = stage.mergeParams(partial);

  const result = stage.validate(merged, space);

  for (const warning of result.warnings) {
    log.warn({ stage: stage.name }, warning);
  }

  if (!result.valid) {
    throw new ConfigError(
      `[${stage.name}] Invalid parameters:\n  ${result.errors.join('\n  ')}`,
      { stage: stage.name, errors: result.errors }
    );
  }

  return merged;
}
