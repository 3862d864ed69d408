/**
 * Engine registry
 */

import type { BatchConfig } from '../config.js';
import { CommandEngine } from './command.js';
import type { JobRunner } from './command.js';
import { DryRunEngine } from './dry-run.js';
import type { ModelEngine } from './types.js';

export type { ModelEngine, ModelSession } from './types.js';
export { DryRunEngine } from './dry-run.js';
export type { DryRunOptions } from './dry-run.js';
export { CommandEngine, runExternalJob } from './command.js';
export type { CommandEngineOptions, JobOutput, JobRunner, ModelJob } from './command.js';

/**
 * Build the engine a configuration selects. Parameters the engine recognizes
 * default to the swept parameter names.
 */
export function createEngine(config: BatchConfig, runner?: JobRunner): ModelEngine {
  const settings = config.engine;
  const knownParameters = settings.parameters ?? Object.keys(config.parameters);

  switch (settings.type) {
    case 'dry-run':
      return new DryRunEngine({ knownParameters });
    case 'command':
      return new CommandEngine({
        command: settings.command,
        args: settings.args,
        timeoutMs: config.execution.timeoutMs,
        knownParameters,
        runner,
      });
  }
}
