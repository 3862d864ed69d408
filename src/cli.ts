#!/usr/bin/env node
/**
 * Command-line entry point
 *
 * Usage:
 *   model-sweep <config.json> [options]
 *   npx tsx src/cli.ts configs/interdigitated-flow.json --plan
 */

import { planBatch, runBatch } from './batch.js';
import { loadConfig } from './config.js';
import { createEngine } from './engine/index.js';
import { SweepError } from './framework/errors.js';
import { attachFileSink, createModuleLogger, setLogLevel } from './framework/logger.js';
import { createRandom } from './framework/random.js';
import { namingStage } from './stages/naming.js';
import { formatSummary } from './summary.js';

const log = createModuleLogger('cli');

const PLAN_PREVIEW = 10;

/** Exit code after a second interrupt, as for a process killed by SIGINT */
export const INTERRUPTED_EXIT_CODE = 130;

function printUsage(): void {
  console.log('Usage: model-sweep <config.json> [options]');
  console.log('');
  console.log('Options:');
  console.log('  --plan                    Print the filtered plan and first file names, then exit');
  console.log('  --seed=N                  Override batch_filtering.seed');
  console.log('  --output=DIR              Override output_directory');
  console.log('  --dry-run                 Use the dry-run engine regardless of configuration');
  console.log('  --help, -h                Show this help');
  console.log('');
  console.log('Ctrl+C stops after the current combination; a second Ctrl+C abandons it.');
  console.log(`The summary is written either way; the exit code is then ${INTERRUPTED_EXIT_CODE}.`);
}

export interface CliOptions {
  configPath?: string;
  plan: boolean;
  help: boolean;
  overrides: Record<string, unknown>;
  unknownFlags: string[];
}

export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { plan: false, help: false, overrides: {}, unknownFlags: [] };

  for (const arg of args) {
    if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--plan') {
      options.plan = true;
    } else if (arg === '--dry-run') {
      options.overrides.engine = { type: 'dry-run' };
    } else if (arg.startsWith('--seed=')) {
      const value = Number(arg.split('=')[1]);
      if (Number.isInteger(value)) {
        options.overrides.batch_filtering = { seed: value };
      } else {
        options.unknownFlags.push(arg);
      }
    } else if (arg.startsWith('--output=')) {
      options.overrides.output_directory = arg.slice('--output='.length);
    } else if (arg.startsWith('-')) {
      options.unknownFlags.push(arg);
    } else if (options.configPath === undefined) {
      options.configPath = arg;
    } else {
      options.unknownFlags.push(arg);
    }
  }

  return options;
}

async function printPlan(configPath: string, overrides: Record<string, unknown>): Promise<void> {
  const config = await loadConfig(configPath, overrides);
  setLogLevel(config.execution.logLevel);

  const random = createRandom(config.seed);
  const plan = planBatch(config, random);

  console.log(`Seed:                     ${random.seed}`);
  console.log(`Theoretical combinations: ${plan.theoretical}`);
  console.log(`Matched by a rule:        ${plan.filter.matched}`);
  console.log(`Excluded by filter:       ${plan.filter.excluded}`);
  console.log(`Truncated to target:      ${plan.filter.truncated}`);
  console.log(`Planned (target ${plan.filter.targetCount}):    ${plan.combinations.length}`);
  console.log('');
  for (const combination of plan.combinations.slice(0, PLAN_PREVIEW)) {
    console.log(`  ${namingStage.run(combination, config.naming)}`);
  }
  if (plan.combinations.length > PLAN_PREVIEW) {
    console.log(`  ... and ${plan.combinations.length - PLAN_PREVIEW} more`);
  }
}

/**
 * First signal: stop after the current combination. Second: abort the
 * combination in flight too. The summary is written either way.
 */
export function createSignalHandler(
  stop: AbortController,
  interrupt: AbortController
): (signal: NodeJS.Signals) => void {
  let received = 0;
  return signal => {
    received++;
    if (received === 1) {
      log.warn({ signal }, 'Stopping after the current combination (signal again to abandon it)');
      stop.abort();
    } else if (received === 2) {
      log.warn({ signal }, 'Abandoning the current combination and writing the summary');
      interrupt.abort(new Error('Interrupted by user'));
    }
  };
}

async function runFromConfig(configPath: string, overrides: Record<string, unknown>): Promise<number> {
  const config = await loadConfig(configPath, overrides);
  setLogLevel(config.execution.logLevel);
  const closeLog = attachFileSink(config.execution.logFile);

  const stop = new AbortController();
  const interrupt = new AbortController();
  const onSignal = createSignalHandler(stop, interrupt);
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    log.info({ config: configPath }, `Starting batch${config.name ? ` "${config.name}"` : ''}`);
    const engine = createEngine(config);
    const { summary, summaryPath } = await runBatch(config, engine, {
      signal: stop.signal,
      interrupt: interrupt.signal,
    });

    console.log('');
    for (const line of formatSummary(summary)) {
      console.log(line);
    }
    console.log(`Summary written to ${summaryPath}`);
    return interrupt.signal.aborted ? INTERRUPTED_EXIT_CODE : 0;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await closeLog();
  }
}

/**
 * Run the CLI. Resolves to the process exit code.
 */
export async function runCLI(args: readonly string[] = process.argv.slice(2)): Promise<number> {
  const options = parseArgs(args);

  if (options.help) {
    printUsage();
    return 0;
  }
  if (options.unknownFlags.length > 0) {
    console.warn(`Warning: Unknown arguments ignored: ${options.unknownFlags.join(', ')}`);
  }
  if (options.configPath === undefined) {
    console.error('Error: missing configuration file');
    printUsage();
    return 1;
  }

  try {
    if (options.plan) {
      await printPlan(options.configPath, options.overrides);
      return 0;
    }
    return await runFromConfig(options.configPath, options.overrides);
  } catch (err) {
    if (err instanceof SweepError) {
      console.error(`${err.name}: ${err.message}`);
    } else {
      console.error(err);
    }
    return 1;
  }
}

const entry = process.argv[1] ?? '';
if (entry.endsWith('cli.ts') || entry.endsWith('cli.js') || entry.endsWith('model-sweep')) {
  runCLI().then(
    code => {
      process.exitCode = code;
    },
    err => {
      console.error(err);
      process.exit(1);
    }
  );
}
