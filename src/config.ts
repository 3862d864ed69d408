/**
 * Config Loader
 *
 * Loads a batch configuration file, checks its structure, applies defaults
 * and runs every stage's semantic validation. The result is a fully resolved
 * BatchConfig; anything wrong surfaces here as a ConfigError before a single
 * combination is generated.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigError } from './framework/errors.js';
import { createModuleLogger } from './framework/logger.js';
import type { LogLevel } from './framework/logger.js';
import type { ParameterSpace } from './framework/types.js';
import { validatedMerge } from './framework/validated-merge.js';
import { filteringStage, parseCondition } from './stages/filtering.js';
import type { Clause, FilterParams, FilterRuleSpec } from './stages/filtering.js';
import { meshDefaults, meshStage, parseDivisorExpression } from './stages/mesh.js';
import type { DivisorExpression, MeshSettings } from './stages/mesh.js';
import { defaultFormat, namingStage } from './stages/naming.js';
import type { NamingParams } from './stages/naming.js';

const log = createModuleLogger('config');

// =============================================================================
// FILE SCHEMA
// =============================================================================

const clauseSchema = z.object({
  param: z.string().min(1),
  op: z.enum(['>', '>=', '<', '<=', '==', '!=']),
  value: z.number(),
});

const conditionSchema = z.union([z.string().min(1), z.array(clauseSchema).min(1)]);

const logLevelSchema = z
  .string()
  .transform(value => value.toLowerCase())
  .pipe(z.enum(['debug', 'info', 'warn', 'warning', 'error']));

export const engineSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('dry-run'),
    parameters: z.array(z.string()).optional(),
  }),
  z.object({
    type: z.literal('command'),
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    parameters: z.array(z.string()).optional(),
  }),
]);

export const configFileSchema = z
  .object({
    name: z.string().optional(),
    description: z.string().optional(),

    parameters: z
      .record(z.array(z.number().finite()).min(1, 'must list at least one value'))
      .refine(space => Object.keys(space).length > 0, 'must define at least one parameter'),
    parameter_units: z.record(z.string()).default({}),

    batch_filtering: z
      .object({
        exclude_condition: conditionSchema.optional(),
        rules: z
          .array(z.object({ condition: conditionSchema, sample_rate: z.number().optional() }))
          .default([]),
        sample_rate: z.number().default(0.5),
        target_count: z.number().default(868),
        seed: z.number().int().optional(),
      })
      .default({}),

    mesh_settings: z.record(z.union([z.string(), z.record(z.string())])).default({}),

    file_naming: z
      .object({
        format: z.string().optional(),
        extension: z.string().default('.mph'),
      })
      .default({}),

    template_model: z.string().min(1),
    output_directory: z.string().min(1),

    execution_settings: z
      .object({
        log_level: logLevelSchema.default('info'),
        error_tolerance: z.enum(['abort', 'continue']).default('abort'),
        progress_interval: z.number().int().positive().default(100),
        timeout_seconds: z.number().positive().default(3600),
        log_file: z.string().min(1).default('batch_generation.log'),
      })
      .default({}),

    post_processing: z
      .object({
        verify_output: z.boolean().default(true),
      })
      .default({}),

    engine: engineSchema.default({ type: 'dry-run' }),
  })
  .passthrough();

export type ConfigFile = z.input<typeof configFileSchema>;

const KNOWN_KEYS = new Set(Object.keys(configFileSchema.shape));

// =============================================================================
// RESOLVED CONFIG
// =============================================================================

export type ErrorTolerance = 'abort' | 'continue';

export type EngineSettings = z.infer<typeof engineSchema>;

export interface ExecutionSettings {
  logLevel: LogLevel;
  errorTolerance: ErrorTolerance;
  progressInterval: number;
  timeoutMs: number;
  logFile: string;
}

export interface BatchConfig {
  name?: string;
  parameters: ParameterSpace;
  parameterUnits: Record<string, string>;
  filtering: FilterParams;
  /** Seed for the sampling RandomSource; random when absent */
  seed?: number;
  mesh: MeshSettings;
  naming: NamingParams;
  templateModel: string;
  outputDirectory: string;
  execution: ExecutionSettings;
  verifyOutput: boolean;
  engine: EngineSettings;
  /** Configuration as written, echoed into the summary */
  source: Record<string, unknown>;
}

// =============================================================================
// HELPERS
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects (override wins, nested objects merged).
 */
export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, overrideValue] of Object.entries(override)) {
    const baseValue = base[key];
    if (isRecord(overrideValue) && isRecord(baseValue)) {
      result[key] = deepMerge(baseValue, overrideValue);
    } else if (overrideValue !== undefined) {
      result[key] = overrideValue;
    }
  }

  return result;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

function toClauses(condition: string | Clause[]): Clause[] {
  return typeof condition === 'string' ? parseCondition(condition) : condition;
}

function buildMeshSettings(raw: Record<string, string | Record<string, string>>): Partial<MeshSettings> {
  const settings: Partial<MeshSettings> = {};
  const derived: Record<string, DivisorExpression> = {};
  const errors: string[] = [];

  for (const [key, value] of Object.entries(raw)) {
    if (key === 'axes') {
      if (typeof value === 'string') {
        errors.push('mesh_settings.axes must map axis names to parameter names');
      } else {
        settings.axes = value;
      }
    } else if (typeof value !== 'string') {
      errors.push(`mesh_settings.${key} must be a "NAME/DIVISOR" string`);
    } else if (key === 'interior_mesh_size') {
      settings.interiorMeshSize = parseDivisorExpression(value);
    } else {
      derived[key] = parseDivisorExpression(value);
    }
  }

  if (errors.length > 0) {
    throw new ConfigError(`Invalid mesh_settings:\n  ${errors.join('\n  ')}`, { errors });
  }
  if (Object.keys(derived).length > 0) {
    settings.derived = derived;
  }
  return settings;
}

// =============================================================================
// PARSE
// =============================================================================

/**
 * Validate a parsed configuration object and resolve every default.
 *
 * @param raw - Parsed JSON
 * @param origin - Where the object came from, for messages
 */
export function parseConfig(raw: unknown, origin = '<inline>'): BatchConfig {
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`Invalid configuration ${origin}:\n  ${issues.join('\n  ')}`, { origin, issues });
  }
  const file = parsed.data;

  if (isRecord(raw)) {
    for (const key of Object.keys(raw)) {
      if (!KNOWN_KEYS.has(key)) {
        log.warn({ origin }, `Unrecognized configuration key "${key}" will be ignored`);
      }
    }
  }

  const parameters: ParameterSpace = file.parameters;
  for (const name of Object.keys(file.parameter_units)) {
    if (!(name in parameters)) {
      log.warn({ origin }, `parameter_units lists "${name}", which is not a swept parameter`);
    }
  }

  // Stage parameters
  const filterConfig = file.batch_filtering;
  const rules: FilterRuleSpec[] = [];
  if (filterConfig.exclude_condition !== undefined) {
    rules.push({ clauses: toClauses(filterConfig.exclude_condition) });
  }
  for (const rule of filterConfig.rules) {
    rules.push({ clauses: toClauses(rule.condition), sampleRate: rule.sample_rate });
  }

  const filtering = validatedMerge(filteringStage, parameters, {
    rules,
    sampleRate: filterConfig.sample_rate,
    targetCount: filterConfig.target_count,
  });

  const mesh = validatedMerge(meshStage, parameters, {
    ...meshDefaults,
    ...buildMeshSettings(file.mesh_settings),
  });

  const naming = validatedMerge(namingStage, parameters, {
    format: file.file_naming.format ?? defaultFormat(Object.keys(parameters)),
    extension: file.file_naming.extension,
  });

  const execution = file.execution_settings;
  const logLevel: LogLevel = execution.log_level === 'warning' ? 'warn' : execution.log_level;

  return {
    name: file.name,
    parameters,
    parameterUnits: file.parameter_units,
    filtering,
    seed: filterConfig.seed,
    mesh,
    naming,
    templateModel: file.template_model,
    outputDirectory: file.output_directory,
    execution: {
      logLevel,
      errorTolerance: execution.error_tolerance,
      progressInterval: execution.progress_interval,
      timeoutMs: execution.timeout_seconds * 1000,
      logFile: execution.log_file,
    },
    verifyOutput: file.post_processing.verify_output,
    engine: file.engine,
    source: isRecord(raw) ? raw : {},
  };
}

// =============================================================================
// LOADER
// =============================================================================

/**
 * Load and resolve a configuration file, with optional overrides merged on
 * top of the file contents before validation.
 */
export async function loadConfig(path: string, overrides?: Record<string, unknown>): Promise<BatchConfig> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${err instanceof Error ? err.message : String(err)}`, {
      path,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, {
      path,
    });
  }

  if (overrides && isRecord(raw)) {
    raw = deepMerge(raw, overrides);
  }

  return parseConfig(raw, path);
}
