/**
 * model-sweep - batch generation of parameterized simulation models
 *
 * Main entry point for programmatic use.
 */

// Configuration
export { loadConfig, parseConfig, configFileSchema, deepMerge } from './config.js';
export type { BatchConfig, ConfigFile, EngineSettings, ErrorTolerance, ExecutionSettings } from './config.js';

// Orchestration
export { planBatch, processCombination, runBatch } from './batch.js';
export type { BatchPlan, BatchProgress, BatchReport, RunOptions } from './batch.js';
export { buildSummary, writeSummary, formatSummary, SUMMARY_FILE } from './summary.js';
export type {
  GenerationFailure,
  GenerationResult,
  GenerationSuccess,
  SummaryInput,
  SummaryReport,
  SummaryTotals,
} from './summary.js';

// Stages
export { countCombinations, generateCombinations, iterateCombinations } from './stages/combinations.js';
export { filteringStage, filteringDefaults, parseCondition, describeClauses, matchesRule } from './stages/filtering.js';
export type { Clause, ComparisonOp, FilterOutcome, FilterParams, FilterRule, FilterRuleSpec } from './stages/filtering.js';
export { meshStage, meshDefaults, axisMesh, parseDivisorExpression } from './stages/mesh.js';
export type { AxisMesh, DivisorExpression, MeshParams, MeshSettings } from './stages/mesh.js';
export { namingStage, namingDefaults, formatValue, defaultFormat, templatePlaceholders } from './stages/naming.js';
export type { NamingParams } from './stages/naming.js';

// Engines
export { createEngine, DryRunEngine, CommandEngine, runExternalJob } from './engine/index.js';
export type { ModelEngine, ModelSession, CommandEngineOptions, JobRunner, ModelJob } from './engine/index.js';

// Framework
export * from './framework/index.js';

// Primitives
export { roundHalfEven, exactHalfwayFloor, percent } from './primitives/math.js';
