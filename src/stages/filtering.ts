/**
 * Filter/Sampler Stage
 *
 * Two-stage down-sampling of the enumerated space:
 *
 * 1. THINNING - each combination is tested against the exclusion rules in
 *    declaration order. The first matching rule draws one Bernoulli trial with
 *    its sample rate; a hit drops the combination. Combinations no rule
 *    matches are always kept.
 *
 * 2. CAPPING - if more than targetCount survive, the survivors are shuffled
 *    (Fisher-Yates) and truncated to targetCount. At or below target the
 *    survivors keep their enumeration order.
 *
 * Both steps draw from the RandomSource passed in, so a seeded source gives a
 * reproducible plan. Ending below target is reported, never manufactured away.
 */

import { ConfigError } from '../framework/errors.js';
import { shuffle } from '../framework/random.js';
import { defineStage } from '../framework/stage.js';
import type { Stage } from '../framework/stage.js';
import type { Combination, ParameterSpace, RandomSource, ValidationResult } from '../framework/types.js';
import { countCombinations } from './combinations.js';

// =============================================================================
// RULES
// =============================================================================

export type ComparisonOp = '>' | '>=' | '<' | '<=' | '==' | '!=';

export const COMPARISON_OPS: readonly ComparisonOp[] = ['>', '>=', '<', '<=', '==', '!='];

export interface Clause {
  param: string;
  op: ComparisonOp;
  value: number;
}

/** Rule as written in the configuration */
export interface FilterRuleSpec {
  clauses: Clause[];
  /** Overrides the stage-wide sampleRate for this rule */
  sampleRate?: number;
}

/** Rule with its exclusion probability resolved */
export interface FilterRule {
  readonly label: string;
  readonly clauses: readonly Clause[];
  readonly sampleRate: number;
}

function isComparisonOp(value: string): value is ComparisonOp {
  return COMPARISON_OPS.some(op => op === value);
}

const CLAUSE_PATTERN = /^([A-Za-z_][A-Za-z0-9_]*)\s*(>=|<=|==|!=|>|<)\s*(-?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?)$/;

/**
 * Parse "K_ch > 2.4 and W_ch > 2.4 and W_rib > 9" into clauses.
 * Clauses are joined with `and` or `&&`.
 */
export function parseCondition(text: string): Clause[] {
  const parts = text.trim().split(/\s+and\s+|\s*&&\s*/i);
  return parts.map(part => {
    const match = CLAUSE_PATTERN.exec(part.trim());
    if (!match || !isComparisonOp(match[2])) {
      throw new ConfigError(`Cannot parse filter clause "${part.trim()}" in condition "${text}"`, {
        condition: text,
      });
    }
    return { param: match[1], op: match[2], value: Number(match[3]) };
  });
}

export function describeClauses(clauses: readonly Clause[]): string {
  return clauses.map(c => `${c.param} ${c.op} ${c.value}`).join(' and ');
}

function compare(actual: number, op: ComparisonOp, expected: number): boolean {
  switch (op) {
    case '>': return actual > expected;
    case '>=': return actual >= expected;
    case '<': return actual < expected;
    case '<=': return actual <= expected;
    case '==': return actual === expected;
    case '!=': return actual !== expected;
  }
}

export function matchesRule(rule: FilterRule, combination: Combination): boolean {
  return rule.clauses.every(clause => {
    const actual = combination[clause.param];
    return actual !== undefined && compare(actual, clause.op, clause.value);
  });
}

export function resolveRules(params: FilterParams): FilterRule[] {
  return params.rules.map(rule => ({
    label: describeClauses(rule.clauses),
    clauses: rule.clauses,
    sampleRate: rule.sampleRate ?? params.sampleRate,
  }));
}

// =============================================================================
// PARAMETERS
// =============================================================================

export interface FilterParams {
  rules: FilterRuleSpec[];
  sampleRate: number;          // Default exclusion probability when a rule matches
  targetCount: number;         // Hard cap on the surviving population
}

export const filteringDefaults: FilterParams = {
  rules: [],
  sampleRate: 0.5,
  targetCount: 868,
};

// =============================================================================
// INPUTS / OUTPUTS
// =============================================================================

export interface FilterInput {
  combinations: readonly Combination[];
  random: RandomSource;
}

export interface FilterOutcome {
  /** Surviving combinations, in processing order */
  combinations: Combination[];

  /** Combinations examined */
  considered: number;

  /** Combinations at least one rule matched */
  matched: number;

  /** Dropped by thinning */
  excluded: number;

  /** Dropped by the target cap */
  truncated: number;

  targetCount: number;

  /** Fewer survivors than targetCount */
  underDelivered: boolean;
}

// =============================================================================
// STAGE DEFINITION
// =============================================================================

function isRate(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

export const filteringStage: Stage<FilterParams, FilterInput, FilterOutcome> = defineStage({
  name: 'filtering',
  description: 'Predicate-triggered thinning followed by a shuffled target cap',

  defaults: filteringDefaults,

  validate(params: Partial<FilterParams>, space: ParameterSpace): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const p = { ...filteringDefaults, ...params };

    if (!isRate(p.sampleRate)) {
      errors.push(`sample_rate must be within [0, 1], got ${p.sampleRate}`);
    }
    if (!Number.isInteger(p.targetCount) || p.targetCount < 1) {
      errors.push(`target_count must be a positive integer, got ${p.targetCount}`);
    }

    p.rules.forEach((rule, i) => {
      if (rule.clauses.length === 0) {
        errors.push(`rule ${i + 1} has no clauses`);
      }
      if (rule.sampleRate !== undefined && !isRate(rule.sampleRate)) {
        errors.push(`rule ${i + 1} sample_rate must be within [0, 1], got ${rule.sampleRate}`);
      }
      for (const clause of rule.clauses) {
        if (!(clause.param in space)) {
          errors.push(`rule ${i + 1} tests unknown parameter "${clause.param}"`);
        }
        if (!Number.isFinite(clause.value)) {
          errors.push(`rule ${i + 1} compares ${clause.param} against a non-finite value`);
        }
      }
    });

    const theoretical = countCombinations(space);
    if (errors.length === 0 && theoretical < p.targetCount) {
      warnings.push(
        `target_count ${p.targetCount} exceeds the ${theoretical} theoretical combinations; the run will under-deliver`
      );
    }

    return { valid: errors.length === 0, errors, warnings };
  },

  mergeParams(partial: Partial<FilterParams>): FilterParams {
    return { ...filteringDefaults, ...partial };
  },

  run(input, params) {
    const { combinations, random } = input;
    const rules = resolveRules(params);

    // =========================================================================
    // 1. THINNING
    // =========================================================================
    const retained: Combination[] = [];
    let matched = 0;
    let excluded = 0;

    for (const combination of combinations) {
      const rule = rules.find(r => matchesRule(r, combination));
      if (rule) {
        matched++;
        if (random.next() < rule.sampleRate) {
          excluded++;
          continue;
        }
      }
      retained.push(combination);
    }

    // =========================================================================
    // 2. CAPPING
    // =========================================================================
    let survivors = retained;
    let truncated = 0;
    if (retained.length > params.targetCount) {
      survivors = shuffle(retained, random).slice(0, params.targetCount);
      truncated = retained.length - params.targetCount;
    }

    return {
      combinations: survivors,
      considered: combinations.length,
      matched,
      excluded,
      truncated,
      targetCount: params.targetCount,
      underDelivered: survivors.length < params.targetCount,
    };
  },
});
