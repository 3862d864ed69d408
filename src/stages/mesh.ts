/**
 * Mesh Parameter Stage
 *
 * Derives mesh sizing from the characteristic lengths of one combination:
 *
 *   interiorMeshSize = channel / divisor              (default K_ch / 5)
 *   rawCells         = D / interiorMeshSize           per axis dimension D
 *   cells            = max(1, roundHalfEven(rawCells))
 *   meshSize         = D / cells
 *
 * so every axis is covered by a whole number of equal cells and
 * meshSize × cells reproduces D. Further "NAME/DIVISOR" entries in
 * mesh_settings become derived quantities passed to the engine as-is.
 */

import { ConfigError } from '../framework/errors.js';
import { defineStage } from '../framework/stage.js';
import type { Stage } from '../framework/stage.js';
import type { Combination, ParameterSpace, ValidationResult } from '../framework/types.js';
import { roundHalfEven } from '../primitives/math.js';

// =============================================================================
// EXPRESSIONS
// =============================================================================

export interface DivisorExpression {
  param: string;
  divisor: number;
}

const DIVISOR_PATTERN = /^([A-Za-z_][A-Za-z0-9_]*)\s*\/\s*(\d+\.?\d*(?:[eE][-+]?\d+)?|\.\d+(?:[eE][-+]?\d+)?)$/;

/**
 * Parse "K_ch/5" into { param: 'K_ch', divisor: 5 }.
 */
export function parseDivisorExpression(text: string): DivisorExpression {
  const match = DIVISOR_PATTERN.exec(text.trim());
  if (!match) {
    throw new ConfigError(`Mesh expression "${text}" is not of the form NAME/DIVISOR`, { expression: text });
  }
  return { param: match[1], divisor: Number(match[2]) };
}

export function formatDivisorExpression(expr: DivisorExpression): string {
  return `${expr.param}/${expr.divisor}`;
}

// =============================================================================
// PARAMETERS
// =============================================================================

export interface MeshSettings {
  /** Interior mesh size as channel dimension over a fixed divisor */
  interiorMeshSize: DivisorExpression;

  /** Axis name → parameter holding that axis dimension */
  axes: Record<string, string>;

  /** Extra quantities, each a parameter over a divisor */
  derived: Record<string, DivisorExpression>;
}

export const meshDefaults: MeshSettings = {
  interiorMeshSize: { param: 'K_ch', divisor: 5 },
  axes: {
    stream_width: 'K_ch',
    stream_depth: 'W_ch',
  },
  derived: {},
};

// =============================================================================
// OUTPUTS
// =============================================================================

export interface AxisMesh {
  /** Source dimension */
  dimension: number;

  /** dimension / interiorMeshSize before rounding */
  rawCells: number;

  /** Whole cell count, at least 1 */
  cells: number;

  /** dimension / cells */
  meshSize: number;
}

export interface MeshParams {
  interiorMeshSize: number;
  axes: Record<string, AxisMesh>;
  derived: Record<string, number>;
}

// =============================================================================
// CALCULATION
// =============================================================================

function readDimension(combination: Combination, param: string): number {
  const value = combination[param];
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`Mesh dimension "${param}" must be a positive number, got ${value}`, { param });
  }
  return value;
}

/**
 * Whole-cell discretization of one axis.
 */
export function axisMesh(dimension: number, interiorMeshSize: number): AxisMesh {
  const rawCells = dimension / interiorMeshSize;
  const cells = Math.max(1, roundHalfEven(rawCells));
  return {
    dimension,
    rawCells,
    cells,
    meshSize: dimension / cells,
  };
}

function referencedParams(settings: MeshSettings): string[] {
  return [
    settings.interiorMeshSize.param,
    ...Object.values(settings.axes),
    ...Object.values(settings.derived).map(expr => expr.param),
  ];
}

function isDivisor(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

// =============================================================================
// STAGE DEFINITION
// =============================================================================

export const meshStage: Stage<MeshSettings, Combination, MeshParams> = defineStage({
  name: 'mesh',
  description: 'Interior mesh size and whole-cell axis discretization',

  defaults: meshDefaults,

  validate(params: Partial<MeshSettings>, space: ParameterSpace): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const p = { ...meshDefaults, ...params };

    if (!isDivisor(p.interiorMeshSize.divisor)) {
      errors.push(`interior_mesh_size divisor must be positive, got ${p.interiorMeshSize.divisor}`);
    }
    for (const [name, expr] of Object.entries(p.derived)) {
      if (!isDivisor(expr.divisor)) {
        errors.push(`${name} divisor must be positive, got ${expr.divisor}`);
      }
    }
    if (Object.keys(p.axes).length === 0) {
      warnings.push('no mesh axes configured; only the interior mesh size will be derived');
    }

    // Every candidate value of a referenced dimension is checked here so a
    // zero or missing dimension never surfaces mid-run
    for (const param of new Set(referencedParams(p))) {
      const values = space[param];
      if (values === undefined) {
        errors.push(`mesh settings reference unknown parameter "${param}"`);
        continue;
      }
      const bad = values.filter(v => !Number.isFinite(v) || v <= 0);
      if (bad.length > 0) {
        errors.push(`mesh dimension "${param}" has non-positive values: ${bad.join(', ')}`);
      }
    }

    return { valid: errors.length === 0, errors, warnings };
  },

  mergeParams(partial: Partial<MeshSettings>): MeshSettings {
    return { ...meshDefaults, ...partial };
  },

  run(combination, settings) {
    const channel = readDimension(combination, settings.interiorMeshSize.param);
    const interiorMeshSize = channel / settings.interiorMeshSize.divisor;

    const axes: Record<string, AxisMesh> = {};
    for (const [axis, param] of Object.entries(settings.axes)) {
      axes[axis] = axisMesh(readDimension(combination, param), interiorMeshSize);
    }

    const derived: Record<string, number> = {};
    for (const [name, expr] of Object.entries(settings.derived)) {
      derived[name] = readDimension(combination, expr.param) / expr.divisor;
    }

    return { interiorMeshSize, axes, derived };
  },
});
