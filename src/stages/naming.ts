/**
 * Filename Encoder Stage
 *
 * Substitutes formatted parameter values into a `{name}` template:
 *
 * - |v| < 0.01 or |v| > 1e6 → scientific, 3 mantissa decimals (0.0034 → 3.400e-3)
 * - otherwise               → fixed point, 3 decimals        (2.5 → 2.500)
 *
 * `e+` is collapsed to `e` after substitution (2500000 → 2.500e6); negative
 * exponents keep their `e-`. Exact ties round to even (1.0625 → 1.062,
 * 0.0078125 → 7.812e-3). Two combinations collide only when every
 * placeholder value rounds to the same 3-decimal form.
 */

import { defineStage } from '../framework/stage.js';
import type { Stage } from '../framework/stage.js';
import type { Combination, ParameterSpace, ValidationResult } from '../framework/types.js';
import { exactHalfwayFloor } from '../primitives/math.js';

// =============================================================================
// FORMATTING
// =============================================================================

const SCIENTIFIC_BELOW = 1e-2;
const SCIENTIFIC_ABOVE = 1e6;

/**
 * Render one value the way it appears in file names.
 */
export function formatValue(value: number): string {
  const magnitude = Math.abs(value);
  const sign = value < 0 ? '-' : '';

  if (magnitude < SCIENTIFIC_BELOW || magnitude > SCIENTIFIC_ABOVE) {
    const exponent = Number(magnitude.toExponential().split('e')[1]);
    const lower = exactHalfwayFloor(magnitude, 3 - exponent);
    // toExponential breaks ties upward
    if (lower !== undefined && lower % 2n === 0n) {
      const digits = lower.toString();
      return `${sign}${digits[0]}.${digits.slice(1)}e${exponent < 0 ? '-' : '+'}${Math.abs(exponent)}`;
    }
    return value.toExponential(3);
  }

  const lower = exactHalfwayFloor(magnitude, 3);
  if (lower !== undefined && lower % 2n === 0n) {
    const digits = lower.toString().padStart(4, '0');
    return `${sign}${digits.slice(0, -3)}.${digits.slice(-3)}`;
  }
  return value.toFixed(3);
}

const PLACEHOLDER_PATTERN = /\{([^{}]+)\}/g;

/**
 * Placeholder names used in a template, in order of appearance.
 */
export function templatePlaceholders(format: string): string[] {
  return Array.from(format.matchAll(PLACEHOLDER_PATTERN), match => match[1]);
}

/**
 * Template naming every parameter: batch_model_K_ch_{K_ch}_W_ch_{W_ch}
 */
export function defaultFormat(parameterNames: readonly string[]): string {
  return ['batch_model', ...parameterNames.map(name => `${name}_{${name}}`)].join('_');
}

// =============================================================================
// PARAMETERS
// =============================================================================

export interface NamingParams {
  format: string;       // Template with {name} placeholders
  extension: string;    // Appended verbatim, e.g. ".mph"
}

export const namingDefaults: NamingParams = {
  format: 'batch_model',
  extension: '.mph',
};

// =============================================================================
// STAGE DEFINITION
// =============================================================================

export const namingStage: Stage<NamingParams, Combination, string> = defineStage({
  name: 'naming',
  description: 'Deterministic file names from parameter values',

  defaults: namingDefaults,

  validate(params: Partial<NamingParams>, space: ParameterSpace): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const p = { ...namingDefaults, ...params };

    if (p.format.trim() === '') {
      errors.push('file_naming.format must not be empty');
    }
    if (/[\\/]/.test(p.format)) {
      errors.push(`file_naming.format must not contain path separators: "${p.format}"`);
    }
    for (const name of templatePlaceholders(p.format)) {
      if (!(name in space)) {
        errors.push(`file_naming.format placeholder {${name}} is not a swept parameter`);
      }
    }

    const covered = new Set(templatePlaceholders(p.format));
    const missing = Object.keys(space).filter(name => !covered.has(name));
    if (missing.length > 0) {
      warnings.push(
        `file_naming.format omits ${missing.join(', ')}; combinations differing only there will share a file name`
      );
    }
    if (p.extension !== '' && !p.extension.startsWith('.')) {
      warnings.push(`file_naming.extension "${p.extension}" does not start with "."`);
    }

    return { valid: errors.length === 0, errors, warnings };
  },

  mergeParams(partial: Partial<NamingParams>): NamingParams {
    return { ...namingDefaults, ...partial };
  },

  run(combination, params) {
    const name = params.format.replace(PLACEHOLDER_PATTERN, (_, key: string) => formatValue(combination[key]));
    return `${name}${params.extension}`.replace(/e\+/g, 'e');
  },
});
