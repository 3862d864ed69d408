/**
 * Core types for the sweep framework
 */

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Ordered candidate values per swept parameter.
 * Key insertion order is the enumeration order.
 */
export type ParameterSpace = Readonly<Record<string, readonly number[]>>;

/**
 * One fully-specified assignment of values to all swept parameters.
 */
export type Combination = Readonly<Record<string, number>>;

/**
 * Source of uniform variates in [0, 1).
 */
export interface RandomSource {
  next(): number;
}
