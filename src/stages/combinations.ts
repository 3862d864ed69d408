/**
 * Combination Generator
 *
 * Full Cartesian product of a parameter space. The first parameter varies
 * slowest and the last fastest, so output order is lexicographic in
 * (P1 index, P2 index, ...).
 *
 * An empty space yields no combinations; callers decide whether that is fatal.
 */

import type { Combination, ParameterSpace } from '../framework/types.js';
import { product } from '../primitives/math.js';

/**
 * Number of combinations the space expands to, without materializing them.
 */
export function countCombinations(space: ParameterSpace): number {
  const sizes = Object.values(space).map(values => values.length);
  if (sizes.length === 0) return 0;
  return product(sizes);
}

/**
 * Lazily yield every combination in lexicographic order.
 */
export function* iterateCombinations(space: ParameterSpace): IterableIterator<Combination> {
  const names = Object.keys(space);
  if (names.length === 0) return;

  const lists = names.map(name => space[name]);
  if (lists.some(values => values.length === 0)) return;

  // Odometer over value indices, rightmost digit spins fastest
  const indices = names.map(() => 0);
  while (true) {
    const combination: Record<string, number> = {};
    for (let i = 0; i < names.length; i++) {
      combination[names[i]] = lists[i][indices[i]];
    }
    yield Object.freeze(combination);

    let position = names.length - 1;
    while (position >= 0) {
      indices[position]++;
      if (indices[position] < lists[position].length) break;
      indices[position] = 0;
      position--;
    }
    if (position < 0) return;
  }
}

/**
 * All combinations as an array.
 */
export function generateCombinations(space: ParameterSpace): Combination[] {
  return Array.from(iterateCombinations(space));
}
