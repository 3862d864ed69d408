/**
 * Primitive numeric helpers
 *
 * Pure functions with no dependencies.
 */

/**
 * Round to nearest integer, ties to even (banker's rounding).
 *
 * 2.5 → 2, 3.5 → 4, -2.5 → -2. Cell counts derived from the same geometry
 * must not drift upward on exact halves.
 */
export function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * When x × 10^scale lies exactly halfway between two integers, the lower of
 * them; otherwise undefined. Works on the exact binary value of x, so 1.0625
 * at scale 3 is a tie (1062) while 1.0005, which is not representable, is not.
 */
export function exactHalfwayFloor(x: number, scale: number): bigint | undefined {
  if (!Number.isFinite(x) || x < 0) return undefined;

  // x = m / 2^k exactly
  let m = x;
  let k = 0n;
  while (!Number.isInteger(m)) {
    m *= 2;
    k++;
  }

  let numerator = 2n * BigInt(m);
  let denominator = 1n << k;
  if (scale >= 0) {
    numerator *= 10n ** BigInt(scale);
  } else {
    denominator *= 10n ** BigInt(-scale);
  }
  if (numerator % denominator !== 0n) return undefined;

  const twice = numerator / denominator;
  return twice % 2n === 1n ? (twice - 1n) / 2n : undefined;
}

/**
 * Product of a list of integers (1 for an empty list).
 */
export function product(values: readonly number[]): number {
  return values.reduce((acc, v) => acc * v, 1);
}

/**
 * Percentage string with one decimal, "0%" for an empty denominator.
 */
export function percent(part: number, whole: number): string {
  if (whole <= 0) return '0%';
  return `${((part / whole) * 100).toFixed(1)}%`;
}
