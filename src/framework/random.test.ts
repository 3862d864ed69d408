import { describe, expect, it } from 'vitest';
import { SeededRandom, createRandom, nextInt, shuffle } from './random.js';

describe('SeededRandom', () => {
  it('repeats its sequence for the same seed', () => {
    const a = new SeededRandom(123);
    const b = new SeededRandom(123);
    const first = Array.from({ length: 5 }, () => a.next());
    const second = Array.from({ length: 5 }, () => b.next());
    expect(second).toEqual(first);
  });

  it('differs between seeds', () => {
    expect(new SeededRandom(1).next()).not.toBe(new SeededRandom(2).next());
  });

  it('stays within [0, 1)', () => {
    const random = new SeededRandom(99);
    for (let i = 0; i < 1000; i++) {
      const value = random.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('normalizes the seed to an unsigned 32-bit integer', () => {
    expect(new SeededRandom(-1).seed).toBe(4294967295);
  });
});

describe('createRandom', () => {
  it('keeps a configured seed', () => {
    expect(createRandom(42).seed).toBe(42);
  });

  it('picks a seed when none is given', () => {
    const seed = createRandom().seed;
    expect(Number.isInteger(seed)).toBe(true);
    expect(seed).toBeGreaterThanOrEqual(0);
  });
});

describe('nextInt', () => {
  it('maps the unit interval onto [0, n)', () => {
    expect(nextInt({ next: () => 0 }, 5)).toBe(0);
    expect(nextInt({ next: () => 0.999999 }, 5)).toBe(4);
  });

  it('rejects an empty range', () => {
    expect(() => nextInt({ next: () => 0.5 }, 0)).toThrow();
  });
});

describe('shuffle', () => {
  it('returns a permutation without touching the input', () => {
    const input = [1, 2, 3, 4, 5, 6];
    const result = shuffle(input, new SeededRandom(5));
    expect(input).toEqual([1, 2, 3, 4, 5, 6]);
    expect([...result].sort((x, y) => x - y)).toEqual(input);
  });

  it('follows Fisher-Yates from the end of the list', () => {
    // j = 0 at every step rotates the first element to the back
    expect(shuffle(['a', 'b', 'c'], { next: () => 0 })).toEqual(['b', 'c', 'a']);
  });
});
