/**
 * Random value helpers backed by Math.random.
 * Not suitable for secrets: use node:crypto for those.
 */

import { DEFAULT_NAME_LENGTH, DEFAULT_TOKEN_LENGTH } from '../config';
import { DimensionMismatchError, InvalidArgumentError } from '../errors';

const LOWERCASE = 'abcdefghijklmnopqrstuvwxyz';
const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

/**
 * Uniform integer in [0, n)
 */
const randomIndex = (n: number): number => Math.floor(Math.random() * n);

const requirePositiveLength = (length: number, fn: string): void => {
  if (!Number.isInteger(length) || length <= 0) {
    throw new InvalidArgumentError(`${fn}(): length must be positive (got ${length})`);
  }
};

const randomString = (alphabet: string, length: number): string => {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += alphabet[randomIndex(alphabet.length)];
  }
  return out;
};

/**
 * Pick one element uniformly at random
 */
export function pick<T>(seq: readonly T[]): T {
  if (seq.length === 0) {
    throw new InvalidArgumentError('pick(): cannot pick from an empty sequence');
  }
  return seq[randomIndex(seq.length)];
}

/**
 * Shuffled copy of a sequence (Fisher-Yates)
 */
export function shuffle<T>(seq: readonly T[]): T[] {
  const out = [...seq];
  for (let i = out.length - 1; i > 0; i--) {
    const j = randomIndex(i + 1);
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

/**
 * Random lowercase name
 */
export function randomName(length: number = DEFAULT_NAME_LENGTH): string {
  requirePositiveLength(length, 'randomName');
  return randomString(LOWERCASE, length);
}

/**
 * Random integer N with a <= N <= b
 */
export function randint(a: number, b: number): number {
  if (!Number.isInteger(a) || !Number.isInteger(b)) {
    throw new InvalidArgumentError(`randint(): bounds must be integers (got ${a}, ${b})`);
  }
  if (a > b) {
    throw new InvalidArgumentError(`randint(): empty range [${a}, ${b}]`);
  }
  return a + randomIndex(b - a + 1);
}

/**
 * Random float x with a <= x < b
 */
export const randfloat = (a: number = 0, b: number = 1): number =>
  Math.random() * (b - a) + a;

/**
 * k elements drawn without replacement, in selection order
 */
export function sample<T>(seq: readonly T[], k: number): T[] {
  if (!Number.isInteger(k) || k < 0) {
    throw new InvalidArgumentError(`sample(): k must be a non-negative integer (got ${k})`);
  }
  if (k > seq.length) {
    throw new InvalidArgumentError(
      `sample(): sample larger than population (${k} > ${seq.length})`
    );
  }
  // Partial Fisher-Yates over a copy: the first k slots end up as the sample
  const pool = [...seq];
  for (let i = 0; i < k; i++) {
    const j = i + randomIndex(pool.length - i);
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, k);
}

/**
 * Pick one item with probability proportional to its weight
 */
export function weightedChoice<T>(items: readonly T[], weights: readonly number[]): T {
  if (items.length !== weights.length) {
    throw new DimensionMismatchError(
      `weightedChoice(): items and weights must have same length (${items.length} vs ${weights.length})`
    );
  }
  if (items.length === 0) {
    throw new InvalidArgumentError('weightedChoice(): items must not be empty');
  }

  let total = 0;
  for (const w of weights) {
    if (!Number.isFinite(w) || w < 0) {
      throw new InvalidArgumentError(`weightedChoice(): invalid weight ${w}`);
    }
    total += w;
  }
  if (total <= 0) {
    throw new InvalidArgumentError('weightedChoice(): total of weights must be greater than zero');
  }

  const target = Math.random() * total;
  let cumulative = 0;
  for (let i = 0; i < items.length; i++) {
    cumulative += weights[i];
    if (target < cumulative) {
      return items[i];
    }
  }
  // Rounding can leave target == total; fall back to the last weighted item
  let last = items.length - 1;
  while (weights[last] === 0) last--;
  return items[last];
}

/**
 * Random token of ASCII letters and digits
 */
export function token(length: number = DEFAULT_TOKEN_LENGTH): string {
  requirePositiveLength(length, 'token');
  return randomString(ALPHANUMERIC, length);
}
