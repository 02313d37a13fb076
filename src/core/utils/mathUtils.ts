/**
 * Basic math: factorial, powers and roots, trigonometry in degrees or radians,
 * logarithms, gcd/lcm
 */

import { glMatrix } from 'gl-matrix';
import { DEFAULT_ANGLE_UNIT } from '../config';
import { InvalidArgumentError, InvalidUnitError } from '../errors';
import type { AngleUnit } from '../types';

// ==================== Powers & Roots ====================

/**
 * Factorial of a non-negative integer. Exact up to 18!, Infinity past 170!.
 */
export function factorial(n: number): number {
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError(`factorial() only accepts integers (got ${n})`);
  }
  if (n < 0) {
    throw new InvalidArgumentError('factorial() not defined for negative numbers');
  }
  let result = 1;
  for (let i = 2; i <= n; i++) {
    result *= i;
  }
  return result;
}

export const power = (base: number, exp: number): number => base ** exp;

export function sqrt(x: number): number {
  if (x < 0) {
    throw new InvalidArgumentError('sqrt() not defined for negative numbers');
  }
  return Math.sqrt(x);
}

// ==================== Angles ====================

/**
 * Normalize a unit string (case-insensitive) to an AngleUnit
 */
export const parseAngleUnit = (unit: string): AngleUnit => {
  const normalized = unit.toLowerCase();
  if (normalized === 'degrees' || normalized === 'radians') {
    return normalized;
  }
  throw new InvalidUnitError(unit);
};

/**
 * Convert theta to radians. Degrees use the π/180 factor.
 */
export const toRadians = (theta: number, unit: string = DEFAULT_ANGLE_UNIT): number =>
  parseAngleUnit(unit) === 'degrees' ? glMatrix.toRadian(theta) : theta;

export const sin = (theta: number, unit: string = DEFAULT_ANGLE_UNIT): number =>
  Math.sin(toRadians(theta, unit));

export const cos = (theta: number, unit: string = DEFAULT_ANGLE_UNIT): number =>
  Math.cos(toRadians(theta, unit));

export const tan = (theta: number, unit: string = DEFAULT_ANGLE_UNIT): number =>
  Math.tan(toRadians(theta, unit));

/**
 * Secant (1 / cos)
 */
export function sec(theta: number, unit: string = DEFAULT_ANGLE_UNIT): number {
  const c = cos(theta, unit);
  if (c === 0) {
    throw new InvalidArgumentError('sec() undefined when cos(theta) = 0');
  }
  return 1 / c;
}

/**
 * Cosecant (1 / sin)
 */
export function cosec(theta: number, unit: string = DEFAULT_ANGLE_UNIT): number {
  const s = sin(theta, unit);
  if (s === 0) {
    throw new InvalidArgumentError('cosec() undefined when sin(theta) = 0');
  }
  return 1 / s;
}

/**
 * Cotangent (1 / tan)
 */
export function cot(theta: number, unit: string = DEFAULT_ANGLE_UNIT): number {
  const t = tan(theta, unit);
  if (t === 0) {
    throw new InvalidArgumentError('cot() undefined when tan(theta) = 0');
  }
  return 1 / t;
}

// ==================== Logarithms & Number Theory ====================

export function log(x: number, base: number = 10): number {
  if (x <= 0) {
    throw new InvalidArgumentError('log() only defined for positive numbers');
  }
  if (base <= 0 || base === 1) {
    throw new InvalidArgumentError(`log() base must be positive and not 1 (got ${base})`);
  }
  if (base === 10) return Math.log10(x);
  if (base === 2) return Math.log2(x);
  return Math.log(x) / Math.log(base);
}

/**
 * Greatest common divisor (always non-negative; gcd(0, 0) = 0)
 */
export function gcd(a: number, b: number): number {
  if (!Number.isInteger(a) || !Number.isInteger(b)) {
    throw new InvalidArgumentError(`gcd() only accepts integers (got ${a}, ${b})`);
  }
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    [x, y] = [y, x % y];
  }
  return x;
}

/**
 * Least common multiple (lcm(0, n) = 0)
 */
export function lcm(a: number, b: number): number {
  const divisor = gcd(a, b);
  if (divisor === 0) return 0;
  return Math.abs((a / divisor) * b);
}
