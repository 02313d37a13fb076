import { describe, it, expect } from 'vitest';
import { InvalidArgumentError, InvalidUnitError } from '../errors';
import {
  cos,
  cosec,
  cot,
  factorial,
  gcd,
  lcm,
  log,
  parseAngleUnit,
  power,
  sec,
  sin,
  sqrt,
  tan,
  toRadians,
} from './mathUtils';

describe('factorial', () => {
  it('returns 1 for 0 and 1', () => {
    expect(factorial(0)).toBe(1);
    expect(factorial(1)).toBe(1);
  });

  it('computes small factorials exactly', () => {
    expect(factorial(5)).toBe(120);
    expect(factorial(10)).toBe(3628800);
  });

  it('rejects negative numbers', () => {
    expect(() => factorial(-1)).toThrow(InvalidArgumentError);
  });

  it('rejects non-integers', () => {
    expect(() => factorial(2.5)).toThrow(InvalidArgumentError);
  });
});

describe('power and sqrt', () => {
  it('raises to a power', () => {
    expect(power(2, 10)).toBe(1024);
    expect(power(4, 0.5)).toBe(2);
  });

  it('takes square roots', () => {
    expect(sqrt(16)).toBe(4);
    expect(sqrt(0)).toBe(0);
  });

  it('rejects negative square roots', () => {
    expect(() => sqrt(-1)).toThrow(InvalidArgumentError);
  });
});

describe('angle units', () => {
  it('normalizes unit names case-insensitively', () => {
    expect(parseAngleUnit('Degrees')).toBe('degrees');
    expect(parseAngleUnit('RADIANS')).toBe('radians');
  });

  it('rejects unknown units and reports the offending value', () => {
    expect(() => parseAngleUnit('turns')).toThrow(InvalidUnitError);
    expect(() => parseAngleUnit('turns')).toThrow("got 'turns'");
  });

  it('converts degrees with the pi/180 factor', () => {
    expect(toRadians(180, 'degrees')).toBeCloseTo(Math.PI, 12);
  });

  it('passes radians through unchanged', () => {
    expect(toRadians(1.5)).toBe(1.5);
  });
});

describe('trigonometry', () => {
  it('defaults to radians', () => {
    expect(sin(Math.PI / 2)).toBeCloseTo(1, 12);
    expect(cos(0)).toBe(1);
  });

  it('accepts degrees', () => {
    expect(sin(30, 'degrees')).toBeCloseTo(0.5, 12);
    expect(cos(60, 'degrees')).toBeCloseTo(0.5, 12);
    expect(tan(45, 'degrees')).toBeCloseTo(1, 12);
  });

  it('computes reciprocal functions', () => {
    expect(sec(0)).toBe(1);
    expect(cosec(90, 'degrees')).toBeCloseTo(1, 12);
    expect(cot(45, 'degrees')).toBeCloseTo(1, 12);
    expect(sec(60, 'degrees')).toBeCloseTo(2, 12);
  });

  it('rejects reciprocals of an exact zero', () => {
    expect(() => cosec(0)).toThrow(InvalidArgumentError);
    expect(() => cot(0)).toThrow(InvalidArgumentError);
  });

  it('rejects unknown units', () => {
    expect(() => sin(1, 'grad')).toThrow(InvalidUnitError);
  });
});

describe('log', () => {
  it('defaults to base 10', () => {
    expect(log(1000)).toBe(3);
  });

  it('accepts other bases', () => {
    expect(log(8, 2)).toBe(3);
    expect(log(Math.E ** 2, Math.E)).toBeCloseTo(2, 12);
    expect(log(81, 3)).toBeCloseTo(4, 12);
  });

  it('rejects non-positive arguments', () => {
    expect(() => log(0)).toThrow(InvalidArgumentError);
    expect(() => log(-5)).toThrow(InvalidArgumentError);
  });

  it('rejects invalid bases', () => {
    expect(() => log(10, 1)).toThrow(InvalidArgumentError);
    expect(() => log(10, 0)).toThrow(InvalidArgumentError);
  });
});

describe('gcd and lcm', () => {
  it('computes the greatest common divisor', () => {
    expect(gcd(12, 18)).toBe(6);
    expect(gcd(17, 5)).toBe(1);
  });

  it('ignores signs', () => {
    expect(gcd(-12, 18)).toBe(6);
  });

  it('treats zero as divisible by everything', () => {
    expect(gcd(0, 7)).toBe(7);
    expect(gcd(0, 0)).toBe(0);
  });

  it('rejects non-integers', () => {
    expect(() => gcd(1.5, 3)).toThrow(InvalidArgumentError);
  });

  it('computes the least common multiple', () => {
    expect(lcm(4, 6)).toBe(12);
    expect(lcm(-4, 6)).toBe(12);
    expect(lcm(0, 5)).toBe(0);
  });

  it('divides before multiplying to stay exact for large inputs', () => {
    expect(lcm(123456789 * 7, 123456789 * 11)).toBe(9506172753);
    expect(lcm(1e200, 1e200)).toBe(1e200);
  });
});
