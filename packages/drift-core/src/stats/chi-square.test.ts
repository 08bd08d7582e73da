import { describe, it, expect } from 'vitest';
import { chiSquareSurvival, chiSquareTest } from './chi-square';
import { gammaP, gammaQ, lnGamma } from './gamma';

const repeat = (value: number, times: number) => Array.from({ length: times }, () => value);

describe('gamma functions', () => {
  it('lnGamma matches factorials', () => {
    expect(lnGamma(5)).toBeCloseTo(Math.log(24), 8);
    expect(lnGamma(0.5)).toBeCloseTo(Math.log(Math.sqrt(Math.PI)), 8);
  });

  it('Q(1, x) is exp(-x)', () => {
    expect(gammaQ(1, 2)).toBeCloseTo(Math.exp(-2), 8);
    expect(gammaQ(1, 0.3)).toBeCloseTo(Math.exp(-0.3), 8);
  });

  it('P(0.5, x) is erf(sqrt(x))', () => {
    expect(gammaP(0.5, 1)).toBeCloseTo(0.8427007929, 8);
  });

  it('handles the x <= 0 boundary', () => {
    expect(gammaP(2, 0)).toBe(0);
    expect(gammaQ(2, 0)).toBe(1);
  });

  it('rejects a non-positive shape', () => {
    expect(() => gammaQ(0, 1)).toThrow(RangeError);
  });
});

describe('chiSquareSurvival', () => {
  it('with two degrees of freedom is exp(-x/2)', () => {
    expect(chiSquareSurvival(4, 2)).toBeCloseTo(Math.exp(-2), 8);
  });

  it('is 1 without degrees of freedom', () => {
    expect(chiSquareSurvival(10, 0)).toBe(1);
  });
});

describe('chiSquareTest', () => {
  it('computes the homogeneity statistic on a 2x2 table', () => {
    const ref = [...repeat(0, 10), ...repeat(1, 10)];
    const cur = repeat(0, 20);
    const { statistic, pValue } = chiSquareTest(ref, cur);
    expect(statistic).toBeCloseTo(40 / 3, 8);
    expect(pValue).toBeLessThan(0.001);
    expect(pValue).toBeGreaterThan(0.0001);
  });

  it('gives p = 1 for identical frequencies', () => {
    const sample = [0, 1, 2, 2, 1, 0];
    expect(chiSquareTest(sample, [...sample].reverse())).toEqual({ statistic: 0, pValue: 1 });
  });

  it('gives p = 1 when only one category exists', () => {
    expect(chiSquareTest(repeat(3, 5), repeat(3, 8))).toEqual({ statistic: 0, pValue: 1 });
  });

  it('gives p = 1 for an empty sample', () => {
    expect(chiSquareTest([], [1, 2])).toEqual({ statistic: 0, pValue: 1 });
  });
});
