import { describe, it, expect } from 'vitest';
import { kolmogorovSurvival, ksStatistic, ksTest } from './ks';

describe('ksStatistic', () => {
  it('measures the largest gap between empirical CDFs', () => {
    expect(ksStatistic([1, 2, 3, 4], [3, 4, 5, 6])).toBe(0.5);
  });

  it('is 0 for identical samples, ties included', () => {
    expect(ksStatistic([1, 1, 2, 3], [3, 2, 1, 1])).toBe(0);
  });

  it('is 1 for fully separated samples', () => {
    expect(ksStatistic([0, 1, 2], [10, 11, 12, 13])).toBe(1);
  });

  it('is 0 when a sample is empty', () => {
    expect(ksStatistic([], [1, 2])).toBe(0);
  });
});

describe('kolmogorovSurvival', () => {
  it('matches the tabulated value at 1.0', () => {
    expect(kolmogorovSurvival(1)).toBeCloseTo(0.27, 4);
  });

  it('is 1 at and near zero', () => {
    expect(kolmogorovSurvival(0)).toBe(1);
    expect(kolmogorovSurvival(0.01)).toBe(1);
  });

  it('falls towards 0 for large arguments', () => {
    expect(kolmogorovSurvival(3)).toBeLessThan(1e-6);
  });
});

describe('ksTest', () => {
  it('gives p = 1 for identical samples', () => {
    const sample = [0.5, 1.5, 2.5, 3.5];
    expect(ksTest(sample, [...sample])).toEqual({ statistic: 0, pValue: 1 });
  });

  it('gives a vanishing p-value for disjoint ranges', () => {
    const ref = Array.from({ length: 100 }, (_, i) => i / 10);
    const cur = ref.map((v) => v + 50);
    const { statistic, pValue } = ksTest(ref, cur);
    expect(statistic).toBe(1);
    expect(pValue).toBeLessThan(1e-20);
  });
});
