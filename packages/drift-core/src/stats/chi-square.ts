import { gammaQ } from './gamma';
import type { TestResult } from './ks';

function countBy(values: readonly number[]): Map<number, number> {
  const counts = new Map<number, number>();
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
  return counts;
}

/** Upper tail of the chi-squared distribution with `df` degrees of freedom. */
export function chiSquareSurvival(statistic: number, df: number): number {
  if (df <= 0 || statistic <= 0) return 1;
  return gammaQ(df / 2, statistic / 2);
}

/**
 * Chi-squared test of homogeneity on the 2×K table of category counts.
 * A single shared category leaves no degrees of freedom and is reported as
 * statistic 0, p-value 1.
 */
export function chiSquareTest(sample1: readonly number[], sample2: readonly number[]): TestResult {
  const n1 = sample1.length;
  const n2 = sample2.length;
  if (n1 === 0 || n2 === 0) return { statistic: 0, pValue: 1 };
  const c1 = countBy(sample1);
  const c2 = countBy(sample2);
  const categories = new Set([...c1.keys(), ...c2.keys()]);
  if (categories.size < 2) return { statistic: 0, pValue: 1 };

  const total = n1 + n2;
  let statistic = 0;
  for (const category of categories) {
    const o1 = c1.get(category) ?? 0;
    const o2 = c2.get(category) ?? 0;
    const colTotal = o1 + o2;
    const e1 = (n1 * colTotal) / total;
    const e2 = (n2 * colTotal) / total;
    statistic += (o1 - e1) ** 2 / e1 + (o2 - e2) ** 2 / e2;
  }
  return { statistic, pValue: chiSquareSurvival(statistic, categories.size - 1) };
}
