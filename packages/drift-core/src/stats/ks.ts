export type TestResult = {
  statistic: number;
  pValue: number;
};

const byValue = (a: number, b: number) => a - b;

/**
 * Largest vertical gap between the two empirical CDFs. Ties are consumed on
 * both sides before the gap is measured, so identical samples give 0.
 */
export function ksStatistic(sample1: readonly number[], sample2: readonly number[]): number {
  const x = [...sample1].sort(byValue);
  const y = [...sample2].sort(byValue);
  const n = x.length;
  const m = y.length;
  if (n === 0 || m === 0) return 0;
  let i = 0;
  let j = 0;
  let d = 0;
  while (i < n && j < m) {
    const v = Math.min(x[i], y[j]);
    while (i < n && x[i] <= v) i++;
    while (j < m && y[j] <= v) j++;
    d = Math.max(d, Math.abs(i / n - j / m));
  }
  return d;
}

/**
 * Survival function of the Kolmogorov distribution,
 * Q(λ) = 2 Σ (-1)^(k-1) exp(-2 k² λ²). The alternating series does not
 * converge near zero, where the probability is 1.
 */
export function kolmogorovSurvival(lambda: number): number {
  if (lambda <= 0) return 1;
  const a2 = -2 * lambda * lambda;
  let fac = 2;
  let sum = 0;
  let prev = 0;
  for (let k = 1; k <= 100; k++) {
    const term = fac * Math.exp(a2 * k * k);
    sum += term;
    if (Math.abs(term) <= 0.001 * prev || Math.abs(term) <= 1e-8 * sum) {
      return Math.min(1, Math.max(0, sum));
    }
    fac = -fac;
    prev = Math.abs(term);
  }
  return 1;
}

/** Two-sample Kolmogorov–Smirnov test with the Stephens small-sample correction. */
export function ksTest(sample1: readonly number[], sample2: readonly number[]): TestResult {
  const statistic = ksStatistic(sample1, sample2);
  if (statistic === 0) return { statistic, pValue: 1 };
  const n = sample1.length;
  const m = sample2.length;
  const en = Math.sqrt((n * m) / (n + m));
  const pValue = kolmogorovSurvival((en + 0.12 + 0.11 / en) * statistic);
  return { statistic, pValue };
}
