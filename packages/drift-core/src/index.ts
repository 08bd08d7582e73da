export * from './detector';
export { chiSquareSurvival, chiSquareTest } from './stats/chi-square';
export { gammaP, gammaQ, lnGamma } from './stats/gamma';
export { kolmogorovSurvival, ksStatistic, ksTest } from './stats/ks';
export type { TestResult } from './stats/ks';
