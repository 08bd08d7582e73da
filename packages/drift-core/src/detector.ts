import { z } from 'zod';
import type { FeatureKind, FeatureSpec } from '@vigil/schemas';
import { chiSquareTest } from './stats/chi-square';
import { ksTest } from './stats/ks';

export type DriftTestName = 'ks' | 'chi_square';

export type FeatureDriftResult = {
  feature: string;
  kind: FeatureKind;
  test: DriftTestName;
  statistic: number;
  pValue: number;
  drifted: boolean;
  /** False when either sample had no values; such features stay out of the share. */
  tested: boolean;
  referenceSize: number;
  currentSize: number;
};

export type DatasetDriftSummary = {
  datasetDrift: boolean;
  numDriftedFeatures: number;
  numTestedFeatures: number;
  driftShare: number;
  rowsCount: number;
  features: FeatureDriftResult[];
};

/** Anything carrying a feature map: production records and reference rows alike. */
export type FeatureRow = {
  features: Readonly<Partial<Record<string, number | null>>>;
};

export const DriftOptions = z.object({
  significance: z.number().gt(0).lt(1).default(0.05),
  driftShareThreshold: z.number().min(0).lt(1).default(0.5),
});
export type DriftOptions = z.input<typeof DriftOptions>;

const TESTS: Record<FeatureKind, { name: DriftTestName; run: typeof ksTest }> = {
  numeric: { name: 'ks', run: ksTest },
  categorical: { name: 'chi_square', run: chiSquareTest },
};

export function columnValues(rows: readonly FeatureRow[], feature: string): number[] {
  const out: number[] = [];
  for (const row of rows) {
    const v = row.features[feature];
    if (typeof v === 'number' && Number.isFinite(v)) out.push(v);
  }
  return out;
}

export function testFeature(
  spec: FeatureSpec,
  reference: readonly FeatureRow[],
  current: readonly FeatureRow[],
  significance: number,
): FeatureDriftResult {
  const test = TESTS[spec.kind];
  const ref = columnValues(reference, spec.name);
  const cur = columnValues(current, spec.name);
  const base = { feature: spec.name, kind: spec.kind, test: test.name, referenceSize: ref.length, currentSize: cur.length };
  if (ref.length === 0 || cur.length === 0) {
    return { ...base, statistic: 0, pValue: 1, drifted: false, tested: false };
  }
  const { statistic, pValue } = test.run(ref, cur);
  return { ...base, statistic, pValue, drifted: pValue < significance, tested: true };
}

/** Strict majority by default: the share has to exceed the threshold, not reach it. */
export function isDatasetDrift(numDrifted: number, numTested: number, driftShareThreshold: number): boolean {
  if (numTested === 0) return false;
  return numDrifted / numTested > driftShareThreshold;
}

export function detectDrift(
  reference: readonly FeatureRow[],
  current: readonly FeatureRow[],
  features: readonly FeatureSpec[],
  options: DriftOptions = {},
): DatasetDriftSummary {
  const { significance, driftShareThreshold } = DriftOptions.parse(options);
  const results = features.map((spec) => testFeature(spec, reference, current, significance));
  const numTestedFeatures = results.filter((r) => r.tested).length;
  const numDriftedFeatures = results.filter((r) => r.drifted).length;
  return {
    datasetDrift: isDatasetDrift(numDriftedFeatures, numTestedFeatures, driftShareThreshold),
    numDriftedFeatures,
    numTestedFeatures,
    driftShare: numTestedFeatures === 0 ? 0 : numDriftedFeatures / numTestedFeatures,
    rowsCount: current.length,
    features: results,
  };
}
