import { z } from 'zod';

// Columns of prediction_logs that are never treated as input features.
export const RESERVED_COLUMNS = ['id', 'prediction', 'target', 'prediction_time', 'model_version'] as const;

const reserved: readonly string[] = RESERVED_COLUMNS;

export const FeatureKind = z.enum(['numeric', 'categorical']);
export type FeatureKind = z.infer<typeof FeatureKind>;

export const FeatureSpec = z.object({
  name: z
    .string()
    .regex(/^[a-z_][a-z0-9_]*$/, 'feature names must be lower snake case identifiers')
    .refine((name) => !reserved.includes(name), {
      message: 'prediction, label and bookkeeping columns cannot be declared as features',
    })
    // assigning this key on a plain object never stores a value
    .refine((name) => name !== '__proto__', { message: '__proto__ cannot be used as a feature name' }),
  kind: FeatureKind.default('numeric'),
});
export type FeatureSpec = z.infer<typeof FeatureSpec>;

export const FeatureSpecList = z
  .array(FeatureSpec)
  .min(1)
  .refine((specs) => new Set(specs.map((s) => s.name)).size === specs.length, { message: 'feature names must be unique' });

export const FeatureValues = z.record(z.number().nullable());
export type FeatureValues = z.infer<typeof FeatureValues>;

export const FeatureRecord = z.object({
  features: FeatureValues,
  prediction: z.number().nullable(),
  target: z.number().nullable().optional(),
  prediction_time: z.date(),
  model_version: z.string(),
});
export type FeatureRecord = z.infer<typeof FeatureRecord>;

export const ReferenceRow = z.object({
  features: FeatureValues,
  prediction: z.number().nullable().optional(),
  target: z.number().nullable().optional(),
});
export type ReferenceRow = z.infer<typeof ReferenceRow>;

export const MetricName = z.enum(['data_drift_summary', 'prediction_count']);
export type MetricName = z.infer<typeof MetricName>;

export const FeatureReport = z.object({
  feature: z.string(),
  test: z.enum(['ks', 'chi_square']),
  statistic: z.number(),
  p_value: z.number().min(0).max(1),
  drifted: z.boolean(),
});

export const ReportSummary = z.object({
  rows_checked: z.number().int().nonnegative(),
  drifted_features: z.number().int().nonnegative(),
  tested_features: z.number().int().nonnegative(),
  drift_share: z.number().min(0).max(1),
  features: z.array(FeatureReport),
});
export type ReportSummary = z.infer<typeof ReportSummary>;

export const MonitoringMetricRecord = z
  .object({
    timestamp: z.date(),
    data_drift_score: z.union([z.literal(0), z.literal(1)]),
    num_drifted_features: z.number().int().nonnegative(),
    metric_name: MetricName,
    metric_value: z.number(),
    report_summary: ReportSummary.nullable(),
    model_version: z.string().min(1),
    batch_start_time: z.date(),
    batch_end_time: z.date(),
  })
  .refine((r) => r.batch_start_time.getTime() < r.batch_end_time.getTime(), {
    message: 'batch_start_time must precede batch_end_time',
    path: ['batch_start_time'],
  });
export type MonitoringMetricRecord = z.infer<typeof MonitoringMetricRecord>;

// Wire shape of a persisted row as the dashboard reads it.
export const StoredMetric = z.object({
  id: z.number().int(),
  timestamp: z.string(),
  data_drift_score: z.number(),
  num_drifted_features: z.number().int(),
  metric_name: MetricName,
  metric_value: z.number(),
  report_summary: ReportSummary.nullable(),
  model_version: z.string(),
  batch_start_time: z.string(),
  batch_end_time: z.string(),
});
export type StoredMetric = z.infer<typeof StoredMetric>;

export const AlertPayload = z.object({
  username: z.string(),
  icon_emoji: z.string(),
  text: z.string().min(1),
});
export type AlertPayload = z.infer<typeof AlertPayload>;
