import { describe, it, expect } from 'vitest';
import { FeatureSpec, FeatureSpecList, MonitoringMetricRecord, StoredMetric } from './index';

const start = new Date('2024-03-09T12:00:00.000Z');
const end = new Date('2024-03-10T12:00:00.000Z');

const countRow = {
  timestamp: end,
  data_drift_score: 0,
  num_drifted_features: 0,
  metric_name: 'prediction_count',
  metric_value: 42,
  report_summary: null,
  model_version: 'v1.0',
  batch_start_time: start,
  batch_end_time: end,
};

describe('FeatureSpec', () => {
  it('defaults the kind to numeric', () => {
    expect(FeatureSpec.parse({ name: 'feature_1' })).toEqual({ name: 'feature_1', kind: 'numeric' });
  });

  it('rejects reserved columns and non-identifier names', () => {
    expect(FeatureSpec.safeParse({ name: 'prediction' }).success).toBe(false);
    expect(FeatureSpec.safeParse({ name: 'target' }).success).toBe(false);
    expect(FeatureSpec.safeParse({ name: 'Feature-1' }).success).toBe(false);
    expect(FeatureSpec.safeParse({ name: '__proto__' }).success).toBe(false);
    expect(FeatureSpec.safeParse({ name: 'x; DROP TABLE prediction_logs' }).success).toBe(false);
  });
});

describe('FeatureSpecList', () => {
  it('needs at least one feature and unique names', () => {
    expect(FeatureSpecList.safeParse([]).success).toBe(false);
    expect(FeatureSpecList.safeParse([{ name: 'a' }, { name: 'a', kind: 'categorical' }]).success).toBe(false);
    expect(FeatureSpecList.parse([{ name: 'a' }, { name: 'b', kind: 'categorical' }])).toHaveLength(2);
  });
});

describe('MonitoringMetricRecord', () => {
  it('accepts a well-formed count row', () => {
    expect(MonitoringMetricRecord.parse(countRow)).toEqual(countRow);
  });

  it('rejects empty or inverted windows', () => {
    expect(MonitoringMetricRecord.safeParse({ ...countRow, batch_start_time: end }).success).toBe(false);
    const inverted = MonitoringMetricRecord.safeParse({ ...countRow, batch_start_time: end, batch_end_time: start });
    expect(inverted.success).toBe(false);
    if (!inverted.success) expect(inverted.error.issues[0].path).toEqual(['batch_start_time']);
  });

  it('only takes 0 or 1 as a drift score', () => {
    expect(MonitoringMetricRecord.safeParse({ ...countRow, data_drift_score: 0.5 }).success).toBe(false);
  });
});

describe('StoredMetric', () => {
  it('carries timestamps as strings', () => {
    const wire = { ...countRow, id: 7, timestamp: end.toISOString(), batch_start_time: start.toISOString(), batch_end_time: end.toISOString() };
    expect(StoredMetric.parse(wire).id).toBe(7);
    expect(StoredMetric.safeParse({ ...wire, timestamp: end }).success).toBe(false);
  });
});
