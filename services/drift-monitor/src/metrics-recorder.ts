import type { QueryResultRow } from 'pg';
import type { DatasetDriftSummary } from '@vigil/drift-core';
import {
  MetricName,
  MonitoringMetricRecord,
  ReportSummary,
  StoredMetric,
} from '@vigil/schemas';
import { toError } from './errors';
import { withTx, type Queryable, type Store } from './db';
import { log, type Logger } from './logger';
import { metricRowsWritten } from './telemetry';

export type WindowBounds = { start: Date; end: Date };

export type RecordResult = { persisted: true; ids: number[] } | { persisted: false; error: Error };

export function reportSummaryOf(summary: DatasetDriftSummary): ReportSummary {
  return {
    rows_checked: summary.rowsCount,
    drifted_features: summary.numDriftedFeatures,
    tested_features: summary.numTestedFeatures,
    drift_share: summary.driftShare,
    features: summary.features
      .filter((f) => f.tested)
      .map((f) => ({ feature: f.feature, test: f.test, statistic: f.statistic, p_value: f.pValue, drifted: f.drifted })),
  };
}

/**
 * The summary row and the volume row. Both carry the same bounds; parsing
 * enforces start < end so a bad window never reaches the store.
 */
export function buildMetricRecords(
  summary: DatasetDriftSummary,
  window: WindowBounds,
  modelVersion: string,
  now: Date = new Date(),
): [MonitoringMetricRecord, MonitoringMetricRecord] {
  const score = summary.datasetDrift ? 1 : 0;
  const common = { timestamp: now, model_version: modelVersion, batch_start_time: window.start, batch_end_time: window.end };
  const driftRow = MonitoringMetricRecord.parse({
    ...common,
    data_drift_score: score,
    num_drifted_features: summary.numDriftedFeatures,
    metric_name: 'data_drift_summary',
    metric_value: score,
    report_summary: reportSummaryOf(summary),
  });
  const countRow = MonitoringMetricRecord.parse({
    ...common,
    data_drift_score: 0,
    num_drifted_features: 0,
    metric_name: 'prediction_count',
    metric_value: summary.rowsCount,
    report_summary: null,
  });
  return [driftRow, countRow];
}

const INSERT_METRIC = `INSERT INTO monitoring_metrics
  (timestamp, data_drift_score, num_drifted_features, metric_name, metric_value, report_summary, model_version, batch_start_time, batch_end_time)
  VALUES ($1, $2, $3, $4, $5, $6::jsonb, $7, $8, $9)
  RETURNING id`;

/**
 * Appends every record in one transaction. Failures roll back and come back
 * as a value: the caller still has to alert on the in-memory summary.
 */
export async function recordMetrics(
  store: Store,
  records: readonly MonitoringMetricRecord[],
  logger: Logger = log,
): Promise<RecordResult> {
  const l = logger.child({ component: 'metrics-recorder' });
  try {
    const ids = await withTx(
      store,
      async (client) => {
        const out: number[] = [];
        for (const r of records) {
          const res = await client.query(INSERT_METRIC, [
            r.timestamp,
            r.data_drift_score,
            r.num_drifted_features,
            r.metric_name,
            r.metric_value,
            r.report_summary === null ? null : JSON.stringify(r.report_summary),
            r.model_version,
            r.batch_start_time,
            r.batch_end_time,
          ]);
          out.push(Number(res.rows[0]?.id));
        }
        return out;
      },
      l,
    );
    metricRowsWritten.inc(ids.length);
    l.info({ ids, metrics: records.map((r) => r.metric_name) }, 'metrics committed');
    return { persisted: true, ids };
  } catch (err) {
    const error = toError(err);
    l.error({ err: error }, 'failed to commit metrics; transaction rolled back');
    return { persisted: false, error };
  }
}

const iso = (v: unknown) => (v instanceof Date ? v.toISOString() : String(v));

function parseSummary(v: unknown): ReportSummary | null {
  if (v === null || v === undefined) return null;
  const raw: unknown = typeof v === 'string' ? JSON.parse(v) : v;
  return ReportSummary.parse(raw);
}

export function toStoredMetric(row: QueryResultRow): StoredMetric {
  return StoredMetric.parse({
    id: Number(row.id),
    timestamp: iso(row.timestamp),
    data_drift_score: Number(row.data_drift_score),
    num_drifted_features: Number(row.num_drifted_features),
    metric_name: MetricName.parse(row.metric_name),
    metric_value: Number(row.metric_value),
    report_summary: parseSummary(row.report_summary),
    model_version: String(row.model_version),
    batch_start_time: iso(row.batch_start_time),
    batch_end_time: iso(row.batch_end_time),
  });
}

/** Newest rows first, as the dashboard reads them. */
export async function getRecentMetrics(store: Queryable, limit: number): Promise<StoredMetric[]> {
  const res = await store.query(
    `SELECT id, timestamp, data_drift_score, num_drifted_features, metric_name, metric_value, report_summary, model_version, batch_start_time, batch_end_time
     FROM monitoring_metrics
     ORDER BY timestamp DESC, id DESC
     LIMIT $1`,
    [limit],
  );
  return res.rows.map(toStoredMetric);
}
