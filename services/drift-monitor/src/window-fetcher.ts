import type { QueryResultRow } from 'pg';
import type { FeatureRecord, FeatureSpec, FeatureValues } from '@vigil/schemas';
import { isTransientStoreError, type Queryable } from './db';
import { log, type Logger } from './logger';

export type FetchStatus = 'ok' | 'store_unavailable' | 'store_error';

export type DriftWindow = {
  start: Date;
  end: Date;
  records: FeatureRecord[];
  status: FetchStatus;
};

export type FetchWindowOptions = {
  lookbackHours: number;
  features: readonly FeatureSpec[];
  now?: () => Date;
  logger?: Logger;
};

const HOUR_MS = 60 * 60 * 1000;

// Feature names are validated identifiers; quoting keeps mixed-case or
// keyword-like names intact.
const quoteIdent = (name: string) => `"${name.replace(/"/g, '""')}"`;

export function buildWindowQuery(features: readonly FeatureSpec[]): string {
  const cols = [...features.map((f) => quoteIdent(f.name)), 'prediction', 'target', 'model_version', 'prediction_time'];
  return `SELECT ${cols.join(', ')}
     FROM prediction_logs
     WHERE prediction_time >= $1 AND prediction_time < $2
     ORDER BY prediction_time`;
}

export function toNumberOrNull(v: unknown): number | null {
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function toRecord(row: QueryResultRow, features: readonly FeatureSpec[]): FeatureRecord {
  const values: FeatureValues = {};
  for (const { name } of features) values[name] = toNumberOrNull(row[name]);
  return {
    features: values,
    prediction: toNumberOrNull(row.prediction),
    target: toNumberOrNull(row.target),
    prediction_time: row.prediction_time instanceof Date ? row.prediction_time : new Date(String(row.prediction_time)),
    model_version: typeof row.model_version === 'string' ? row.model_version : '',
  };
}

/**
 * Records with prediction_time in [end - lookback, end). Store failures
 * degrade to an empty window carrying the same bounds; this never throws.
 */
export async function fetchWindow(store: Queryable, opts: FetchWindowOptions): Promise<DriftWindow> {
  const logger = (opts.logger ?? log).child({ component: 'window-fetcher' });
  const end = (opts.now ?? (() => new Date()))();
  const start = new Date(end.getTime() - opts.lookbackHours * HOUR_MS);
  logger.info({ start: start.toISOString(), end: end.toISOString() }, 'fetching production window');

  try {
    const res = await store.query(buildWindowQuery(opts.features), [start, end]);
    const records = res.rows.map((r) => toRecord(r, opts.features));
    logger.info({ rows: records.length }, 'fetched records for monitoring');
    return { start, end, records, status: 'ok' };
  } catch (err) {
    if (isTransientStoreError(err)) {
      logger.warn({ err }, 'store unavailable; window treated as empty');
      return { start, end, records: [], status: 'store_unavailable' };
    }
    logger.error({ err }, 'unexpected error fetching window; window treated as empty');
    return { start, end, records: [], status: 'store_error' };
  }
}
