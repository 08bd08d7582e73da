import type { QueryResultRow } from 'pg';
import type { Store, StoreClient, StoreResult } from '../db';

export type LogRow = {
  features: Record<string, number | null>;
  prediction?: number | null;
  target?: number | null;
  prediction_time: Date;
  model_version?: string;
};

type Tx = { open: boolean; pending: QueryResultRow[] };

/**
 * In-process stand-in for the two Postgres tables the monitor touches. It
 * understands exactly the statements the service issues.
 */
export class FakeStore implements Store {
  readonly predictionLogs: QueryResultRow[] = [];
  readonly metrics: QueryResultRow[] = [];
  readonly statements: string[] = [];
  released = 0;
  ended = false;
  failWhen: ((text: string) => Error | undefined) | undefined;
  private nextId = 1;

  addLogs(rows: LogRow[]): void {
    for (const r of rows) {
      this.predictionLogs.push({
        ...r.features,
        prediction: r.prediction ?? null,
        target: r.target ?? null,
        prediction_time: r.prediction_time,
        model_version: r.model_version ?? 'v1.0',
      });
    }
  }

  async query(text: string, values?: unknown[]): Promise<StoreResult> {
    return this.exec(text, values, null);
  }

  async connect(): Promise<StoreClient> {
    const tx: Tx = { open: false, pending: [] };
    return {
      query: async (text, values) => this.exec(text, values, tx),
      release: () => {
        this.released++;
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  private exec(text: string, values: unknown[] = [], tx: Tx | null): StoreResult {
    const verb = text.trim().split(/\s+/)[0].toUpperCase();
    this.statements.push(verb);
    const failure = this.failWhen?.(text);
    if (failure) throw failure;

    if (verb === 'BEGIN' && tx) {
      tx.open = true;
      tx.pending = [];
      return { rows: [], rowCount: null };
    }
    if (verb === 'COMMIT' && tx) {
      this.metrics.push(...tx.pending);
      tx.open = false;
      tx.pending = [];
      return { rows: [], rowCount: null };
    }
    if (verb === 'ROLLBACK' && tx) {
      tx.open = false;
      tx.pending = [];
      return { rows: [], rowCount: null };
    }
    if (verb === 'INSERT' && text.includes('monitoring_metrics')) {
      const [timestamp, score, drifted, name, value, summary, modelVersion, start, end] = values;
      const row = {
        id: this.nextId++,
        timestamp,
        data_drift_score: score,
        num_drifted_features: drifted,
        metric_name: name,
        metric_value: value,
        report_summary: typeof summary === 'string' ? JSON.parse(summary) : null,
        model_version: modelVersion,
        batch_start_time: start,
        batch_end_time: end,
      };
      if (tx?.open) tx.pending.push(row);
      else this.metrics.push(row);
      return { rows: [{ id: row.id }], rowCount: 1 };
    }
    if (verb === 'SELECT' && text.includes('FROM prediction_logs')) {
      const [from, to] = values;
      if (!(from instanceof Date) || !(to instanceof Date)) throw new Error('window bounds must be dates');
      const rows = this.predictionLogs
        .filter((r) => r.prediction_time >= from && r.prediction_time < to)
        .sort((a, b) => a.prediction_time.getTime() - b.prediction_time.getTime());
      return { rows, rowCount: rows.length };
    }
    if (verb === 'SELECT' && text.includes('FROM monitoring_metrics')) {
      const [limit] = values;
      const rows = [...this.metrics]
        .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime() || b.id - a.id)
        .slice(0, typeof limit === 'number' ? limit : undefined);
      return { rows, rowCount: rows.length };
    }
    throw new Error(`FakeStore does not understand: ${text}`);
  }
}
