import { detectDrift, type DatasetDriftSummary } from '@vigil/drift-core';
import type { Config } from './config';
import type { Store } from './db';
import { CycleInProgressError, ReferenceDataError } from './errors';
import { dispatchAlert, type AlertOutcome } from './alert-dispatcher';
import { log, type Logger } from './logger';
import { buildMetricRecords, recordMetrics } from './metrics-recorder';
import type { ReferenceSource } from './reference';
import { cycleDuration, cyclesTotal } from './telemetry';
import { fetchWindow, type FetchStatus } from './window-fetcher';

export type CycleState =
  | 'idle'
  | 'loading_reference'
  | 'fetching_window'
  | 'skipped_empty'
  | 'detecting'
  | 'persisting'
  | 'alerting';

export type SkipReason = 'empty_window' | 'store_unavailable' | 'store_error';

export type CycleWindow = { start: Date; end: Date; rows: number };

export type CycleOutcome =
  | { status: 'skipped'; reason: SkipReason; window: CycleWindow }
  | {
      status: 'completed';
      window: CycleWindow;
      summary: DatasetDriftSummary;
      persisted: boolean;
      alert: AlertOutcome;
    };

export type JobConfig = Pick<
  Config,
  | 'modelVersion'
  | 'lookbackHours'
  | 'webhookUrl'
  | 'driftAlertThreshold'
  | 'features'
  | 'significance'
  | 'driftShareThreshold'
  | 'alertTimeoutMs'
>;

export type MonitoringJobDeps = {
  store: Store;
  reference: ReferenceSource;
  config: JobConfig;
  logger?: Logger;
  now?: () => Date;
};

const SKIP_REASONS: Record<FetchStatus, SkipReason> = {
  ok: 'empty_window',
  store_unavailable: 'store_unavailable',
  store_error: 'store_error',
};

/**
 * One batch cycle per call: reference, window, detection, persistence,
 * alerting. Nothing but configuration and collaborators survives between
 * calls; a second call while one is running is refused.
 */
export class MonitoringJob {
  private state: CycleState = 'idle';
  private readonly logger: Logger;
  // collaborators add their own component binding on top of this one
  private readonly baseLogger: Logger;

  constructor(private readonly deps: MonitoringJobDeps) {
    this.baseLogger = deps.logger ?? log;
    this.logger = this.baseLogger.child({ component: 'orchestrator' });
  }

  get currentState(): CycleState {
    return this.state;
  }

  get running(): boolean {
    return this.state !== 'idle';
  }

  private transition(next: CycleState, fields: Record<string, unknown> = {}) {
    this.logger.info({ from: this.state, to: next, ...fields }, 'cycle state');
    this.state = next;
  }

  async runCycle(): Promise<CycleOutcome> {
    if (this.running) throw new CycleInProgressError();
    const { store, reference, config } = this.deps;
    const stopTimer = cycleDuration.startTimer();
    this.logger.info({ modelVersion: config.modelVersion }, 'starting batch monitoring cycle');
    try {
      this.transition('loading_reference', { location: reference.location });
      const referenceRows = await reference.load(config.features);

      this.transition('fetching_window', { lookbackHours: config.lookbackHours });
      const win = await fetchWindow(store, {
        lookbackHours: config.lookbackHours,
        features: config.features,
        now: this.deps.now,
        logger: this.baseLogger,
      });
      const window: CycleWindow = { start: win.start, end: win.end, rows: win.records.length };

      if (win.records.length === 0) {
        const reason = SKIP_REASONS[win.status];
        this.transition('skipped_empty', { reason });
        cyclesTotal.inc({ outcome: `skipped_${reason}` });
        return { status: 'skipped', reason, window };
      }

      this.transition('detecting', { rows: window.rows });
      const summary = detectDrift(referenceRows, win.records, config.features, {
        significance: config.significance,
        driftShareThreshold: config.driftShareThreshold,
      });
      const driftScore = summary.datasetDrift ? 1 : 0;
      this.logger.info(
        { datasetDrift: summary.datasetDrift, drifted: summary.numDriftedFeatures, tested: summary.numTestedFeatures },
        'drift summary',
      );

      this.transition('persisting');
      const records = buildMetricRecords(summary, win, config.modelVersion, this.deps.now?.());
      const recorded = await recordMetrics(store, records, this.baseLogger);

      this.transition('alerting', { persisted: recorded.persisted });
      const alert = await dispatchAlert(
        { numDriftedFeatures: summary.numDriftedFeatures, driftScore, start: win.start, end: win.end },
        {
          webhookUrl: config.webhookUrl,
          threshold: config.driftAlertThreshold,
          timeoutMs: config.alertTimeoutMs,
          logger: this.baseLogger,
        },
      );

      cyclesTotal.inc({ outcome: 'completed' });
      return { status: 'completed', window, summary, persisted: recorded.persisted, alert };
    } catch (err) {
      if (err instanceof ReferenceDataError) {
        cyclesTotal.inc({ outcome: 'failed_reference' });
        this.logger.error({ err, code: err.code }, 'reference data unavailable; aborting cycle');
      } else {
        cyclesTotal.inc({ outcome: 'failed' });
      }
      throw err;
    } finally {
      this.transition('idle');
      stopTimer();
      this.logger.info('monitoring cycle finished');
    }
  }
}
