import { AlertPayload } from '@vigil/schemas';
import { toError } from './errors';
import { log, type Logger } from './logger';
import { alertsTotal } from './telemetry';

export type AlertOutcome = 'not_triggered' | 'not_configured' | 'sent' | 'failed';

export type DriftAlert = {
  numDriftedFeatures: number;
  driftScore: number;
  start: Date;
  end: Date;
};

export type AlertOptions = {
  webhookUrl: string | null;
  threshold: number;
  timeoutMs: number;
  logger?: Logger;
};

export const ALERT_USERNAME = 'Vigil Drift Bot';
export const ALERT_ICON = ':warning:';

/** Strictly greater: a threshold of 2 tolerates two drifted features. */
export function shouldAlert(numDriftedFeatures: number, threshold: number): boolean {
  return numDriftedFeatures > threshold;
}

const pad = (n: number) => String(n).padStart(2, '0');

/** Local wall-clock time, YYYY-MM-DD HH:mm:ss. */
export function formatTimestamp(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

export function formatAlertMessage(alert: DriftAlert): string {
  return [
    ':rotating_light: Data Drift Detected!',
    `Drifted Features: ${alert.numDriftedFeatures}`,
    `Drift Score: ${alert.driftScore.toFixed(4)}`,
    `Window: ${formatTimestamp(alert.start)} -> ${formatTimestamp(alert.end)}`,
  ].join('\n');
}

async function postWebhook(url: string, text: string, timeoutMs: number, logger: Logger): Promise<AlertOutcome> {
  const payload = AlertPayload.parse({ username: ALERT_USERNAME, icon_emoji: ALERT_ICON, text });
  try {
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!res.ok) {
      const body = await res.text().catch(() => '');
      logger.warn({ status: res.status, body }, 'alert webhook rejected the notification');
      return 'failed';
    }
    logger.info('drift alert sent');
    return 'sent';
  } catch (err) {
    logger.warn({ err: toError(err) }, 'error sending drift alert');
    return 'failed';
  }
}

/** Best effort: one attempt, never throws. */
export async function dispatchAlert(alert: DriftAlert, opts: AlertOptions): Promise<AlertOutcome> {
  const logger = (opts.logger ?? log).child({ component: 'alert-dispatcher' });
  let outcome: AlertOutcome;
  if (!shouldAlert(alert.numDriftedFeatures, opts.threshold)) {
    outcome = 'not_triggered';
  } else if (!opts.webhookUrl) {
    logger.info('webhook not configured; skipping drift alert');
    outcome = 'not_configured';
  } else {
    outcome = await postWebhook(opts.webhookUrl, formatAlertMessage(alert), opts.timeoutMs, logger);
  }
  alertsTotal.inc({ outcome });
  return outcome;
}
