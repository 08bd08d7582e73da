import client from 'prom-client';

export const registry = new client.Registry();
client.collectDefaultMetrics({ register: registry });

export const cyclesTotal = new client.Counter({
  name: 'drift_cycles_total',
  help: 'Monitoring cycles by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const metricRowsWritten = new client.Counter({
  name: 'drift_metric_rows_written_total',
  help: 'Rows committed to monitoring_metrics',
  registers: [registry],
});

export const alertsTotal = new client.Counter({
  name: 'drift_alerts_total',
  help: 'Alert decisions by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const cycleDuration = new client.Histogram({
  name: 'drift_cycle_duration_seconds',
  help: 'Wall time of one monitoring cycle',
  buckets: [0.1, 0.5, 1, 2.5, 5, 10, 30, 60, 120],
  registers: [registry],
});
