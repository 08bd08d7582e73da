import { z } from 'zod';
import { StoredMetric } from '@vigil/schemas';
import type { Queryable } from './db';
import { InvalidToolInputError } from './errors';
import { log, type Logger } from './logger';
import { getRecentMetrics } from './metrics-recorder';
import type { CycleOutcome, MonitoringJob } from './orchestrator';

export type Tool<I, O> = {
  name: string;
  input: z.ZodType<I, z.ZodTypeDef, unknown>;
  output: z.ZodType<O, z.ZodTypeDef, unknown>;
  handler: (input: I) => Promise<O> | O;
};

export type RegisteredTool = { name: string; call: (input: unknown) => Promise<unknown> };

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(private readonly logger: Logger = log) {}

  register<I, O>(tool: Tool<I, O>): void {
    this.tools.set(tool.name, {
      name: tool.name,
      call: async (raw) => {
        const input = tool.input.safeParse(raw);
        if (!input.success) throw new InvalidToolInputError(tool.name, input.error);
        return tool.output.parse(await tool.handler(input.data));
      },
    });
    this.logger.info({ tool: tool.name }, 'registered tool');
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }
}

export const RunCycleInput = z.object({}).strict().default({});

export const RunCycleOutput = z.object({
  status: z.enum(['completed', 'skipped']),
  reason: z.enum(['empty_window', 'store_unavailable', 'store_error']).optional(),
  window: z.object({ start: z.string(), end: z.string(), rows: z.number().int().nonnegative() }),
  dataset_drift: z.boolean().optional(),
  data_drift_score: z.number().optional(),
  num_drifted_features: z.number().int().optional(),
  drifted_features: z.array(z.string()).optional(),
  persisted: z.boolean().optional(),
  alert: z.enum(['not_triggered', 'not_configured', 'sent', 'failed']).optional(),
});
export type RunCycleOutput = z.infer<typeof RunCycleOutput>;

export function toRunCycleOutput(outcome: CycleOutcome): RunCycleOutput {
  const window = { start: outcome.window.start.toISOString(), end: outcome.window.end.toISOString(), rows: outcome.window.rows };
  if (outcome.status === 'skipped') return { status: 'skipped', reason: outcome.reason, window };
  const { summary } = outcome;
  return {
    status: 'completed',
    window,
    dataset_drift: summary.datasetDrift,
    data_drift_score: summary.datasetDrift ? 1 : 0,
    num_drifted_features: summary.numDriftedFeatures,
    drifted_features: summary.features.filter((f) => f.drifted).map((f) => f.feature),
    persisted: outcome.persisted,
    alert: outcome.alert,
  };
}

export const GetRecentInput = z.object({ limit: z.number().int().min(1).max(500).default(20) });
export const GetRecentOutput = z.object({ rows: z.array(StoredMetric) });

export function registerDriftTools(registry: ToolRegistry, job: MonitoringJob, store: Queryable): ToolRegistry {
  registry.register({
    name: 'drift-monitor.run_cycle',
    input: RunCycleInput,
    output: RunCycleOutput,
    handler: async () => toRunCycleOutput(await job.runCycle()),
  });

  registry.register({
    name: 'drift-monitor.get_recent_metrics',
    input: GetRecentInput,
    output: GetRecentOutput,
    handler: async ({ limit }) => ({ rows: await getRecentMetrics(store, limit) }),
  });

  return registry;
}
