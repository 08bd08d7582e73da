import { z } from 'zod';
import { loadConfig, type Config } from './config';
import { createStore, type Store } from './db';
import { ConfigError } from './errors';
import { log } from './logger';
import { MonitoringJob } from './orchestrator';
import { CsvReferenceSource } from './reference';

export const USAGE = 'Usage: npm run run-once';

const Args = z.tuple([
  z.enum(['run-once']).default('run-once'), // command
]);
export type Command = z.infer<typeof Args>[0];

/** The CLI takes one optional command; anything else is a usage error. */
export function parseCommand(argv: readonly string[]): Command | null {
  const parsed = Args.safeParse(argv.length ? argv : [undefined]);
  return parsed.success ? parsed.data[0] : null;
}

export type App = { config: Config; store: Store; job: MonitoringJob };

/** Wires the store handle and the job from configuration; shared by the CLI and the server. */
export function createApp(config: Config): App {
  log.level = config.logLevel;
  const store = createStore({
    connectionString: config.databaseUrl,
    connectTimeoutMs: config.dbConnectTimeoutMs,
    statementTimeoutMs: config.dbStatementTimeoutMs,
  });
  const job = new MonitoringJob({
    store,
    reference: new CsvReferenceSource(config.referenceDataPath),
    config,
  });
  return { config, store, job };
}

/** Configuration problems end the process with status 2 before anything runs. */
export function loadConfigOrExit(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    return loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) {
      log.fatal({ issues: err.issues }, 'invalid configuration');
      process.exit(2);
    }
    throw err;
  }
}
