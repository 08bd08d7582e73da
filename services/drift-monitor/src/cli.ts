#!/usr/bin/env node
import 'dotenv/config';
import { createApp, loadConfigOrExit, parseCommand, USAGE } from './app';
import { ReferenceDataError } from './errors';
import { log } from './logger';
import { toRunCycleOutput } from './tools';

async function main(): Promise<number> {
  const [, , ...rest] = process.argv;
  if (!parseCommand(rest)) {
    console.error(USAGE);
    return 2;
  }
  const { store, job } = createApp(loadConfigOrExit());
  try {
    const outcome = await job.runCycle();
    console.log(JSON.stringify(toRunCycleOutput(outcome)));
    return 0;
  } catch (err) {
    if (err instanceof ReferenceDataError) return 1;
    throw err;
  } finally {
    await store.end();
  }
}

main().then(
  (code) => process.exit(code),
  (err) => {
    log.fatal({ err }, 'monitoring job failed');
    process.exit(1);
  },
);
