import 'dotenv/config';
import { createApp, loadConfigOrExit } from './app';
import { log } from './logger';
import { createServer } from './server';
import { registry } from './telemetry';
import { registerDriftTools, ToolRegistry } from './tools';

(async () => {
  const config = loadConfigOrExit();
  const { store, job } = createApp(config);
  const tools = registerDriftTools(new ToolRegistry(log), job, store);
  const server = createServer({ tools, metrics: registry });
  server.listen(config.port, () => log.info({ port: config.port, tools: tools.names() }, 'Drift monitor server listening'));

  const shutdown = (signal: string) => {
    log.info({ signal }, 'shutting down');
    server.close(() => {
      store.end().then(
        () => process.exit(0),
        (err) => {
          log.error({ err }, 'error closing store');
          process.exit(1);
        },
      );
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
})().catch((err) => {
  log.fatal({ err }, 'fatal');
  process.exit(1);
});
