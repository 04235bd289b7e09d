import 'dotenv/config';
import { effectiveLogLevel, loadAppConfig } from '../config/app.js';
import { createExecutor } from '../agent/refactoring_pipeline.js';
import { createLogger } from '../util/logging.js';
import { createApp } from './app.js';

const config = loadAppConfig();
const log = createLogger({ level: effectiveLogLevel(config), file: config.logFile });

async function main(): Promise<void> {
  log.info({ app: config.appName, version: config.appVersion }, 'Starting');
  log.info({ serverUrl: config.runtime.serverUrl, model: config.llm.model }, 'Runtime and model');

  const executor = await createExecutor(config, log);
  const app = createApp(config, executor, log);
  const server = app.listen(config.port, config.host, () => {
    log.info({ host: config.host, port: config.port }, 'HTTP server started');
  });

  const shutdown = (signal: string) => {
    log.info({ signal }, `Shutting down ${config.appName}`);
    server.close();
    executor.close()
      .catch((err: unknown) => log.error({ err }, 'gateway close failed'))
      .finally(() => process.exit(0));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'startup failed');
  process.exit(1);
});
