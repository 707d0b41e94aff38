#!/usr/bin/env node
// hookmetrics — webhook events in, Prometheus metrics out.
// Usage: hookmetrics [--config path]

import { createHookmetrics } from './app.js';
import { loadConfig, resolveConfigPath } from './config/loader.js';
import { createLogger, parseLogLevel, setGlobalLogLevel } from './core/logger.js';

const logger = createLogger('main');

async function main(): Promise<void> {
  const level = parseLogLevel(process.env.LOG_LEVEL);
  if (level !== undefined) setGlobalLogLevel(level);

  const configPath = resolveConfigPath(process.argv.slice(2), process.env);
  const config = await loadConfig(configPath);
  logger.info('Configuration loaded', { path: configPath, rules: config.rules.length });

  const app = createHookmetrics(config);
  await app.start();

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down', { signal });
    app.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.error('Startup failed', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
