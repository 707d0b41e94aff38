/**
 * Application wiring — engine, HTTP server and textfile output from one configuration.
 */

import type { HookmetricsConfig } from './config/loader.js';
import { MetricEngine } from './core/engine.js';
import { createLogger } from './core/logger.js';
import { WebhookHttpServer } from './transport/http-server.js';
import { TextfileWriter } from './output/textfile.js';

export interface Hookmetrics {
  engine: MetricEngine;
  server: WebhookHttpServer;
  textfile?: TextfileWriter;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createHookmetrics(config: HookmetricsConfig, opts?: { now?: () => number }): Hookmetrics {
  const logger = createLogger('hookmetrics');
  let textfile: TextfileWriter | undefined;

  const engine = new MetricEngine({
    rules: config.rules,
    cache: config.cache,
    exporterMetrics: config.exporterMetrics,
    now: opts?.now,
    onChange: () => {
      // Writes are chained inside the writer and never reject.
      void textfile?.schedule();
    },
  });

  if (config.output.textfile) {
    textfile = new TextfileWriter(config.textfileDir, () => engine.render());
  }

  const server = new WebhookHttpServer(
    {
      host: config.listen.host,
      port: config.listen.port,
      webhookBasepath: config.webhookBasepath,
      scrapeable: config.output.scrapeable,
    },
    engine,
  );

  return {
    engine,
    server,
    textfile,
    async start() {
      await server.start();
      logger.info('hookmetrics ready', {
        rules: config.rules.length,
        scrapeable: config.output.scrapeable,
        textfile: textfile?.path,
      });
    },
    async stop() {
      await server.stop();
      await textfile?.flush();
    },
  };
}
