/**
 * API Server Entry Point
 *
 * Starts the Hono app on the Node.js HTTP adapter. Configuration comes from
 * the environment: PORT, HOST, MAX_UPLOAD_BYTES, LOG_LEVEL, LOG_PRETTY.
 */

import { serve } from '@hono/node-server';
import { parseLogConfig, parseServerConfig } from '../utils/env-parser.js';
import { configureLogger, logger, logServerShutdown, logServerStart } from '../utils/logger.js';
import { createApp } from './app.js';

const log = logger.server;

process.on('uncaughtException', (err) => {
  log.error('Uncaught exception', { error: err });
});

process.on('unhandledRejection', (reason) => {
  log.error('Unhandled rejection', { error: reason });
});

function main(): void {
  configureLogger(parseLogConfig());
  const config = parseServerConfig();
  const app = createApp({ maxUploadBytes: config.maxUploadBytes });

  logServerStart(config.port, config.host);

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    log.info('Server listening', { port: info.port, host: config.host });
  });

  const shutdown = (signal: string) => {
    logServerShutdown(signal);
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (err) {
  log.error('Failed to start server', { error: err });
  process.exit(1);
}
