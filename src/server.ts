#!/usr/bin/env node
/**
 * Process entry point: parse flags, load configuration, start listening.
 * Startup problems are fatal; nothing after startup is.
 *
 * @module server
 */

import { createServer } from 'node:http';
import { createApp } from './app.js';
import {
  createCli,
  createConfigStore,
  loadConfigFile,
  resolveServerConfig,
  type CliOptions,
  type ConfigStore,
} from './config/index.js';
import { createLogger, type Logger } from './logging/index.js';
import { createMetricsCollector, loadPrometheusConfig } from './metrics/index.js';
import { createFetchTransport } from './notify/index.js';

function exitWithError(logger: Logger, message: string, metadata?: Record<string, unknown>): never {
  logger.fatal(message, undefined, metadata);
  process.exit(1);
}

async function reloadConfig(store: ConfigStore, path: string, logger: Logger): Promise<void> {
  const loaded = await loadConfigFile(path);
  if (!loaded.ok) {
    logger.error('error reloading configuration, keeping previous one', undefined, {
      path,
      err: loaded.error.message,
    });
    return;
  }
  store.replace(loaded.value);
  logger.info('configuration reloaded', { path, receivers: loaded.value.receivers.length });
}

async function main(): Promise<void> {
  const program = createCli().parse(process.argv);
  const options = resolveServerConfig(program.opts<CliOptions>());
  if (!options.ok) {
    exitWithError(createLogger(), 'invalid command-line options', { err: options.error.message });
  }
  const { listen, configFile, logLevel, logFormat, notifyTimeoutMs, bodyLimit } = options.value;

  const logger = createLogger({ level: logLevel, format: logFormat });
  logger.info('starting alert-ticket-bridge', { pid: process.pid });

  const loaded = await loadConfigFile(configFile);
  if (!loaded.ok) {
    exitWithError(logger, 'error loading configuration', { path: configFile, err: loaded.error.message });
  }
  const configStore = createConfigStore(loaded.value);

  // Counters exist before the first request can arrive.
  const metricsCollector = createMetricsCollector(loadPrometheusConfig());

  const app = createApp({
    configStore,
    metricsCollector,
    transport: createFetchTransport(),
    logger,
    notifyTimeoutMs,
    bodyLimit,
  });

  const server = createServer(app);
  server.on('error', (err: Error) => {
    exitWithError(logger, 'failed to start HTTP server', { address: `${listen.host}:${listen.port}`, err: err.message });
  });
  server.listen({ port: listen.port, host: listen.host || undefined }, () => {
    logger.info('listening', { address: `${listen.host}:${listen.port}` });
  });

  process.on('SIGHUP', () => {
    reloadConfig(configStore, configFile, logger).catch((err: unknown) => {
      logger.error('configuration reload failed', err instanceof Error ? err : undefined);
    });
  });

  const shutdown = (signal: string): void => {
    logger.info('shutting down', { signal });
    server.close((err) => {
      if (err) {
        logger.error('error closing HTTP server', err);
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  createLogger().fatal('startup failed', err instanceof Error ? err : new Error(String(err)));
  process.exit(1);
});
