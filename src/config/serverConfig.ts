/**
 * Process configuration.
 *
 * Command-line flags (parsed with commander) with environment fallbacks.
 * Consumed once at startup.
 *
 * @module config/serverConfig
 */

import { Command } from 'commander';
import { z } from 'zod';
import { err, ok, type Result } from '../types/index.js';
import type { ConfigError } from './receiverConfig.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface ListenAddress {
  /** Empty string means all interfaces. */
  host: string;
  port: number;
}

export interface ServerConfig {
  listen: ListenAddress;
  configFile: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  logFormat: 'logfmt' | 'json';
  notifyTimeoutMs: number;
  bodyLimit: string;
}

/** Raw option values as commander produces them. */
export type CliOptions = {
  listenAddress: string;
  config: string;
  'log.level': string;
  'log.format': string;
  'notify.timeout': string;
  bodyLimit: string;
};

export const DEFAULT_LISTEN_ADDRESS = ':9097';
export const DEFAULT_CONFIG_FILE = 'config/bridge.json';

// ─── CLI ─────────────────────────────────────────────────────────────────────

/**
 * Build the command-line interface. Defaults come from the environment
 * when the matching variable is set.
 */
export function createCli(env: NodeJS.ProcessEnv = process.env): Command {
  return new Command()
    .name('alert-ticket-bridge')
    .description('Alertmanager webhook receiver that files tickets in an issue tracker')
    .option(
      '--listen-address <addr>',
      'address to listen on for HTTP requests',
      env['LISTEN_ADDRESS'] ?? DEFAULT_LISTEN_ADDRESS,
    )
    .option('--config <path>', 'receiver configuration file', env['CONFIG_FILE'] ?? DEFAULT_CONFIG_FILE)
    .option('--log.level <level>', 'log level (debug, info, warn, error)', env['LOG_LEVEL'] ?? 'info')
    .option('--log.format <format>', 'log format (logfmt, json)', env['LOG_FORMAT'] ?? 'logfmt')
    .option(
      '--notify.timeout <ms>',
      'timeout for a single tracker call in milliseconds',
      env['NOTIFY_TIMEOUT_MS'] ?? '30000',
    )
    .option('--body-limit <size>', 'maximum webhook body size', env['BODY_LIMIT'] ?? '1mb');
}

// ─── Resolution ──────────────────────────────────────────────────────────────

const optionsSchema = z.object({
  configFile: z.string().min(1, 'must not be empty'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  logFormat: z.enum(['logfmt', 'json']),
  notifyTimeoutMs: z.coerce.number().int().positive(),
  bodyLimit: z.string().min(1, 'must not be empty'),
});

/**
 * Split `[host]:port` into its parts.
 */
export function parseListenAddress(address: string): Result<ListenAddress, ConfigError> {
  const separator = address.lastIndexOf(':');
  if (separator === -1) {
    return err({ kind: 'config', message: `listen address "${address}" must be [host]:port` });
  }

  const host = address.slice(0, separator).replace(/^\[(.*)\]$/, '$1');
  const portText = address.slice(separator + 1);
  const port = Number(portText);
  if (portText === '' || !Number.isInteger(port) || port < 0 || port > 65535) {
    return err({ kind: 'config', message: `listen address "${address}" has an invalid port` });
  }
  return ok({ host, port });
}

/**
 * Validate parsed options. `PORT`, when set, overrides the listen address.
 */
export function resolveServerConfig(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Result<ServerConfig, ConfigError> {
  const port = env['PORT'];
  const listen = parseListenAddress(port ? `:${port}` : options.listenAddress);
  if (!listen.ok) return listen;

  const parsed = optionsSchema.safeParse({
    configFile: options.config,
    logLevel: options['log.level'],
    logFormat: options['log.format'],
    notifyTimeoutMs: options['notify.timeout'],
    bodyLimit: options.bodyLimit,
  });
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    return err({ kind: 'config', message: `invalid options: ${detail}` });
  }

  return ok({ listen: listen.value, ...parsed.data });
}
