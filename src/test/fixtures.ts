/**
 * Shared test fixtures: alert batches, receivers, configs, fake tracker
 * transports and a capturing logger.
 *
 * @module test/fixtures
 */

import { parseConfig, type Config } from '../config/index.js';
import { createLogger, type LogEntry, type Logger } from '../logging/index.js';
import type { HttpRequest, HttpResponse, HttpTransport } from '../notify/index.js';
import type { Alert, AlertBatch, ReceiverConfig } from '../types/index.js';

// ─── Alerts ──────────────────────────────────────────────────────────────────

export function makeAlert(overrides: Partial<Alert> = {}): Alert {
  return {
    status: 'firing',
    labels: { alertname: 'HighLatency', severity: 'critical' },
    annotations: { summary: 'p99 latency above 2s' },
    startsAt: '2024-03-01T10:00:00Z',
    endsAt: '0001-01-01T00:00:00Z',
    generatorURL: 'http://prometheus.local/graph',
    fingerprint: 'abc123',
    ...overrides,
  };
}

export function makeBatch(overrides: Partial<AlertBatch> = {}): AlertBatch {
  return {
    receiver: 'team-a',
    status: 'firing',
    groupKey: '{}:{alertname="HighLatency"}',
    externalURL: 'http://alertmanager.local',
    groupLabels: { alertname: 'HighLatency' },
    commonLabels: { alertname: 'HighLatency', severity: 'critical' },
    commonAnnotations: { summary: 'p99 latency above 2s' },
    alerts: [makeAlert()],
    ...overrides,
  };
}

/** Serialize a batch the way Alertmanager posts it. */
export function webhookBody(batch: AlertBatch = makeBatch()): string {
  return JSON.stringify({ version: '4', truncatedAlerts: 0, ...batch });
}

// ─── Receivers ───────────────────────────────────────────────────────────────

export function makeJiraReceiver(overrides: Partial<ReceiverConfig> = {}): ReceiverConfig {
  return {
    name: 'team-a',
    type: 'jira',
    apiUrl: 'https://jira.example.com',
    user: 'bridge',
    password: 'test-secret',
    project: 'OPS',
    issueType: 'Bug',
    ...overrides,
  };
}

export function makeGithubReceiver(overrides: Partial<ReceiverConfig> = {}): ReceiverConfig {
  return {
    name: 'team-b',
    type: 'github',
    owner: 'example',
    repo: 'incidents',
    token: 'test-token',
    ...overrides,
  };
}

/** A config with a jira receiver "team-a" and a github receiver "team-b". */
export function makeConfig(document?: unknown): Config {
  const parsed = parseConfig(
    document ?? {
      defaults: {
        apiUrl: 'https://jira.example.com',
        user: 'bridge',
        password: 'test-secret',
        issueType: 'Bug',
      },
      receivers: [
        { name: 'team-a', project: 'OPS' },
        { name: 'team-b', type: 'github', owner: 'example', repo: 'incidents', token: 'test-token' },
      ],
    },
  );
  if (!parsed.ok) throw new Error(parsed.error.message);
  return parsed.value;
}

// ─── Transports ──────────────────────────────────────────────────────────────

export interface FakeTransport extends HttpTransport {
  readonly requests: HttpRequest[];
}

export function httpResponse(status: number, body = '', statusText = ''): HttpResponse {
  return { status, statusText, body };
}

/**
 * In-process tracker stand-in. Records every request and answers with the
 * handler's response (201 Created by default).
 */
export function createFakeTransport(
  handler: (request: HttpRequest) => HttpResponse | Promise<HttpResponse> = () =>
    httpResponse(201, '{"id":"10001"}', 'Created'),
): FakeTransport {
  const requests: HttpRequest[] = [];
  return {
    requests,
    async send(request: HttpRequest): Promise<HttpResponse> {
      requests.push(request);
      return handler(request);
    },
  };
}

/** A transport that never answers; like fetch, it rejects once the signal aborts. */
export function createHangingTransport(): FakeTransport {
  const requests: HttpRequest[] = [];
  return {
    requests,
    send(request: HttpRequest, signal: AbortSignal): Promise<HttpResponse> {
      requests.push(request);
      return new Promise((_resolve, reject) => {
        if (signal.aborted) {
          reject(new Error('This operation was aborted'));
          return;
        }
        signal.addEventListener('abort', () => reject(new Error('This operation was aborted')), {
          once: true,
        });
      });
    },
  };
}

// ─── Logging ─────────────────────────────────────────────────────────────────

export interface CapturingLogger {
  logger: Logger;
  entries: LogEntry[];
}

export function createCapturingLogger(): CapturingLogger {
  const entries: LogEntry[] = [];
  const logger = createLogger({
    level: 'debug',
    output: (entry) => {
      entries.push(entry);
    },
  });
  return { logger, entries };
}
