/**
 * Notifier Gateway
 *
 * Builds the notifier variant for a receiver and runs one delivery, bounded
 * by a timeout and by the caller's abort signal. Construction and delivery
 * failures come back through the same classified outcome.
 *
 * @module notify/gateway
 */

import type { Logger } from '../logging/index.js';
import type { AlertBatch, ReceiverConfig, Result } from '../types/index.js';
import { failedOutcome } from './classifier.js';
import { createGithubNotifier } from './githubNotifier.js';
import { DeliveryAbortedError } from './httpTransport.js';
import { createJiraNotifier } from './jiraNotifier.js';
import type { ConstructionFailure, HttpTransport, NotificationOutcome, Notifier } from './types.js';

/** Per-request inputs to one delivery. */
export interface NotifyContext {
  /** Aborted when the inbound request goes away. */
  signal?: AbortSignal;
  /** Request-scoped logger; falls back to the gateway's own. */
  logger?: Logger;
}

export interface NotifierGateway {
  notify(receiver: ReceiverConfig, batch: AlertBatch, context?: NotifyContext): Promise<NotificationOutcome>;
}

export interface NotifierGatewayOptions {
  transport: HttpTransport;
  /** Upper bound for one tracker call. */
  timeoutMs: number;
  logger: Logger;
}

/**
 * Select and construct the notifier variant for a receiver.
 */
export function createNotifier(
  receiver: ReceiverConfig,
  transport: HttpTransport,
): Result<Notifier, ConstructionFailure> {
  switch (receiver.type) {
    case 'jira':
      return createJiraNotifier(receiver, transport);
    case 'github':
      return createGithubNotifier(receiver, transport);
  }
}

export function createNotifierGateway(options: NotifierGatewayOptions): NotifierGateway {
  const { transport, timeoutMs, logger } = options;

  return {
    async notify(
      receiver: ReceiverConfig,
      batch: AlertBatch,
      context: NotifyContext = {},
    ): Promise<NotificationOutcome> {
      const { signal } = context;
      const log = context.logger ?? logger;
      const notifier = createNotifier(receiver, transport);
      if (!notifier.ok) return failedOutcome(notifier.error);

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(new DeliveryAbortedError('timeout')), timeoutMs);
      const onAbort = (): void => controller.abort(new DeliveryAbortedError('aborted'));
      if (signal?.aborted) {
        onAbort();
      } else {
        signal?.addEventListener('abort', onAbort, { once: true });
      }

      const started = Date.now();
      try {
        const result = await notifier.value.notify(batch, controller.signal);
        if (!result.ok) return failedOutcome(result.error);

        log.debug('notification delivered', {
          receiver: receiver.name,
          tracker: notifier.value.kind,
          alerts: batch.alerts.length,
          durationMs: Date.now() - started,
        });
        return { ok: true };
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      }
    },
  };
}
