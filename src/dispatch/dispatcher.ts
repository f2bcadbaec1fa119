/**
 * Alert Dispatcher
 *
 * Runs one webhook request through decode → route → filter → notify and
 * turns the first failure into a response envelope plus a diagnostic log
 * record. At most one notification attempt per request; retries are left
 * to the alert source.
 *
 * @module dispatch/dispatcher
 */

import { STATUS_CODES } from 'node:http';
import { decodeAlertBatch, filterFiring } from '../alerts/index.js';
import type { ReceiverRouter } from '../config/index.js';
import { buildEnvelope, STATUS_OK } from '../http/responses.js';
import type { Logger } from '../logging/index.js';
import type { NotifierGateway } from '../notify/index.js';
import { UNKNOWN_RECEIVER, type LabelSet, type ResponseEnvelope } from '../types/index.js';
import {
  internalFailure,
  statusForError,
  statusForRetryable,
  type DispatchError,
} from './errors.js';

export interface DispatchDependencies {
  router: ReceiverRouter;
  gateway: NotifierGateway;
  logger: Logger;
}

export interface DispatchResult {
  envelope: ResponseEnvelope;
  /** Receiver label for metrics: the matched name, or the unknown sentinel. */
  receiver: string;
}

/**
 * Answer a failed request: log the diagnostic record and build the envelope.
 */
export function rejectRequest(
  logger: Logger,
  error: DispatchError,
  receiver: string,
  groupLabels: LabelSet,
  status: number = statusForError(error),
): DispatchResult {
  const cause = 'cause' in error && error.cause instanceof Error ? error.cause : undefined;
  logger.error('error handling request', cause, {
    statusCode: status,
    statusText: STATUS_CODES[status] ?? 'Unknown',
    err: error.message,
    receiver,
    groupLabels,
  });
  return { envelope: buildEnvelope(status, error.message), receiver };
}

/**
 * Dispatch one raw webhook body. Never throws.
 *
 * @param body - Request body as text
 * @param signal - Aborted when the inbound request goes away
 */
export async function dispatchAlerts(
  body: string,
  deps: DispatchDependencies,
  signal?: AbortSignal,
): Promise<DispatchResult> {
  const { router, gateway, logger } = deps;
  let receiverLabel = UNKNOWN_RECEIVER;
  let groupLabels: LabelSet = {};

  try {
    logger.debug('handling alert webhook request');

    const decoded = decodeAlertBatch(body);
    if (!decoded.ok) {
      return rejectRequest(logger, decoded.error, UNKNOWN_RECEIVER, decoded.error.groupLabels);
    }
    const batch = decoded.value;
    groupLabels = batch.groupLabels;

    const route = router.resolve(batch.receiver);
    if (!route.ok) {
      return rejectRequest(logger, route.error, UNKNOWN_RECEIVER, groupLabels);
    }
    const receiver = route.value;
    receiverLabel = receiver.name;
    logger.debug('matched receiver', { receiver: receiver.name });

    const { batch: firing, dropped } = filterFiring(batch);
    if (dropped > 0) {
      logger.warn('receiver should have "send_resolved: false" set in Alertmanager config', {
        receiver: receiver.name,
        dropped,
      });
    }

    if (firing.alerts.length > 0) {
      const outcome = await gateway.notify(receiver, firing, { signal, logger });
      if (!outcome.ok) {
        return rejectRequest(
          logger,
          outcome.cause,
          receiver.name,
          groupLabels,
          statusForRetryable(outcome.retryable),
        );
      }
    }

    return { envelope: buildEnvelope(STATUS_OK), receiver: receiver.name };
  } catch (e: unknown) {
    return rejectRequest(logger, internalFailure(e), receiverLabel, groupLabels);
  }
}
