/**
 * Error Classifier
 *
 * Decides whether the alert source should re-deliver a webhook after a
 * failed notification. Total over NotifyFailure: every value lands in
 * exactly one bucket.
 *
 * @module notify/classifier
 */

import type { NotificationOutcome, NotifyFailure } from './types.js';

/** Tracker statuses worth retrying: request timeout, too early, throttling. */
const RETRYABLE_CLIENT_STATUSES: ReadonlySet<number> = new Set([408, 425, 429]);

/**
 * Whether an HTTP status from the tracker signals a temporary condition.
 */
export function isRetryableStatus(status: number): boolean {
  return status >= 500 || RETRYABLE_CLIENT_STATUSES.has(status);
}

/**
 * Classify a failure as retryable (true) or permanent (false).
 */
export function classifyFailure(failure: NotifyFailure): boolean {
  if (failure.kind === 'construction') return false;

  switch (failure.reason) {
    case 'network':
    case 'timeout':
    case 'aborted':
      return true;
    case 'http':
      // Without a status the request never reached the tracker.
      return failure.httpStatus === undefined || isRetryableStatus(failure.httpStatus);
  }
}

/** Wrap a failure into a classified outcome. */
export function failedOutcome(failure: NotifyFailure): NotificationOutcome {
  return { ok: false, retryable: classifyFailure(failure), cause: failure };
}
