/**
 * Notifier contracts shared by the gateway, its variants and the classifier.
 *
 * @module notify/types
 */

import type { AlertBatch, ReceiverKind, Result } from '../types/index.js';

// ─── Failures ────────────────────────────────────────────────────────────────

/** Why a delivery to the tracker did not succeed. */
export type DeliveryReason = 'network' | 'timeout' | 'aborted' | 'http';

/** The notifier variant could not be built for the receiver. */
export interface ConstructionFailure {
  readonly kind: 'construction';
  readonly message: string;
  readonly cause?: unknown;
}

/** The tracker call was attempted and did not succeed. */
export interface DeliveryFailure {
  readonly kind: 'delivery';
  readonly reason: DeliveryReason;
  readonly message: string;
  /** Tracker response status, set when reason is 'http'. */
  readonly httpStatus?: number;
  readonly cause?: unknown;
}

export type NotifyFailure = ConstructionFailure | DeliveryFailure;

/** Outcome of one dispatch attempt, produced exactly once per request. */
export type NotificationOutcome =
  | { readonly ok: true }
  | { readonly ok: false; readonly retryable: boolean; readonly cause: NotifyFailure };

// ─── Notifiers ───────────────────────────────────────────────────────────────

/** A receiver-bound notifier variant. */
export interface Notifier {
  readonly kind: ReceiverKind;
  readonly receiver: string;
  /** Deliver a batch of firing alerts. Never throws. */
  notify(batch: AlertBatch, signal: AbortSignal): Promise<Result<void, DeliveryFailure>>;
}

// ─── Transport ───────────────────────────────────────────────────────────────

export interface HttpRequest {
  method: 'GET' | 'POST';
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  body: string;
}

/**
 * HTTP transport abstraction for the tracker clients.
 * In production this wraps fetch; tests supply an in-process fake.
 */
export interface HttpTransport {
  send(request: HttpRequest, signal: AbortSignal): Promise<HttpResponse>;
}
