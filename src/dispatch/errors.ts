/**
 * Dispatch failure taxonomy.
 *
 * | kind               | status          |
 * |--------------------|-----------------|
 * | decode             | 400             |
 * | receiver-not-found | 404             |
 * | construction       | 500             |
 * | delivery           | 503 / 500       |
 * | internal           | 500             |
 *
 * @module dispatch/errors
 */

import type { DecodeFailure } from '../alerts/index.js';
import type { ReceiverNotFound } from '../config/index.js';
import { classifyFailure, type NotifyFailure } from '../notify/index.js';

/** An unexpected fault inside the pipeline. */
export interface InternalFailure {
  readonly kind: 'internal';
  readonly message: string;
  readonly cause?: unknown;
}

export type DispatchError = DecodeFailure | ReceiverNotFound | NotifyFailure | InternalFailure;

export const STATUS_BAD_REQUEST = 400;
export const STATUS_NOT_FOUND = 404;
export const STATUS_INTERNAL_ERROR = 500;
export const STATUS_SERVICE_UNAVAILABLE = 503;

/** Status for a notification failure given its retryable flag. */
export function statusForRetryable(retryable: boolean): number {
  return retryable ? STATUS_SERVICE_UNAVAILABLE : STATUS_INTERNAL_ERROR;
}

/**
 * Map a failure to its response status.
 */
export function statusForError(error: DispatchError): number {
  switch (error.kind) {
    case 'decode':
      return STATUS_BAD_REQUEST;
    case 'receiver-not-found':
      return STATUS_NOT_FOUND;
    case 'construction':
    case 'delivery':
      return statusForRetryable(classifyFailure(error));
    case 'internal':
      return STATUS_INTERNAL_ERROR;
  }
}

export function internalFailure(cause: unknown): InternalFailure {
  const message = cause instanceof Error ? cause.message : String(cause);
  return { kind: 'internal', message: `internal error: ${message}`, cause };
}
