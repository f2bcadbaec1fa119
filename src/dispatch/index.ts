/**
 * Dispatch Module
 *
 * The alert dispatch pipeline and its HTTP handlers.
 */

export {
  type DispatchError,
  type InternalFailure,
  STATUS_BAD_REQUEST,
  STATUS_INTERNAL_ERROR,
  STATUS_NOT_FOUND,
  STATUS_SERVICE_UNAVAILABLE,
  internalFailure,
  statusForError,
  statusForRetryable,
} from './errors.js';

export {
  type DispatchDependencies,
  type DispatchResult,
  dispatchAlerts,
  rejectRequest,
} from './dispatcher.js';

export {
  type AlertHandlerDependencies,
  createAlertBodyErrorHandler,
  createAlertHandler,
} from './alertHandler.js';
