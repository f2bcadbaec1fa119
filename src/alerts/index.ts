/**
 * Alerts Module
 *
 * Webhook payload decoding and firing-alert filtering.
 */

export {
  type DecodeFailure,
  ZERO_TIME,
  alertSchema,
  alertBatchSchema,
  decodeAlertBatch,
} from './decoder.js';

export { type FilterResult, filterFiring, isFiring } from './alertFilter.js';
