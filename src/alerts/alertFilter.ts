/**
 * Alert Filter
 *
 * Only firing alerts are forwarded to the tracker. Resolved alerts are
 * dropped; an alert source that sends them is misconfigured
 * (`send_resolved` should be false), which callers report as a warning.
 *
 * @module alerts/alertFilter
 */

import type { Alert, AlertBatch } from '../types/index.js';

export interface FilterResult {
  /** The batch with only firing alerts. Same instance when nothing was dropped. */
  batch: AlertBatch;
  /** Number of resolved alerts removed. */
  dropped: number;
}

export function isFiring(alert: Alert): boolean {
  return alert.status === 'firing';
}

/**
 * Remove every alert whose status is not "firing".
 */
export function filterFiring(batch: AlertBatch): FilterResult {
  const firing = batch.alerts.filter(isFiring);
  const dropped = batch.alerts.length - firing.length;
  if (dropped === 0) {
    return { batch, dropped };
  }
  return { batch: { ...batch, alerts: firing }, dropped };
}
