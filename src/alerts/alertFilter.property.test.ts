/**
 * Property-based tests for the firing-alert filter.
 *
 * - Every alert left in a filtered batch is firing.
 * - Filtering is idempotent.
 * - Kept plus dropped equals the input size.
 */
import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { filterFiring } from './alertFilter.js';
import { alertBatchArb } from '../test/arbitraries.js';

describe('filterFiring properties', () => {
  it('leaves only firing alerts', () => {
    fc.assert(
      fc.property(alertBatchArb, (batch) => {
        const { batch: filtered } = filterFiring(batch);
        expect(filtered.alerts.every((alert) => alert.status === 'firing')).toBe(true);
      }),
    );
  });

  it('is idempotent', () => {
    fc.assert(
      fc.property(alertBatchArb, (batch) => {
        const once = filterFiring(batch).batch;
        const twice = filterFiring(once);
        expect(twice.batch).toBe(once);
        expect(twice.dropped).toBe(0);
      }),
    );
  });

  it('accounts for every alert', () => {
    fc.assert(
      fc.property(alertBatchArb, (batch) => {
        const { batch: filtered, dropped } = filterFiring(batch);
        expect(filtered.alerts.length + dropped).toBe(batch.alerts.length);
        expect(dropped).toBe(batch.alerts.filter((alert) => alert.status === 'resolved').length);
      }),
    );
  });
});
