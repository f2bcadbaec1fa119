/**
 * Alert batch decoder.
 *
 * Parses an Alertmanager webhook payload into an AlertBatch. Decoding is
 * all-or-nothing: any syntax or schema problem yields a DecodeFailure and no
 * partial batch.
 *
 * @module alerts/decoder
 */

import { z } from 'zod';
import { err, ok, type AlertBatch, type LabelSet, type Result } from '../types/index.js';

// ─── Schema ──────────────────────────────────────────────────────────────────

const labelSetSchema = z.record(z.string());

const alertStatusSchema = z.enum(['firing', 'resolved']);

/** Alertmanager's zero time, sent as endsAt for alerts that are still open. */
export const ZERO_TIME = '0001-01-01T00:00:00Z';

export const alertSchema = z.object({
  status: alertStatusSchema,
  labels: labelSetSchema,
  annotations: labelSetSchema.default({}),
  startsAt: z.string().datetime({ offset: true }),
  endsAt: z.string().datetime({ offset: true }).default(ZERO_TIME),
  generatorURL: z.string().default(''),
  fingerprint: z.string().default(''),
});

export const alertBatchSchema = z.object({
  receiver: z.string(),
  status: alertStatusSchema.default('firing'),
  groupKey: z.string().default(''),
  externalURL: z.string().default(''),
  groupLabels: labelSetSchema,
  commonLabels: labelSetSchema.default({}),
  commonAnnotations: labelSetSchema.default({}),
  alerts: z.array(alertSchema),
});

// ─── Failure ─────────────────────────────────────────────────────────────────

export interface DecodeFailure {
  readonly kind: 'decode';
  readonly message: string;
  /** Whatever group labels could be recovered, for diagnostics only. */
  readonly groupLabels: LabelSet;
}

function decodeFailure(message: string, groupLabels: LabelSet = {}): DecodeFailure {
  return { kind: 'decode', message, groupLabels };
}

/**
 * Recover string-valued group labels from a payload that failed validation.
 */
function salvageGroupLabels(payload: unknown): LabelSet {
  if (typeof payload !== 'object' || payload === null || !('groupLabels' in payload)) return {};
  const raw = payload.groupLabels;
  if (typeof raw !== 'object' || raw === null) return {};

  const labels: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') labels[key] = value;
  }
  return labels;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// ─── Decoder ─────────────────────────────────────────────────────────────────

/**
 * Decode a raw webhook body.
 *
 * @param raw - Request body as received
 */
export function decodeAlertBatch(raw: string): Result<AlertBatch, DecodeFailure> {
  if (raw.trim() === '') {
    return err(decodeFailure('empty request body'));
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    return err(decodeFailure(`invalid JSON payload: ${reason}`));
  }

  const parsed = alertBatchSchema.safeParse(payload);
  if (!parsed.success) {
    return err(
      decodeFailure(`invalid alert batch: ${formatIssues(parsed.error)}`, salvageGroupLabels(payload)),
    );
  }
  return ok(parsed.data);
}
