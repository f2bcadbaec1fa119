/**
 * Core type definitions for the alert dispatch pipeline.
 * Shapes follow the Alertmanager webhook payload (version 4).
 */

export { ok, err, type Result, type Ok, type Err } from './result.js';

// ─── Alerts ──────────────────────────────────────────────────────────────────

export type AlertStatus = 'firing' | 'resolved';

export type LabelSet = Readonly<Record<string, string>>;

export interface Alert {
  readonly status: AlertStatus;
  readonly labels: LabelSet;
  readonly annotations: LabelSet;
  /** RFC 3339 timestamp. */
  readonly startsAt: string;
  /** RFC 3339 timestamp; Alertmanager sends the zero time for open alerts. */
  readonly endsAt: string;
  readonly generatorURL: string;
  readonly fingerprint: string;
}

export interface AlertBatch {
  readonly receiver: string;
  readonly status: AlertStatus;
  readonly groupKey: string;
  readonly externalURL: string;
  readonly groupLabels: LabelSet;
  readonly commonLabels: LabelSet;
  readonly commonAnnotations: LabelSet;
  readonly alerts: readonly Alert[];
}

// ─── Receivers ───────────────────────────────────────────────────────────────

/** Supported notification targets. */
export type ReceiverKind = 'jira' | 'github';

/**
 * A named receiver after defaults have been applied. Target parameters are
 * opaque to the dispatcher; each notifier variant validates the ones it needs.
 */
export interface ReceiverConfig {
  readonly name: string;
  readonly type: ReceiverKind;
  readonly apiUrl?: string;
  readonly user?: string;
  readonly password?: string;
  readonly token?: string;
  readonly project?: string;
  readonly issueType?: string;
  readonly priority?: string;
  readonly components?: readonly string[];
  readonly labels?: readonly string[];
  readonly owner?: string;
  readonly repo?: string;
  readonly summary?: string;
  readonly description?: string;
}

// ─── Responses ───────────────────────────────────────────────────────────────

/** Wire-level result of a webhook request. */
export interface ResponseEnvelope {
  error: boolean;
  status: number;
  message: string;
}

/** Receiver label used in diagnostics and metrics when routing never completed. */
export const UNKNOWN_RECEIVER = '<unknown>';
