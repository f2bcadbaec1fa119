/**
 * Ticket Field Templates
 *
 * Renders ticket summaries and descriptions from an alert batch. Templates
 * are plain text with `{{ path }}` placeholders resolved against
 * {@link TemplateData}.
 *
 * @module templates/template
 */

import { err, ok, type Alert, type AlertBatch, type LabelSet, type Result } from '../types/index.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface TemplateData {
  receiver: string;
  status: string;
  groupKey: string;
  externalURL: string;
  groupLabels: LabelSet;
  commonLabels: LabelSet;
  commonAnnotations: LabelSet;
  alertCount: number;
  alerts: readonly Alert[];
}

export type TemplateRoot = keyof TemplateData;

export interface TemplateError {
  readonly kind: 'template';
  readonly message: string;
}

/** A compiled template. Rendering never fails once compilation succeeded. */
export interface CompiledTemplate {
  readonly source: string;
  render(data: TemplateData): string;
}

export const DEFAULT_SUMMARY_TEMPLATE = '[{{ status }}] {{ groupLabels }}';
export const DEFAULT_DESCRIPTION_TEMPLATE =
  '{{ commonAnnotations.summary }}\n\nAlerts:\n{{ alerts }}';

const TEMPLATE_ROOTS: ReadonlySet<string> = new Set<TemplateRoot>([
  'receiver',
  'status',
  'groupKey',
  'externalURL',
  'groupLabels',
  'commonLabels',
  'commonAnnotations',
  'alertCount',
  'alerts',
]);

const LABEL_MAP_ROOTS: ReadonlySet<string> = new Set(['groupLabels', 'commonLabels', 'commonAnnotations']);

const PATH_PATTERN = /^[A-Za-z][A-Za-z0-9]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

type Segment = { type: 'text'; text: string } | { type: 'ref'; root: TemplateRoot; key?: string };

// ─── Formatting ──────────────────────────────────────────────────────────────

/** Render a label map as `k=v` pairs sorted by key. */
export function formatLabels(labels: LabelSet): string {
  return Object.keys(labels)
    .sort()
    .map((key) => `${key}=${labels[key] ?? ''}`)
    .join(', ');
}

/** Render alerts one per line. */
export function formatAlerts(alerts: readonly Alert[]): string {
  return alerts.map((alert) => `- ${formatLabels(alert.labels)} (since ${alert.startsAt})`).join('\n');
}

function resolveRef(root: TemplateRoot, key: string | undefined, data: TemplateData): string {
  switch (root) {
    case 'groupLabels':
    case 'commonLabels':
    case 'commonAnnotations':
      return key === undefined ? formatLabels(data[root]) : (data[root][key] ?? '');
    case 'alerts':
      return formatAlerts(data.alerts);
    case 'alertCount':
      return String(data.alertCount);
    case 'receiver':
    case 'status':
    case 'groupKey':
    case 'externalURL':
      return data[root];
  }
}

// ─── Compilation ─────────────────────────────────────────────────────────────

function isTemplateRoot(name: string): name is TemplateRoot {
  return TEMPLATE_ROOTS.has(name);
}

function templateError(message: string): TemplateError {
  return { kind: 'template', message };
}

function parseRef(expression: string): Result<Segment, TemplateError> {
  if (expression === '') {
    return err(templateError('empty placeholder'));
  }
  if (!PATH_PATTERN.test(expression)) {
    return err(templateError(`malformed placeholder "${expression}"`));
  }

  const [root = '', key] = expression.split('.');
  if (!isTemplateRoot(root)) {
    return err(templateError(`unknown field "${root}"`));
  }
  if (key !== undefined && !LABEL_MAP_ROOTS.has(root)) {
    return err(templateError(`field "${root}" has no keys`));
  }
  return ok(key === undefined ? { type: 'ref', root } : { type: 'ref', root, key });
}

/**
 * Compile template text.
 *
 * @param source - Template text with `{{ path }}` placeholders
 */
export function compileTemplate(source: string): Result<CompiledTemplate, TemplateError> {
  const segments: Segment[] = [];
  let cursor = 0;

  while (cursor < source.length) {
    const open = source.indexOf('{{', cursor);
    if (open === -1) {
      segments.push({ type: 'text', text: source.slice(cursor) });
      break;
    }
    if (open > cursor) {
      segments.push({ type: 'text', text: source.slice(cursor, open) });
    }

    const close = source.indexOf('}}', open + 2);
    if (close === -1) {
      return err(templateError(`unclosed placeholder at offset ${open}`));
    }

    const ref = parseRef(source.slice(open + 2, close).trim());
    if (!ref.ok) return ref;
    segments.push(ref.value);
    cursor = close + 2;
  }

  return ok({
    source,
    render(data: TemplateData): string {
      return segments
        .map((segment) =>
          segment.type === 'text' ? segment.text : resolveRef(segment.root, segment.key, data),
        )
        .join('');
    },
  });
}

/**
 * Build template data from a filtered batch.
 */
export function templateDataFor(batch: AlertBatch): TemplateData {
  return {
    receiver: batch.receiver,
    status: batch.status,
    groupKey: batch.groupKey,
    externalURL: batch.externalURL,
    groupLabels: batch.groupLabels,
    commonLabels: batch.commonLabels,
    commonAnnotations: batch.commonAnnotations,
    alertCount: batch.alerts.length,
    alerts: batch.alerts,
  };
}
