import { describe, it, expect } from 'vitest';
import {
  compileTemplate,
  DEFAULT_DESCRIPTION_TEMPLATE,
  DEFAULT_SUMMARY_TEMPLATE,
  formatAlerts,
  formatLabels,
  templateDataFor,
} from './template.js';
import { makeAlert, makeBatch } from '../test/fixtures.js';

function render(source: string, batch = makeBatch()): string {
  const compiled = compileTemplate(source);
  if (!compiled.ok) throw new Error(compiled.error.message);
  return compiled.value.render(templateDataFor(batch));
}

function compileError(source: string): string | undefined {
  const compiled = compileTemplate(source);
  return compiled.ok ? undefined : compiled.error.message;
}

// ─── Formatting ──────────────────────────────────────────────────────────────

describe('formatLabels', () => {
  it('sorts pairs by key', () => {
    expect(formatLabels({ zone: 'eu', app: 'api', env: 'prod' })).toBe('app=api, env=prod, zone=eu');
  });

  it('renders an empty map as an empty string', () => {
    expect(formatLabels({})).toBe('');
  });
});

describe('formatAlerts', () => {
  it('renders one line per alert', () => {
    const alerts = [
      makeAlert({ labels: { alertname: 'A' } }),
      makeAlert({ labels: { alertname: 'B', pod: 'web-1' }, startsAt: '2024-03-01T11:00:00Z' }),
    ];

    expect(formatAlerts(alerts)).toBe(
      '- alertname=A (since 2024-03-01T10:00:00Z)\n- alertname=B, pod=web-1 (since 2024-03-01T11:00:00Z)',
    );
  });
});

// ─── Rendering ───────────────────────────────────────────────────────────────

describe('compileTemplate rendering', () => {
  it('renders plain text unchanged', () => {
    expect(render('nothing to substitute')).toBe('nothing to substitute');
  });

  it('renders the default summary', () => {
    expect(render(DEFAULT_SUMMARY_TEMPLATE)).toBe('[firing] alertname=HighLatency');
  });

  it('renders the default description', () => {
    expect(render(DEFAULT_DESCRIPTION_TEMPLATE)).toBe(
      'p99 latency above 2s\n\nAlerts:\n- alertname=HighLatency, severity=critical (since 2024-03-01T10:00:00Z)',
    );
  });

  it('resolves scalar fields', () => {
    expect(render('{{receiver}}|{{ status }}|{{ alertCount }}|{{ externalURL }}')).toBe(
      'team-a|firing|1|http://alertmanager.local',
    );
  });

  it('resolves single label keys', () => {
    expect(render('{{ commonLabels.severity }}: {{ groupLabels.alertname }}')).toBe('critical: HighLatency');
  });

  it('renders a missing key as empty', () => {
    expect(render('[{{ commonLabels.team }}]')).toBe('[]');
  });

  it('can be rendered repeatedly with different data', () => {
    const compiled = compileTemplate('{{ receiver }}');
    if (!compiled.ok) throw new Error(compiled.error.message);

    expect(compiled.value.render(templateDataFor(makeBatch({ receiver: 'x' })))).toBe('x');
    expect(compiled.value.render(templateDataFor(makeBatch({ receiver: 'y' })))).toBe('y');
    expect(compiled.value.source).toBe('{{ receiver }}');
  });
});

// ─── Compilation errors ──────────────────────────────────────────────────────

describe('compileTemplate errors', () => {
  it('rejects an empty placeholder', () => {
    expect(compileError('a {{ }} b')).toBe('empty placeholder');
  });

  it('rejects a malformed path', () => {
    expect(compileError('{{ commonLabels.a.b }}')).toBe('malformed placeholder "commonLabels.a.b"');
    expect(compileError('{{ 1st }}')).toBe('malformed placeholder "1st"');
  });

  it('rejects an unknown field', () => {
    expect(compileError('{{ severity }}')).toBe('unknown field "severity"');
  });

  it('rejects keys on a scalar field', () => {
    expect(compileError('{{ receiver.name }}')).toBe('field "receiver" has no keys');
  });

  it('rejects an unclosed placeholder', () => {
    expect(compileError('abc {{ status')).toBe('unclosed placeholder at offset 4');
  });
});

describe('templateDataFor', () => {
  it('counts the alerts of the batch', () => {
    const batch = makeBatch({ alerts: [makeAlert(), makeAlert(), makeAlert()] });

    expect(templateDataFor(batch).alertCount).toBe(3);
  });
});
