import { describe, it, expect } from 'vitest';
import { DeliveryAbortedError, deliver } from './httpTransport.js';
import type { HttpRequest } from './types.js';
import { createFakeTransport, createHangingTransport, httpResponse } from '../test/fixtures.js';

const request: HttpRequest = {
  method: 'POST',
  url: 'https://jira.example.com/rest/api/2/issue',
  headers: { 'Content-Type': 'application/json' },
  body: '{}',
};

describe('deliver', () => {
  it('returns a 2xx response', async () => {
    const transport = createFakeTransport();

    const result = await deliver(transport, request, new AbortController().signal, 'jira');

    expect(result).toEqual({ ok: true, value: { status: 201, statusText: 'Created', body: '{"id":"10001"}' } });
    expect(transport.requests).toEqual([request]);
  });

  it('turns a non-2xx response into an HTTP failure with a body excerpt', async () => {
    const transport = createFakeTransport(() =>
      httpResponse(400, '  {"errors":{"project":"project is required"}}\n', 'Bad Request'),
    );

    const result = await deliver(transport, request, new AbortController().signal, 'jira');

    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'delivery',
        reason: 'http',
        httpStatus: 400,
        message: 'jira returned 400 Bad Request: {"errors":{"project":"project is required"}}',
      },
    });
  });

  it('omits an empty body from the message', async () => {
    const transport = createFakeTransport(() => httpResponse(503, '', 'Service Unavailable'));

    const result = await deliver(transport, request, new AbortController().signal, 'github');

    expect(!result.ok && result.error.message).toBe('github returned 503 Service Unavailable');
  });

  it('cuts long bodies', async () => {
    const transport = createFakeTransport(() => httpResponse(500, 'x'.repeat(300), 'Internal Server Error'));

    const result = await deliver(transport, request, new AbortController().signal, 'jira');

    expect(!result.ok && result.error.message).toBe(
      `jira returned 500 Internal Server Error: ${'x'.repeat(200)}…`,
    );
  });

  it('reports a thrown send as a network failure', async () => {
    const cause = new Error('connect ECONNREFUSED 127.0.0.1:443');
    const transport = createFakeTransport(() => {
      throw cause;
    });

    const result = await deliver(transport, request, new AbortController().signal, 'jira');

    expect(result).toEqual({
      ok: false,
      error: { kind: 'delivery', reason: 'network', message: 'jira: connect ECONNREFUSED 127.0.0.1:443', cause },
    });
  });

  it('reports a timeout abort', async () => {
    const controller = new AbortController();
    const pending = deliver(createHangingTransport(), request, controller.signal, 'jira');

    controller.abort(new DeliveryAbortedError('timeout'));
    const result = await pending;

    expect(!result.ok && result.error.reason).toBe('timeout');
    expect(!result.ok && result.error.message).toBe('jira: request timed out');
  });

  it('reports any other abort as aborted', async () => {
    const controller = new AbortController();
    const pending = deliver(createHangingTransport(), request, controller.signal, 'jira');

    controller.abort();
    const result = await pending;

    expect(!result.ok && result.error.reason).toBe('aborted');
    expect(!result.ok && result.error.message).toBe('jira: request aborted');
  });
});
