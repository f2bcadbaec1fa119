/**
 * Tracker HTTP transport and delivery helper.
 *
 * @module notify/httpTransport
 */

import { err, ok, type Result } from '../types/index.js';
import type { DeliveryFailure, HttpRequest, HttpResponse, HttpTransport } from './types.js';

/** Longest response excerpt carried in a failure message. */
const MAX_BODY_EXCERPT = 200;

/**
 * Abort reason set by the gateway, telling a timeout apart from the
 * inbound request going away.
 */
export class DeliveryAbortedError extends Error {
  constructor(public readonly reason: 'timeout' | 'aborted') {
    super(reason === 'timeout' ? 'tracker call timed out' : 'request aborted by client');
    this.name = 'DeliveryAbortedError';
  }
}

/**
 * Default HTTP transport using the global fetch API.
 */
export function createFetchTransport(): HttpTransport {
  return {
    async send(request: HttpRequest, signal: AbortSignal): Promise<HttpResponse> {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal,
      });
      return {
        status: response.status,
        statusText: response.statusText,
        body: await response.text(),
      };
    },
  };
}

function excerpt(body: string): string {
  const trimmed = body.trim();
  return trimmed.length > MAX_BODY_EXCERPT ? `${trimmed.slice(0, MAX_BODY_EXCERPT)}…` : trimmed;
}

/**
 * Send one tracker request and fold every way it can fail into a
 * DeliveryFailure.
 *
 * @param target - Tracker name used in failure messages
 */
export async function deliver(
  transport: HttpTransport,
  request: HttpRequest,
  signal: AbortSignal,
  target: string,
): Promise<Result<HttpResponse, DeliveryFailure>> {
  let response: HttpResponse;
  try {
    response = await transport.send(request, signal);
  } catch (e: unknown) {
    if (signal.aborted) {
      const reason = signal.reason instanceof DeliveryAbortedError ? signal.reason.reason : 'aborted';
      return err({
        kind: 'delivery',
        reason,
        message: `${target}: ${reason === 'timeout' ? 'request timed out' : 'request aborted'}`,
        cause: e,
      });
    }
    const detail = e instanceof Error ? e.message : String(e);
    return err({ kind: 'delivery', reason: 'network', message: `${target}: ${detail}`, cause: e });
  }

  if (response.status < 200 || response.status >= 300) {
    const body = excerpt(response.body);
    return err({
      kind: 'delivery',
      reason: 'http',
      httpStatus: response.status,
      message: `${target} returned ${response.status} ${response.statusText}${body ? `: ${body}` : ''}`,
    });
  }
  return ok(response);
}
