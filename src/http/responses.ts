/**
 * Response Writer
 *
 * Every webhook answer is the same JSON envelope, `{error, status,
 * message}`, with the HTTP status code set to `status`.
 *
 * @module http/responses
 */

import type { Response } from 'express';
import type { ResponseEnvelope } from '../types/index.js';

export const STATUS_OK = 200;

/**
 * Build the envelope for a status code. Any status other than 200 is an error.
 *
 * @param status - HTTP status code
 * @param message - Human-readable cause, empty on success
 */
export function buildEnvelope(status: number, message = ''): ResponseEnvelope {
  return {
    error: status !== STATUS_OK,
    status,
    message,
  };
}

/** Write an envelope as the response. */
export function writeEnvelope(res: Response, envelope: ResponseEnvelope): void {
  res.status(envelope.status).json(envelope);
}
