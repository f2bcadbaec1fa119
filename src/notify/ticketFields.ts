/**
 * Helpers shared by the tracker notifiers: target validation, ticket
 * templates and field truncation.
 *
 * @module notify/ticketFields
 */

import type { z } from 'zod';
import {
  DEFAULT_DESCRIPTION_TEMPLATE,
  DEFAULT_SUMMARY_TEMPLATE,
  compileTemplate,
  type CompiledTemplate,
} from '../templates/index.js';
import { err, ok, type ReceiverConfig, type Result } from '../types/index.js';
import type { ConstructionFailure } from './types.js';

export interface TicketTemplates {
  summary: CompiledTemplate;
  description: CompiledTemplate;
}

/**
 * Cut text to at most `max` characters, marking the cut with an ellipsis.
 * Counts code points, so a surrogate pair is never split.
 */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  return `${chars.slice(0, max - 1).join('')}…`;
}

/** Strip trailing slashes so paths can be appended. */
export function baseUrl(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Validate the receiver parameters a notifier variant needs.
 */
export function validateTarget<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  receiver: ReceiverConfig,
): Result<T, ConstructionFailure> {
  const parsed = schema.safeParse(receiver);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return err({
      kind: 'construction',
      message: `invalid ${receiver.type} receiver "${receiver.name}": ${detail}`,
    });
  }
  return ok(parsed.data);
}

/**
 * Compile the receiver's summary and description templates, falling back
 * to the defaults.
 */
export function compileTicketTemplates(
  receiver: ReceiverConfig,
): Result<TicketTemplates, ConstructionFailure> {
  const summary = compileTemplate(receiver.summary ?? DEFAULT_SUMMARY_TEMPLATE);
  if (!summary.ok) {
    return err({ kind: 'construction', message: `summary template: ${summary.error.message}` });
  }
  const description = compileTemplate(receiver.description ?? DEFAULT_DESCRIPTION_TEMPLATE);
  if (!description.ok) {
    return err({ kind: 'construction', message: `description template: ${description.error.message}` });
  }
  return ok({ summary: summary.value, description: description.value });
}
