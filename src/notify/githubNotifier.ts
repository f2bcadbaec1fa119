/**
 * GitHub Issues notifier.
 *
 * @module notify/githubNotifier
 */

import { z } from 'zod';
import { templateDataFor } from '../templates/index.js';
import { err, ok, type AlertBatch, type ReceiverConfig, type Result } from '../types/index.js';
import { deliver } from './httpTransport.js';
import { baseUrl, compileTicketTemplates, truncate, validateTarget } from './ticketFields.js';
import type { ConstructionFailure, DeliveryFailure, HttpTransport, Notifier } from './types.js';

export const GITHUB_API_URL = 'https://api.github.com';
export const GITHUB_MAX_TITLE = 256;

const githubTargetSchema = z.object({
  apiUrl: z.string().url().default(GITHUB_API_URL),
  owner: z.string().min(1),
  repo: z.string().min(1),
  token: z.string().min(1),
  labels: z.array(z.string()).optional(),
});

export function createGithubNotifier(
  receiver: ReceiverConfig,
  transport: HttpTransport,
): Result<Notifier, ConstructionFailure> {
  const target = validateTarget(githubTargetSchema, receiver);
  if (!target.ok) return target;
  const templates = compileTicketTemplates(receiver);
  if (!templates.ok) return templates;

  const { summary, description } = templates.value;
  const github = target.value;
  const url = `${baseUrl(github.apiUrl)}/repos/${encodeURIComponent(github.owner)}/${encodeURIComponent(github.repo)}/issues`;

  return ok({
    kind: 'github',
    receiver: receiver.name,
    async notify(batch: AlertBatch, signal: AbortSignal): Promise<Result<void, DeliveryFailure>> {
      const data = templateDataFor(batch);
      const issue: { title: string; body: string; labels?: string[] } = {
        title: truncate(summary.render(data), GITHUB_MAX_TITLE),
        body: description.render(data),
      };
      if (github.labels && github.labels.length > 0) issue.labels = github.labels;

      const result = await deliver(
        transport,
        {
          method: 'POST',
          url,
          headers: {
            Accept: 'application/json',
            'Content-Type': 'application/json',
            Authorization: `Bearer ${github.token}`,
            'User-Agent': 'alert-ticket-bridge',
          },
          body: JSON.stringify(issue),
        },
        signal,
        'github',
      );
      return result.ok ? ok(undefined) : err(result.error);
    },
  });
}
