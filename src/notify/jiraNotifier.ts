/**
 * Jira notifier.
 *
 * Files one issue per alert group through the Jira REST API v2.
 *
 * @module notify/jiraNotifier
 */

import { z } from 'zod';
import { templateDataFor } from '../templates/index.js';
import { err, ok, type AlertBatch, type ReceiverConfig, type Result } from '../types/index.js';
import { deliver } from './httpTransport.js';
import { baseUrl, compileTicketTemplates, truncate, validateTarget } from './ticketFields.js';
import type { ConstructionFailure, DeliveryFailure, HttpTransport, Notifier } from './types.js';

export const JIRA_MAX_SUMMARY = 255;
export const JIRA_MAX_DESCRIPTION = 32767;

const jiraTargetSchema = z
  .object({
    apiUrl: z.string().url(),
    project: z.string().min(1),
    issueType: z.string().min(1),
    user: z.string().optional(),
    password: z.string().optional(),
    token: z.string().optional(),
    priority: z.string().optional(),
    components: z.array(z.string()).optional(),
    labels: z.array(z.string()).optional(),
  })
  .refine((target) => target.token !== undefined || (target.user !== undefined && target.password !== undefined), {
    message: 'either token or user and password is required',
  });

export type JiraTarget = z.infer<typeof jiraTargetSchema>;

export interface JiraIssueFields {
  project: { key: string };
  issuetype: { name: string };
  summary: string;
  description: string;
  labels?: string[];
  priority?: { name: string };
  components?: Array<{ name: string }>;
}

function authorization(target: JiraTarget): string {
  if (target.token !== undefined) return `Bearer ${target.token}`;
  const credentials = Buffer.from(`${target.user ?? ''}:${target.password ?? ''}`).toString('base64');
  return `Basic ${credentials}`;
}

export function createJiraNotifier(
  receiver: ReceiverConfig,
  transport: HttpTransport,
): Result<Notifier, ConstructionFailure> {
  const target = validateTarget(jiraTargetSchema, receiver);
  if (!target.ok) return target;
  const templates = compileTicketTemplates(receiver);
  if (!templates.ok) return templates;

  const { summary, description } = templates.value;
  const jira = target.value;
  const url = `${baseUrl(jira.apiUrl)}/rest/api/2/issue`;

  return ok({
    kind: 'jira',
    receiver: receiver.name,
    async notify(batch: AlertBatch, signal: AbortSignal): Promise<Result<void, DeliveryFailure>> {
      const data = templateDataFor(batch);
      const fields: JiraIssueFields = {
        project: { key: jira.project },
        issuetype: { name: jira.issueType },
        summary: truncate(summary.render(data), JIRA_MAX_SUMMARY),
        description: truncate(description.render(data), JIRA_MAX_DESCRIPTION),
      };
      if (jira.labels && jira.labels.length > 0) fields.labels = jira.labels;
      if (jira.priority) fields.priority = { name: jira.priority };
      if (jira.components && jira.components.length > 0) {
        fields.components = jira.components.map((name) => ({ name }));
      }

      const result = await deliver(
        transport,
        {
          method: 'POST',
          url,
          headers: {
            Accept: 'application/json',
            'Content-Type': 'application/json',
            Authorization: authorization(jira),
          },
          body: JSON.stringify({ fields }),
        },
        signal,
        'jira',
      );
      return result.ok ? ok(undefined) : err(result.error);
    },
  });
}
