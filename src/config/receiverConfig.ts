/**
 * Receiver Configuration
 *
 * Loads the JSON configuration file describing notification receivers,
 * applies `defaults` to every receiver of the defaults' type, and
 * validates templates up front.
 * A loaded configuration is immutable.
 *
 * @module config/receiverConfig
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { compileTemplate } from '../templates/index.js';
import { err, ok, type ReceiverConfig, type Result } from '../types/index.js';

// ─── Schema ──────────────────────────────────────────────────────────────────

const receiverFieldsSchema = z
  .object({
    type: z.enum(['jira', 'github']),
    apiUrl: z.string().url(),
    user: z.string(),
    password: z.string(),
    token: z.string(),
    project: z.string(),
    issueType: z.string(),
    priority: z.string(),
    components: z.array(z.string()),
    labels: z.array(z.string()),
    owner: z.string(),
    repo: z.string(),
    summary: z.string(),
    description: z.string(),
  })
  .partial()
  .strict();

const receiverSchema = receiverFieldsSchema.extend({ name: z.string().min(1) }).strict();

export const configFileSchema = z
  .object({
    defaults: receiverFieldsSchema.default({}),
    receivers: z.array(receiverSchema).min(1, 'at least one receiver is required'),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

// ─── Loaded Config ───────────────────────────────────────────────────────────

export interface Config {
  readonly receivers: readonly ReceiverConfig[];
  /** Exact, case-sensitive lookup. */
  receiverByName(name: string): ReceiverConfig | undefined;
  /** Effective configuration with secrets masked, for the /config page. */
  toDisplayString(): string;
}

export interface ConfigError {
  readonly kind: 'config';
  readonly message: string;
}

const SECRET_FIELDS = ['password', 'token'] as const;
const SECRET_PLACEHOLDER = '<secret>';

function configError(message: string): ConfigError {
  return { kind: 'config', message };
}

function maskSecrets(receiver: ReceiverConfig): Record<string, unknown> {
  const masked: Record<string, unknown> = { ...receiver };
  for (const field of SECRET_FIELDS) {
    if (receiver[field] !== undefined) masked[field] = SECRET_PLACEHOLDER;
  }
  return masked;
}

function createConfig(receivers: readonly ReceiverConfig[]): Config {
  const byName = new Map(receivers.map((receiver) => [receiver.name, receiver]));
  return {
    receivers,
    receiverByName(name: string): ReceiverConfig | undefined {
      return byName.get(name);
    },
    toDisplayString(): string {
      return JSON.stringify({ receivers: receivers.map(maskSecrets) }, null, 2);
    },
  };
}

function validateTemplates(receiver: ReceiverConfig): ConfigError | null {
  for (const field of ['summary', 'description'] as const) {
    const source = receiver[field];
    if (source === undefined) continue;
    const compiled = compileTemplate(source);
    if (!compiled.ok) {
      return configError(`receiver "${receiver.name}": ${field} template: ${compiled.error.message}`);
    }
  }
  return null;
}

/**
 * Build a Config from an already-parsed document.
 */
export function parseConfig(document: unknown): Result<Config, ConfigError> {
  const parsed = configFileSchema.safeParse(document);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return err(configError(`invalid configuration: ${detail}`));
  }

  const { defaults, receivers } = parsed.data;
  const seen = new Set<string>();
  const effective: ReceiverConfig[] = [];

  for (const receiver of receivers) {
    if (seen.has(receiver.name)) {
      return err(configError(`duplicate receiver name "${receiver.name}"`));
    }
    seen.add(receiver.name);

    const defaultsType = defaults.type ?? 'jira';
    const type = receiver.type ?? defaultsType;
    // Defaults describe one tracker; receivers of another type inherit nothing.
    const inherited = type === defaultsType ? defaults : {};
    const merged: ReceiverConfig = { ...inherited, ...receiver, type };
    const templateProblem = validateTemplates(merged);
    if (templateProblem) return err(templateProblem);
    effective.push(Object.freeze(merged));
  }

  return ok(createConfig(Object.freeze(effective)));
}

/**
 * Read and parse a configuration file.
 *
 * @param path - Path to the JSON configuration file
 */
export async function loadConfigFile(path: string): Promise<Result<Config, ConfigError>> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    return err(configError(`cannot read ${path}: ${reason}`));
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    return err(configError(`cannot parse ${path}: ${reason}`));
  }

  return parseConfig(document);
}
