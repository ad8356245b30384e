/**
 * Dossier - Centralized Config Loader
 *
 * Loads configuration from ~/.config/dossier/config.json with env var overrides.
 * Resolution order: process.env > config.json > defaults
 */

import { readFile, writeFile, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';

// ============================================================================
// Errors
// ============================================================================

/** Missing credentials or invalid settings. Not recoverable within a run. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Types
// ============================================================================

export const PROVIDERS = ['openai', 'anthropic'] as const;
export type Provider = (typeof PROVIDERS)[number];

const templateOverridesSchema = z
  .object({
    company: z.string().min(1),
    industry: z.string().min(1),
    financial: z.string().min(1),
    revenue: z.string().min(1),
    generic: z.string().min(1),
  })
  .partial();

export const dossierConfigSchema = z.object({
  version: z.number().int().default(1),
  provider: z.enum(PROVIDERS).optional(),
  openai_api_key: z.string().optional(),
  openai_base_url: z.string().url().optional(),
  anthropic_api_key: z.string().optional(),
  briefing_model: z.string().optional(),
  editor_model: z.string().optional(),
  briefing_concurrency: z.number().int().positive().optional(),
  max_doc_length: z.number().int().positive().optional(),
  max_prompt_length: z.number().int().positive().optional(),
  request_timeout_ms: z.number().int().positive().optional(),
  templates: templateOverridesSchema.optional(),
});

export type DossierConfig = z.infer<typeof dossierConfigSchema>;
export type TemplateOverrides = z.infer<typeof templateOverridesSchema>;

export interface ResolvedConfig {
  provider: Provider;
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  anthropicApiKey?: string;
  briefingModel: string;
  editorModel: string;
  briefingConcurrency: number;
  maxDocLength: number;
  maxPromptLength: number;
  requestTimeoutMs: number;
  templates: TemplateOverrides;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_BRIEFING_CONCURRENCY = 2;
export const DEFAULT_MAX_DOC_LENGTH = 12_000;
export const DEFAULT_MAX_PROMPT_LENGTH = 140_000;
const DEFAULT_REQUEST_TIMEOUT_MS = 10 * 60 * 1000;

const DEFAULT_MODELS: Record<Provider, { briefing: string; editor: string }> = {
  openai: { briefing: 'gpt-4o-mini', editor: 'gpt-4o' },
  anthropic: { briefing: 'claude-sonnet-4-20250514', editor: 'claude-sonnet-4-20250514' },
};

// ============================================================================
// Paths
// ============================================================================

export function getDossierConfigPath(): string {
  return process.env.DOSSIER_CONFIG_PATH || path.join(os.homedir(), '.config', 'dossier', 'config.json');
}

// ============================================================================
// Config Loading
// ============================================================================

/**
 * Load config from disk. Returns null if the file doesn't exist, throws
 * ConfigError if it exists but is malformed.
 */
async function loadConfigFile(configPath: string): Promise<DossierConfig | null> {
  if (!existsSync(configPath)) {
    return null;
  }

  const content = await readFile(configPath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = dossierConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${configPath}:\n${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function parseProvider(value: string | undefined): Provider | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = z.enum(PROVIDERS).safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`DOSSIER_PROVIDER must be one of ${PROVIDERS.join(', ')} (got "${value}")`);
  }
  return parsed.data;
}

function parsePositiveInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`${name} must be a positive integer (got "${value}")`);
  }
  return parsed;
}

/**
 * Load resolved config: process.env takes precedence over config.json.
 * The provider defaults to anthropic when only an Anthropic key is present.
 */
export async function loadDossierConfig(
  env: NodeJS.ProcessEnv = process.env,
  configPath: string = getDossierConfigPath()
): Promise<ResolvedConfig> {
  const file = await loadConfigFile(configPath);

  const openaiApiKey = env.OPENAI_API_KEY || file?.openai_api_key;
  const anthropicApiKey = env.ANTHROPIC_API_KEY || file?.anthropic_api_key;
  const provider: Provider =
    parseProvider(env.DOSSIER_PROVIDER) ??
    file?.provider ??
    (anthropicApiKey && !openaiApiKey ? 'anthropic' : 'openai');

  return {
    provider,
    openaiApiKey,
    openaiBaseUrl: env.OPENAI_BASE_URL || file?.openai_base_url,
    anthropicApiKey,
    briefingModel: env.DOSSIER_BRIEFING_MODEL || file?.briefing_model || DEFAULT_MODELS[provider].briefing,
    editorModel: env.DOSSIER_EDITOR_MODEL || file?.editor_model || DEFAULT_MODELS[provider].editor,
    briefingConcurrency:
      parsePositiveInt('DOSSIER_BRIEFING_CONCURRENCY', env.DOSSIER_BRIEFING_CONCURRENCY) ??
      file?.briefing_concurrency ??
      DEFAULT_BRIEFING_CONCURRENCY,
    maxDocLength: file?.max_doc_length ?? DEFAULT_MAX_DOC_LENGTH,
    maxPromptLength: file?.max_prompt_length ?? DEFAULT_MAX_PROMPT_LENGTH,
    requestTimeoutMs: file?.request_timeout_ms ?? DEFAULT_REQUEST_TIMEOUT_MS,
    templates: file?.templates ?? {},
  };
}

/**
 * Merge settings into the config file. The result is validated before it is
 * written, so a bad value never lands on disk.
 */
export async function saveDossierConfig(
  config: Partial<DossierConfig> | Record<string, unknown>,
  configPath: string = getDossierConfigPath()
): Promise<DossierConfig> {
  await mkdir(path.dirname(configPath), { recursive: true });

  const existing = await loadConfigFile(configPath);
  const parsed = dossierConfigSchema.safeParse({ version: 1, ...existing, ...config });
  if (!parsed.success) {
    throw new ConfigError(`Invalid config:\n${formatIssues(parsed.error)}`);
  }

  await writeFile(configPath, JSON.stringify(parsed.data, null, 2) + '\n');
  return parsed.data;
}

// ============================================================================
// Helpers
// ============================================================================

/** Config keys settable from `dossier config set`, with how to parse each value. */
export const SETTABLE_KEYS = {
  provider: 'string',
  openai_api_key: 'string',
  openai_base_url: 'string',
  anthropic_api_key: 'string',
  briefing_model: 'string',
  editor_model: 'string',
  briefing_concurrency: 'number',
  max_doc_length: 'number',
  max_prompt_length: 'number',
  request_timeout_ms: 'number',
} as const satisfies Partial<Record<keyof DossierConfig, 'string' | 'number'>>;

export type SettableKey = keyof typeof SETTABLE_KEYS;

export function isSettableKey(key: string): key is SettableKey {
  return Object.prototype.hasOwnProperty.call(SETTABLE_KEYS, key);
}

/** Parse a command-line value into the type the setting expects. */
export function parseSettingValue(key: SettableKey, value: string): string | number {
  return SETTABLE_KEYS[key] === 'number' ? Number(value) : value;
}

/** Mask a secret for display, keeping the last four characters. */
export function maskSecret(value: string | undefined): string {
  if (!value) return '(not set)';
  if (value.length <= 8) return '****';
  return `****${value.slice(-4)}`;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}
