/**
 * Configuration
 *
 * Builds a validated configuration object from environment variables.
 * `getConfig()` loads `.env` once and caches the result; `loadConfig()`
 * parses whatever environment it is handed, which keeps it usable from
 * tests.
 *
 * Usage:
 *   import { getConfig } from './config';
 *
 *   const { providers, workflows } = getConfig();
 *   console.log(providers.order, workflows.parallelWorkers);
 *
 * @module config
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { getProviderModelIds, type Provider } from './model-registry';

// =============================================================================
// Configuration Schema
// =============================================================================

const PROVIDER_NAMES = ['anthropic', 'openai', 'google'] as const;

function providerSchema(provider: Provider) {
  const defaults = getProviderModelIds(provider);
  return z.object({
    apiKey: z.string().min(1).optional(),
    model: z.string().min(1).default(defaults.primary),
    fallbackModel: z.string().min(1).default(defaults.fallback),
  });
}

const configSchema = z.object({
  providers: z.object({
    order: z.array(z.enum(PROVIDER_NAMES)).min(1).default([...PROVIDER_NAMES]),
    anthropic: providerSchema('anthropic'),
    openai: providerSchema('openai'),
    google: providerSchema('google'),
  }),

  workflows: z.object({
    maxTokens: z.number().int().positive().default(1024),
    temperature: z.number().min(0).max(2).default(0.3),
    parallelWorkers: z.number().int().positive().default(3),
    orchestratorWorkers: z.number().int().positive().default(3),
  }),
});

export type Config = z.infer<typeof configSchema>;
export type ProviderSettings = Config['providers']['anthropic'];

// Environment variable behind each config path, for error reporting
const ENV_NAMES: Record<string, string> = {
  'providers.order': 'LLM_PROVIDER_ORDER',
  'providers.anthropic.apiKey': 'ANTHROPIC_API_KEY',
  'providers.anthropic.model': 'ANTHROPIC_MODEL',
  'providers.anthropic.fallbackModel': 'ANTHROPIC_FALLBACK_MODEL',
  'providers.openai.apiKey': 'OPENAI_API_KEY',
  'providers.openai.model': 'OPENAI_MODEL',
  'providers.openai.fallbackModel': 'OPENAI_FALLBACK_MODEL',
  'providers.google.apiKey': 'GOOGLE_AI_API_KEY',
  'providers.google.model': 'GOOGLE_MODEL',
  'providers.google.fallbackModel': 'GOOGLE_FALLBACK_MODEL',
  'workflows.maxTokens': 'LLM_MAX_TOKENS',
  'workflows.temperature': 'LLM_TEMPERATURE',
  'workflows.parallelWorkers': 'PARALLEL_WORKERS',
  'workflows.orchestratorWorkers': 'ORCHESTRATOR_WORKERS',
};

// =============================================================================
// Environment Variable Loading
// =============================================================================

type Env = Record<string, string | undefined>;

function parseCommaSeparated(value: string | undefined): string[] | undefined {
  if (!value || value.trim() === '') {
    return undefined;
  }
  return value.split(',').map((s) => s.trim().toLowerCase()).filter((s) => s.length > 0);
}

function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function parseFloatOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? undefined : parsed;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined;
}

function loadFromEnvironment(env: Env) {
  return {
    providers: {
      order: parseCommaSeparated(env.LLM_PROVIDER_ORDER),
      anthropic: {
        apiKey: nonEmpty(env.ANTHROPIC_API_KEY),
        model: nonEmpty(env.ANTHROPIC_MODEL),
        fallbackModel: nonEmpty(env.ANTHROPIC_FALLBACK_MODEL),
      },
      openai: {
        apiKey: nonEmpty(env.OPENAI_API_KEY),
        model: nonEmpty(env.OPENAI_MODEL),
        fallbackModel: nonEmpty(env.OPENAI_FALLBACK_MODEL),
      },
      google: {
        apiKey: nonEmpty(env.GOOGLE_AI_API_KEY),
        model: nonEmpty(env.GOOGLE_MODEL),
        fallbackModel: nonEmpty(env.GOOGLE_FALLBACK_MODEL),
      },
    },
    workflows: {
      maxTokens: parseIntOrUndefined(env.LLM_MAX_TOKENS),
      temperature: parseFloatOrUndefined(env.LLM_TEMPERATURE),
      parallelWorkers: parseIntOrUndefined(env.PARALLEL_WORKERS),
      orchestratorWorkers: parseIntOrUndefined(env.ORCHESTRATOR_WORKERS),
    },
  };
}

// =============================================================================
// Configuration Validation
// =============================================================================

export class ConfigValidationError extends Error {
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(message: string, invalidVars: { name: string; reason: string }[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.invalidVars = invalidVars;
  }
}

function envNameFor(path: (string | number)[]): string {
  for (let length = path.length; length > 0; length--) {
    const name = ENV_NAMES[path.slice(0, length).join('.')];
    if (name) return name;
  }
  return path.join('.');
}

/**
 * Parse configuration from an environment map.
 *
 * @throws {ConfigValidationError} listing every variable that failed validation
 */
export function loadConfig(env: Env): Config {
  const parseResult = configSchema.safeParse(loadFromEnvironment(env));

  if (!parseResult.success) {
    const invalidVars = parseResult.error.issues.map((issue) => ({
      name: envNameFor(issue.path),
      reason: issue.message,
    }));
    const details = invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ');
    throw new ConfigValidationError(`Invalid configuration: ${details}`, invalidVars);
  }

  return parseResult.data;
}

// =============================================================================
// Configuration Export
// =============================================================================

let cachedConfig: Config | null = null;

/**
 * Configuration for this process. Reads `.env` on first use.
 */
export function getConfig(): Config {
  if (!cachedConfig) {
    dotenv.config();
    cachedConfig = loadConfig(process.env);
  }
  return cachedConfig;
}

/**
 * Drop the cached configuration so the next getConfig() re-reads the environment.
 */
export function resetConfig(): void {
  cachedConfig = null;
}
