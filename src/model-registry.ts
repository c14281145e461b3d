/**
 * Model Registry - Models the workflow providers can call
 *
 * Pricing, limits and capabilities for the Claude, GPT and Gemini models
 * the providers default to, plus the cost helpers workflows use to report
 * what a run spent.
 *
 * @module model-registry
 */

// =============================================================================
// Types
// =============================================================================

export type Provider = 'anthropic' | 'openai' | 'google';
export type ModelTier = 'flagship' | 'balanced' | 'fast';

export interface ModelConfig {
  id: string;                    // Specific model version ID
  alias?: string;                // Auto-updating alias (if available)
  provider: Provider;
  tier: ModelTier;
  contextWindow: number;         // Max context in tokens
  maxOutput: number;             // Max output tokens
  inputCost: number;             // Cost per 1M input tokens (USD)
  outputCost: number;            // Cost per 1M output tokens (USD)
  features?: string[];
  notes?: string;
}

export interface ProviderModels {
  primary: string;               // Model key from MODELS
  fallback: string;
}

// =============================================================================
// Model Registry
// =============================================================================

export const MODELS: Record<string, ModelConfig> = {
  // ---------------------------------------------------------------------------
  // Anthropic
  // ---------------------------------------------------------------------------
  'claude-opus-4': {
    id: 'claude-opus-4-20250514',
    alias: 'claude-opus-4-0',
    provider: 'anthropic',
    tier: 'flagship',
    contextWindow: 200000,
    maxOutput: 32000,
    inputCost: 15.00,
    outputCost: 75.00,
    features: ['extended_thinking', 'vision', 'tool_use'],
    notes: 'Strongest planner. Worth it for orchestrator decomposition on hard tasks.',
  },
  'claude-sonnet-4': {
    id: 'claude-sonnet-4-20250514',
    alias: 'claude-sonnet-4-0',
    provider: 'anthropic',
    tier: 'balanced',
    contextWindow: 200000,
    maxOutput: 64000,
    inputCost: 3.00,
    outputCost: 15.00,
    features: ['extended_thinking', 'vision', 'tool_use'],
    notes: 'Default for chain steps and workers.',
  },
  'claude-haiku-3.5': {
    id: 'claude-3-5-haiku-20241022',
    alias: 'claude-3-5-haiku-latest',
    provider: 'anthropic',
    tier: 'fast',
    contextWindow: 200000,
    maxOutput: 8192,
    inputCost: 0.80,
    outputCost: 4.00,
    features: ['vision', 'tool_use'],
    notes: 'Route selection and other short classification calls.',
  },

  // ---------------------------------------------------------------------------
  // OpenAI
  // ---------------------------------------------------------------------------
  'gpt-4o': {
    id: 'gpt-4o',
    provider: 'openai',
    tier: 'balanced',
    contextWindow: 128000,
    maxOutput: 16384,
    inputCost: 2.50,
    outputCost: 10.00,
    features: ['json_mode', 'vision', 'function_calling'],
  },
  'gpt-4o-mini': {
    id: 'gpt-4o-mini',
    provider: 'openai',
    tier: 'fast',
    contextWindow: 128000,
    maxOutput: 16384,
    inputCost: 0.15,
    outputCost: 0.60,
    features: ['json_mode', 'vision', 'function_calling'],
    notes: 'Cheapest way to fan a prompt out over many inputs.',
  },

  // ---------------------------------------------------------------------------
  // Google Gemini
  // ---------------------------------------------------------------------------
  'gemini-1.5-pro': {
    id: 'gemini-1.5-pro',
    provider: 'google',
    tier: 'balanced',
    contextWindow: 2000000,
    maxOutput: 8192,
    inputCost: 1.25,
    outputCost: 5.00,
    features: ['json_mode', 'vision'],
  },
  'gemini-1.5-flash': {
    id: 'gemini-1.5-flash',
    provider: 'google',
    tier: 'fast',
    contextWindow: 1000000,
    maxOutput: 8192,
    inputCost: 0.075,
    outputCost: 0.30,
    features: ['json_mode', 'vision'],
  },
};

/** Primary and rate-limit fallback model for each provider */
export const DEFAULT_PROVIDER_MODELS: Record<Provider, ProviderModels> = {
  anthropic: { primary: 'claude-sonnet-4', fallback: 'claude-haiku-3.5' },
  openai: { primary: 'gpt-4o', fallback: 'gpt-4o-mini' },
  google: { primary: 'gemini-1.5-pro', fallback: 'gemini-1.5-flash' },
};

// Pricing used when a provider answers with a model the registry doesn't know
const UNKNOWN_MODEL_PRICING = { inputCost: 3.00, outputCost: 15.00 };

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Get a model configuration by key
 */
export function getModel(modelKey: string): ModelConfig | undefined {
  return MODELS[modelKey];
}

/**
 * Get the actual model ID (resolves aliases if configured)
 */
export function getModelId(modelKey: string, useAlias: boolean = false): string {
  const model = MODELS[modelKey];
  if (!model) {
    throw new Error(`Unknown model: ${modelKey}`);
  }
  return useAlias && model.alias ? model.alias : model.id;
}

/**
 * Look a model up by the ID (or alias) a provider reports
 */
export function findModelById(modelId: string): ModelConfig | undefined {
  return Object.values(MODELS).find(m => m.id === modelId || m.alias === modelId);
}

export function getModelsByProvider(provider: Provider): ModelConfig[] {
  return Object.values(MODELS).filter(m => m.provider === provider);
}

export function getModelsByTier(tier: ModelTier): ModelConfig[] {
  return Object.values(MODELS).filter(m => m.tier === tier);
}

/**
 * Default primary/fallback model IDs for a provider
 */
export function getProviderModelIds(provider: Provider): { primary: string; fallback: string } {
  const models = DEFAULT_PROVIDER_MODELS[provider];
  return {
    primary: getModelId(models.primary),
    fallback: getModelId(models.fallback),
  };
}

/**
 * Calculate estimated cost for a request.
 * Accepts a registry key or a model ID.
 */
export function estimateCost(
  modelKeyOrId: string,
  inputTokens: number,
  outputTokens: number
): number {
  const model = MODELS[modelKeyOrId] ?? findModelById(modelKeyOrId);
  if (!model) {
    throw new Error(`Unknown model: ${modelKeyOrId}`);
  }

  return priceTokens(model, inputTokens, outputTokens);
}

/**
 * Like estimateCost, but prices unknown models at Sonnet-class rates
 * instead of throwing.
 */
export function estimateCostForModel(
  modelKeyOrId: string,
  inputTokens: number,
  outputTokens: number
): number {
  const model = MODELS[modelKeyOrId] ?? findModelById(modelKeyOrId);
  return priceTokens(model ?? UNKNOWN_MODEL_PRICING, inputTokens, outputTokens);
}

function priceTokens(
  pricing: { inputCost: number; outputCost: number },
  inputTokens: number,
  outputTokens: number
): number {
  const inputCost = (inputTokens / 1_000_000) * pricing.inputCost;
  const outputCost = (outputTokens / 1_000_000) * pricing.outputCost;
  return inputCost + outputCost;
}

export function modelSupportsFeature(modelKey: string, feature: string): boolean {
  const model = MODELS[modelKey];
  return model?.features?.includes(feature) ?? false;
}

/**
 * Get the cheapest model that meets minimum requirements
 */
export function getCheapestModel(options: {
  minContextWindow?: number;
  provider?: Provider;
  tier?: ModelTier;
}): ModelConfig | undefined {
  const { minContextWindow, provider, tier } = options;
  let candidates = Object.values(MODELS);

  if (provider) {
    candidates = candidates.filter(m => m.provider === provider);
  }
  if (tier) {
    candidates = candidates.filter(m => m.tier === tier);
  }
  if (minContextWindow) {
    candidates = candidates.filter(m => m.contextWindow >= minContextWindow);
  }

  // Sort by total cost (input + output, assuming equal usage)
  candidates.sort((a, b) => (a.inputCost + a.outputCost) - (b.inputCost + b.outputCost));

  return candidates[0];
}
