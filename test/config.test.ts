import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConfigValidationError, getConfig, loadConfig, resetConfig } from '../src/config';

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.providers.order).toEqual(['anthropic', 'openai', 'google']);
    expect(config.providers.anthropic).toEqual({
      model: 'claude-sonnet-4-20250514',
      fallbackModel: 'claude-3-5-haiku-20241022',
    });
    expect(config.providers.openai.model).toBe('gpt-4o');
    expect(config.providers.google.fallbackModel).toBe('gemini-1.5-flash');
    expect(config.workflows).toEqual({
      maxTokens: 1024,
      temperature: 0.3,
      parallelWorkers: 3,
      orchestratorWorkers: 3,
    });
  });

  it('should read keys, models, provider order and workflow settings', () => {
    const config = loadConfig({
      ANTHROPIC_API_KEY: 'test-key',
      OPENAI_MODEL: 'gpt-4o-mini',
      LLM_PROVIDER_ORDER: 'OpenAI, google',
      LLM_TEMPERATURE: '0.7',
      PARALLEL_WORKERS: '8',
      ORCHESTRATOR_WORKERS: '2',
    });

    expect(config.providers.anthropic.apiKey).toBe('test-key');
    expect(config.providers.openai.model).toBe('gpt-4o-mini');
    expect(config.providers.order).toEqual(['openai', 'google']);
    expect(config.workflows.temperature).toBe(0.7);
    expect(config.workflows.parallelWorkers).toBe(8);
    expect(config.workflows.orchestratorWorkers).toBe(2);
  });

  it('should treat blank values as unset', () => {
    const config = loadConfig({
      OPENAI_API_KEY: '   ',
      LLM_PROVIDER_ORDER: '',
      LLM_MAX_TOKENS: 'lots',
    });

    expect(config.providers.openai.apiKey).toBeUndefined();
    expect(config.providers.order).toEqual(['anthropic', 'openai', 'google']);
    expect(config.workflows.maxTokens).toBe(1024);
  });

  it('should name every invalid variable', () => {
    let caught: unknown;
    try {
      loadConfig({
        LLM_PROVIDER_ORDER: 'anthropic,mistral',
        PARALLEL_WORKERS: '0',
        LLM_TEMPERATURE: '3',
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    if (caught instanceof ConfigValidationError) {
      expect(caught.invalidVars.map(v => v.name)).toEqual([
        'LLM_PROVIDER_ORDER',
        'LLM_TEMPERATURE',
        'PARALLEL_WORKERS',
      ]);
      expect(caught.message).toMatch(/^Invalid configuration: LLM_PROVIDER_ORDER: /);
    }
  });
});

describe('getConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  it('should cache until reset', () => {
    vi.stubEnv('PARALLEL_WORKERS', '5');
    resetConfig();
    expect(getConfig().workflows.parallelWorkers).toBe(5);

    vi.stubEnv('PARALLEL_WORKERS', '7');
    expect(getConfig().workflows.parallelWorkers).toBe(5);

    resetConfig();
    expect(getConfig().workflows.parallelWorkers).toBe(7);
  });
});
