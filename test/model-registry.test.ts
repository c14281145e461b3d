import { describe, it, expect } from 'vitest';
import {
  estimateCost,
  estimateCostForModel,
  findModelById,
  getCheapestModel,
  getModelId,
  getModelsByProvider,
  getModelsByTier,
  getProviderModelIds,
  modelSupportsFeature,
} from '../src/model-registry';

describe('model registry', () => {
  it('should list models by tier', () => {
    expect(getModelsByTier('fast').map(m => m.id)).toEqual([
      'claude-3-5-haiku-20241022',
      'gpt-4o-mini',
      'gemini-1.5-flash',
    ]);
  });

  it('should resolve model IDs and aliases', () => {
    expect(getModelId('claude-haiku-3.5')).toBe('claude-3-5-haiku-20241022');
    expect(getModelId('claude-haiku-3.5', true)).toBe('claude-3-5-haiku-latest');
    expect(getModelId('gpt-4o', true)).toBe('gpt-4o');
    expect(() => getModelId('nope')).toThrow('Unknown model: nope');
  });

  it('should find models by reported ID or alias', () => {
    expect(findModelById('gpt-4o-mini')?.tier).toBe('fast');
    expect(findModelById('claude-sonnet-4-0')?.id).toBe('claude-sonnet-4-20250514');
    expect(findModelById('mystery-model')).toBeUndefined();
  });

  it('should price requests by key or ID', () => {
    expect(estimateCost('claude-sonnet-4', 2000, 500)).toBeCloseTo(0.0135, 10);
    expect(estimateCost('gpt-4o', 1_000_000, 1_000_000)).toBeCloseTo(12.5, 10);
    expect(() => estimateCost('mystery-model', 1, 1)).toThrow('Unknown model: mystery-model');
  });

  it('should price unknown models at the default rate', () => {
    expect(estimateCostForModel('mystery-model', 1_000_000, 1_000_000)).toBeCloseTo(18, 10);
    expect(estimateCostForModel('gemini-1.5-flash', 1_000_000, 0)).toBeCloseTo(0.075, 10);
  });

  it('should pick the cheapest model that fits', () => {
    expect(getCheapestModel({ minContextWindow: 100000 })?.id).toBe('gemini-1.5-flash');
    expect(getCheapestModel({ provider: 'anthropic' })?.id).toBe('claude-3-5-haiku-20241022');
    expect(getCheapestModel({ minContextWindow: 5_000_000 })).toBeUndefined();
  });

  it('should expose provider defaults and features', () => {
    expect(getProviderModelIds('openai')).toEqual({ primary: 'gpt-4o', fallback: 'gpt-4o-mini' });
    expect(getModelsByProvider('google').map(m => m.id)).toEqual(['gemini-1.5-pro', 'gemini-1.5-flash']);
    expect(modelSupportsFeature('gpt-4o', 'json_mode')).toBe(true);
    expect(modelSupportsFeature('claude-haiku-3.5', 'json_mode')).toBe(false);
  });
});
