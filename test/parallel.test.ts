import { describe, it, expect } from 'vitest';
import { isWorkflowError } from '../src/errors';
import { mapWithConcurrency, parallel } from '../src/parallel';
import { ScriptedClient, captureError, delay, inputOf } from './helpers/scripted-client';

describe('mapWithConcurrency', () => {
  it('should keep results in input order', async () => {
    const results = await mapWithConcurrency([30, 5, 15], 3, async (ms, index) => {
      await delay(ms);
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:15']);
  });

  it('should never exceed the limit', async () => {
    let inFlight = 0;
    let maxInFlight = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await delay(5);
      inFlight--;
    });

    expect(maxInFlight).toBe(2);
  });

  it('should reject a limit below one', async () => {
    const error = await captureError(mapWithConcurrency([1], 0, async (n) => n));
    expect(isWorkflowError(error, 'invalid_input')).toBe(true);
  });
});

describe('parallel', () => {
  it('should apply the prompt to every input and keep their order', async () => {
    const delays: Record<string, number> = { a: 30, b: 5, c: 15 };
    const client = new ScriptedClient(async (prompt) => {
      const input = inputOf(prompt);
      await delay(delays[input] ?? 0);
      return `done:${input}`;
    });

    const result = await parallel(client, 'Analyze.', ['a', 'b', 'c'], { workers: 3 });

    expect(result.outputs).toEqual(['done:a', 'done:b', 'done:c']);
    expect(result.steps.map(step => step.prompt)).toEqual([
      'Analyze.\nInput: a',
      'Analyze.\nInput: b',
      'Analyze.\nInput: c',
    ]);
    expect(result.usage.calls).toBe(3);
  });

  it('should bound calls in flight by workers', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const client = new ScriptedClient(async (prompt) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await delay(5);
      inFlight--;
      return inputOf(prompt);
    });

    const result = await parallel(client, 'Echo.', ['1', '2', '3', '4', '5'], { workers: 2 });

    expect(maxInFlight).toBe(2);
    expect(result.outputs).toEqual(['1', '2', '3', '4', '5']);
  });

  it('should make no calls for no inputs', async () => {
    const client = new ScriptedClient('unused');

    const result = await parallel(client, 'Analyze.', []);

    expect(result.outputs).toEqual([]);
    expect(client.calls).toHaveLength(0);
  });

  it('should reject a blank prompt or a bad worker count', async () => {
    const client = new ScriptedClient('unused');

    const blank = await captureError(parallel(client, '  ', ['a']));
    const noWorkers = await captureError(parallel(client, 'Analyze.', ['a'], { workers: 0 }));

    expect(isWorkflowError(blank, 'invalid_input')).toBe(true);
    expect(isWorkflowError(noWorkers, 'invalid_input')).toBe(true);
    expect(client.calls).toHaveLength(0);
  });

  it('should stop taking inputs after a failure', async () => {
    const client = new ScriptedClient((prompt) => {
      if (inputOf(prompt) === 'b') {
        throw new Error('boom');
      }
      return 'ok';
    });

    const error = await captureError(parallel(client, 'Analyze.', ['a', 'b', 'c'], { workers: 1 }));

    expect(error instanceof Error && error.message).toBe('boom');
    expect(client.prompts.map(inputOf)).toEqual(['a', 'b']);
  });
});
