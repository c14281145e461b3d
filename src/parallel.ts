/**
 * Parallelization
 *
 * One prompt fanned out over many inputs with a bounded number of calls in
 * flight. Outputs keep the order of their inputs.
 *
 * @module parallel
 */

import { getConfig } from './config';
import { WorkflowError } from './errors';
import {
  TimingTracker,
  executeStep,
  formatInput,
  summarizeUsage,
  type StepOptions,
  type StepResult,
  type UsageSummary,
} from './executor';
import type { ChatClient } from './providers';

export interface ParallelOptions extends StepOptions {
  /** Max calls in flight (default: PARALLEL_WORKERS) */
  workers?: number;
}

export interface ParallelResult {
  outputs: string[];
  steps: StepResult[];
  usage: UsageSummary;
  totalMs: number;
}

/**
 * Map `items` through `fn` with at most `limit` promises pending. Results
 * are positional. After the first rejection no new items are started and
 * the returned promise rejects with that error.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new WorkflowError(`Concurrency limit must be a positive integer, got ${limit}`, 'invalid_input');
  }

  const results: R[] = new Array(items.length);
  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  const workerCount = Math.min(limit, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}

/**
 * Apply `prompt` to every input concurrently.
 *
 * @example
 * ```typescript
 * const { outputs } = await parallel(
 *   manager,
 *   'Analyze how market changes will impact this stakeholder group.',
 *   ['Customers: price sensitive, want better tech', 'Employees: job security worries'],
 *   { workers: 2 }
 * );
 * ```
 */
export async function parallel(
  client: ChatClient,
  prompt: string,
  inputs: string[],
  options: ParallelOptions = {}
): Promise<ParallelResult> {
  const { workers = getConfig().workflows.parallelWorkers, ...stepOptions } = options;

  if (!prompt.trim()) {
    throw new WorkflowError('Parallel prompt must not be empty', 'invalid_input');
  }

  const timing = new TimingTracker();

  const steps = await mapWithConcurrency(inputs, workers, async (input, index) => {
    const step = await executeStep(client, formatInput(prompt, input), stepOptions);
    console.log(`[Parallel] Input ${index + 1}/${inputs.length} complete (${step.latencyMs}ms)`);
    return step;
  });

  return {
    outputs: steps.map(step => step.output),
    steps,
    usage: summarizeUsage(steps),
    totalMs: timing.getTotalMs(),
  };
}
