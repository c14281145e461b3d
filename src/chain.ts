/**
 * Prompt Chaining
 *
 * Each prompt transforms the previous step's output. Useful when a task
 * splits cleanly into fixed stages (extract → normalize → format).
 *
 * @module chain
 */

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

export interface ChainStep extends StepResult {
  index: number;
}

export interface ChainOptions extends StepOptions {
  /** Called after every completed step */
  onStep?: (step: ChainStep) => void;
}

export interface ChainResult {
  output: string;
  steps: ChainStep[];
  usage: UsageSummary;
  totalMs: number;
}

/**
 * Run `input` through `prompts` in order, feeding each output into the next.
 *
 * @example
 * ```typescript
 * const { output } = await chain(manager, report, [
 *   'Extract only the numerical values and their metrics.',
 *   'Convert all values to percentages where possible.',
 *   'Sort the lines in descending order by value.',
 * ]);
 * ```
 */
export async function chain(
  client: ChatClient,
  input: string,
  prompts: string[],
  options: ChainOptions = {}
): Promise<ChainResult> {
  const { onStep, ...stepOptions } = options;
  const timing = new TimingTracker();
  const steps: ChainStep[] = [];
  let result = input;

  for (const [index, prompt] of prompts.entries()) {
    const step = await executeStep(client, formatInput(prompt, result), stepOptions);
    const chainStep: ChainStep = { ...step, index };
    steps.push(chainStep);
    result = step.output;

    console.log(`[Chain] Step ${index + 1}/${prompts.length} complete (${step.latencyMs}ms)`);
    onStep?.(chainStep);
  }

  return {
    output: result,
    steps,
    usage: summarizeUsage(steps),
    totalMs: timing.getTotalMs(),
  };
}
