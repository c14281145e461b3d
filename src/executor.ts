/**
 * Step Executor - The single LLM call every workflow is built from
 *
 * A step sends one prompt through a `ChatClient` and records what came
 * back: output, model, token usage and latency. Workflows aggregate steps
 * into usage summaries.
 *
 * @module executor
 */

import { getConfig } from './config';
import { WorkflowError } from './errors';
import { estimateCostForModel } from './model-registry';
import type { ChatClient, ChatOptions, TokenUsage } from './providers';

// =============================================================================
// Types
// =============================================================================

export interface StepOptions {
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  jsonMode?: boolean;
  /** Model ID to request instead of the provider's primary model */
  model?: string;
}

export interface StepResult {
  prompt: string;
  output: string;
  model: string;
  provider: string;
  usage: TokenUsage;
  /** True when the provider reported no usage and tokens were estimated */
  usageEstimated: boolean;
  latencyMs: number;
}

export interface UsageSummary {
  calls: number;
  inputTokens: number;
  outputTokens: number;
  estimatedCost: number;
}

// =============================================================================
// Timing Tracker Utility
// =============================================================================

export class TimingTracker {
  private startTime: number;
  private marks: Map<string, number> = new Map();

  constructor() {
    this.startTime = Date.now();
  }

  mark(name: string): void {
    this.marks.set(name, Date.now());
  }

  /** Milliseconds since the named mark, or since construction if it was never set */
  since(markName: string): number {
    return Date.now() - (this.marks.get(markName) ?? this.startTime);
  }

  getTotalMs(): number {
    return Date.now() - this.startTime;
  }
}

// =============================================================================
// Prompt helpers
// =============================================================================

/**
 * Instructions followed by the text they apply to.
 */
export function formatInput(instructions: string, input: string): string {
  return `${instructions}\nInput: ${input}`;
}

/**
 * Replace `{name}` placeholders. JSON braces in a template are left alone
 * because they never wrap a bare word.
 */
export function fillTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (_match, name: string) => {
    const value = Object.hasOwn(vars, name) ? vars[name] : undefined;
    if (value === undefined) {
      throw new WorkflowError(`Template placeholder {${name}} has no value`, 'invalid_input');
    }
    return value;
  });
}

/**
 * Rough token count (~4 characters per token)
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

// =============================================================================
// Step execution
// =============================================================================

/**
 * Send one prompt as a single user message.
 */
export async function executeStep(
  client: ChatClient,
  prompt: string,
  options: StepOptions = {}
): Promise<StepResult> {
  const defaults = getConfig().workflows;
  const timing = new TimingTracker();
  const systemPrompt = options.systemPrompt ?? '';

  const chatOptions: ChatOptions = {
    // JSON-mode calls without an explicit budget get the provider's JSON budget
    maxTokens: options.maxTokens ?? (options.jsonMode ? undefined : defaults.maxTokens),
    temperature: options.temperature ?? defaults.temperature,
    jsonMode: options.jsonMode,
    model: options.model,
  };

  timing.mark('generation_start');
  const result = await client.chat([{ role: 'user', content: prompt }], systemPrompt, chatOptions);
  const latencyMs = timing.since('generation_start');

  const usage = result.usage ?? {
    inputTokens: estimateTokens(systemPrompt + prompt),
    outputTokens: estimateTokens(result.content),
  };

  return {
    prompt,
    output: result.content,
    model: result.model,
    provider: result.provider,
    usage,
    usageEstimated: result.usage === undefined,
    latencyMs,
  };
}

/**
 * Token totals and estimated spend across steps.
 */
export function summarizeUsage(steps: StepResult[]): UsageSummary {
  return steps.reduce<UsageSummary>(
    (summary, step) => ({
      calls: summary.calls + 1,
      inputTokens: summary.inputTokens + step.usage.inputTokens,
      outputTokens: summary.outputTokens + step.usage.outputTokens,
      estimatedCost:
        summary.estimatedCost +
        estimateCostForModel(step.model, step.usage.inputTokens, step.usage.outputTokens),
    }),
    { calls: 0, inputTokens: 0, outputTokens: 0, estimatedCost: 0 }
  );
}
