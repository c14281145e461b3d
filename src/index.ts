/**
 * LLM Workflow Patterns - Prompt chaining, parallelization, routing and
 * orchestrator-workers over Claude, GPT and Gemini
 *
 * @packageDocumentation
 */

// Configuration & errors
export { loadConfig, getConfig, resetConfig, ConfigValidationError } from './config';
export type { Config, ProviderSettings } from './config';
export { WorkflowError, isWorkflowError, errorMessage } from './errors';
export type { WorkflowErrorType } from './errors';

// Model Registry
export {
  MODELS,
  DEFAULT_PROVIDER_MODELS,
  getModel,
  getModelId,
  findModelById,
  getModelsByProvider,
  getModelsByTier,
  getProviderModelIds,
  estimateCost,
  estimateCostForModel,
  modelSupportsFeature,
  getCheapestModel,
} from './model-registry';
export type { Provider, ModelTier, ModelConfig, ProviderModels } from './model-registry';

// Providers
export {
  AnthropicProvider,
  OpenAIProvider,
  GeminiProvider,
  ProviderManager,
  createProviderManager,
} from './providers';
export type {
  Message,
  ChatOptions,
  ChatResult,
  ChatClient,
  TokenUsage,
  AIProvider,
  ProviderOptions,
  ProviderManagerOptions,
} from './providers';

// Steps
export {
  TimingTracker,
  executeStep,
  formatInput,
  fillTemplate,
  estimateTokens,
  summarizeUsage,
} from './executor';
export type { StepOptions, StepResult, UsageSummary } from './executor';

// Structured outputs
export {
  extractJson,
  parseStructured,
  withFormatInstructions,
  chatStructured,
} from './structured-output';
export type { OutputSchema, StructuredOptions, StructuredResult } from './structured-output';

// Workflows
export { chain } from './chain';
export type { ChainOptions, ChainResult, ChainStep } from './chain';
export { parallel, mapWithConcurrency } from './parallel';
export type { ParallelOptions, ParallelResult } from './parallel';
export { Router, createRouter } from './router';
export type { RouteTable, RouteDecision, RouteResult, RouterStats, RouterConfig } from './router';
export {
  Orchestrator,
  createOrchestrator,
  formatContext,
  DEFAULT_ORCHESTRATOR_PROMPT,
  DEFAULT_WORKER_PROMPT,
} from './orchestrator';
export type {
  OrchestratorConfig,
  OrchestratorPlan,
  OrchestratorResult,
  TaskContext,
  WorkerResult,
  WorkerTask,
} from './orchestrator';

// =============================================================================
// Convenience: All-in-one Workflows
// =============================================================================

import { chain, type ChainOptions, type ChainResult } from './chain';
import { parallel, type ParallelOptions, type ParallelResult } from './parallel';
import { Router, type RouteDecision, type RouteResult, type RouteTable, type RouterConfig } from './router';
import {
  Orchestrator,
  type OrchestratorConfig,
  type OrchestratorResult,
  type TaskContext,
} from './orchestrator';
import { ProviderManager, type ChatOptions, type Message, type ProviderManagerOptions } from './providers';
import { chatStructured, type OutputSchema, type StructuredOptions, type StructuredResult } from './structured-output';

export interface WorkflowsConfig {
  providers?: ProviderManagerOptions;
  router?: RouterConfig;
  orchestrator?: OrchestratorConfig;
}

/**
 * Every workflow pattern over one shared provider manager.
 *
 * @example
 * ```typescript
 * const workflows = new Workflows();
 *
 * const { output } = await workflows.chain(report, [
 *   'Extract the numerical values.',
 *   'Format them as a markdown table.',
 * ]);
 *
 * const { decision } = await workflows.route(ticket, {
 *   billing: 'You are a billing specialist...',
 *   technical: 'You are a support engineer...',
 * });
 * console.log(decision.selection, decision.reasoning);
 * ```
 */
export class Workflows {
  private providerManager: ProviderManager;
  private router: Router;
  private orchestrator: Orchestrator;

  constructor(config?: WorkflowsConfig) {
    this.providerManager = new ProviderManager(config?.providers);
    this.router = new Router(this.providerManager, config?.router);
    this.orchestrator = new Orchestrator(this.providerManager, config?.orchestrator);
  }

  chain(input: string, prompts: string[], options?: ChainOptions): Promise<ChainResult> {
    return chain(this.providerManager, input, prompts, options);
  }

  parallel(prompt: string, inputs: string[], options?: ParallelOptions): Promise<ParallelResult> {
    return parallel(this.providerManager, prompt, inputs, options);
  }

  route(input: string, routes: RouteTable): Promise<RouteResult> {
    return this.router.route(input, routes);
  }

  determineRoute(input: string, routeKeys: string[]): Promise<RouteDecision> {
    return this.router.determineRoute(input, routeKeys);
  }

  orchestrate(task: string, context?: TaskContext): Promise<OrchestratorResult> {
    return this.orchestrator.process(task, context);
  }

  /**
   * Stream a single-turn answer as text chunks.
   */
  stream(prompt: string, systemPrompt = '', options?: ChatOptions): AsyncIterable<string> {
    const messages: Message[] = [{ role: 'user', content: prompt }];
    return this.providerManager.stream(messages, systemPrompt, options);
  }

  structured<T>(
    prompt: string,
    schema: OutputSchema<T>,
    options: StructuredOptions
  ): Promise<StructuredResult<T>> {
    return chatStructured(this.providerManager, prompt, schema, options);
  }

  getRouterStats() {
    return this.router.getStats();
  }

  isReady(): boolean {
    return this.providerManager.isAvailable();
  }

  getAvailableProviders(): string[] {
    return this.providerManager.getAvailableProviders();
  }
}

export function createWorkflows(config?: WorkflowsConfig): Workflows {
  return new Workflows(config);
}
