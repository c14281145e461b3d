/**
 * Router - Classify an input, then handle it with the matching prompt
 *
 * A first call asks the model which entry of a route table fits the input
 * best; a second call runs the input through that route's prompt.
 *
 * @module router
 */

import { z } from 'zod';
import { WorkflowError, errorMessage } from './errors';
import {
  TimingTracker,
  executeStep,
  fillTemplate,
  formatInput,
  summarizeUsage,
  type StepOptions,
  type StepResult,
  type UsageSummary,
} from './executor';
import type { ChatClient } from './providers';
import { parseStructured, withFormatInstructions } from './structured-output';

// =============================================================================
// Types
// =============================================================================

/** Route key → instructions applied to inputs sent down that route */
export type RouteTable = Record<string, string>;

export interface RouteDecision {
  selection: string;
  reasoning: string;
  /** True when the model's choice was unusable and the fallback route was taken */
  fallback: boolean;
  step: StepResult;
}

export interface RouteResult {
  decision: RouteDecision;
  output: string;
  steps: StepResult[];
  usage: UsageSummary;
  totalMs: number;
}

export interface RouterStats {
  totalRouted: number;
  fallbackCount: number;
  routeDistribution: Record<string, number>;
  avgDecisionLatencyMs: number;
}

export interface RouterConfig {
  /** Selection prompt template; receives {routes} and {input} */
  selectionPrompt?: string;
  /** Route used when the model's answer can't be parsed or names no route */
  fallbackRoute?: string;
  /** Options for the selection call */
  selection?: StepOptions;
  /** Options for the call that handles the routed input */
  handler?: StepOptions;
}

// =============================================================================
// Default Selection Prompt
// =============================================================================

const DEFAULT_SELECTION_PROMPT = `Analyze the input and select the most appropriate route from these options: {routes}
First explain your reasoning, then provide your selection in this JSON format:

{
  "reasoning": "Brief explanation of why this input should go to a specific route. Consider key terms, user intent, and urgency level.",
  "selection": "The chosen route name"
}

Input: {input}`;

const SELECTION_FORMAT = '{ "reasoning": string, "selection": string }';

const selectionSchema = z.object({
  reasoning: z.string(),
  selection: z.string(),
});


// =============================================================================
// Router Class
// =============================================================================

export class Router {
  private client: ChatClient;
  private config: RouterConfig;
  private totalRouted = 0;
  private fallbackCount = 0;
  private avgDecisionLatencyMs = 0;
  // Route keys are caller data; a Map keeps them clear of Object.prototype
  private routeCounts = new Map<string, number>();

  constructor(client: ChatClient, config: RouterConfig = {}) {
    this.client = client;
    this.config = config;
  }

  /**
   * Ask the model which of `routeKeys` should handle `input`.
   */
  async determineRoute(input: string, routeKeys: string[]): Promise<RouteDecision> {
    if (routeKeys.length === 0) {
      throw new WorkflowError('At least one route is required', 'invalid_input');
    }
    if (!input.trim()) {
      throw new WorkflowError('Input to route must not be empty', 'invalid_input');
    }

    const prompt = fillTemplate(this.config.selectionPrompt ?? DEFAULT_SELECTION_PROMPT, {
      routes: routeKeys.join(', '),
      input,
    });

    console.log(`[Router] Available routes: ${routeKeys.join(', ')}`);

    const fallbackRoute = this.config.fallbackRoute;
    if (fallbackRoute !== undefined && !routeKeys.includes(fallbackRoute)) {
      console.warn(`[Router] Fallback route '${fallbackRoute}' is not one of the routes; it will be ignored`);
    }

    const { systemPrompt, ...selectionOptions }: StepOptions = this.config.selection ?? {};
    const step = await executeStep(this.client, prompt, {
      maxTokens: 256,
      temperature: 0,
      ...selectionOptions,
      systemPrompt: withFormatInstructions(systemPrompt, SELECTION_FORMAT),
      jsonMode: true,
    });

    let decision: RouteDecision;
    try {
      const answer = parseStructured(step.output, selectionSchema);
      const selection = this.matchRoute(answer.selection, routeKeys);
      if (!selection) {
        throw new WorkflowError(
          `Selected route '${answer.selection}' not found in routes`,
          'unknown_route'
        );
      }
      decision = { selection, reasoning: answer.reasoning, fallback: false, step };
      console.log(`[Router] Selected: ${selection}`);
    } catch (error) {
      if (fallbackRoute === undefined || !routeKeys.includes(fallbackRoute)) {
        throw error;
      }
      console.error(`[Router] Selection unusable, falling back to '${fallbackRoute}':`, errorMessage(error));
      decision = {
        selection: fallbackRoute,
        reasoning: `Fallback route: ${errorMessage(error)}`,
        fallback: true,
        step,
      };
    }

    this.updateStats(decision);
    return decision;
  }

  /**
   * Pick a route for `input` and run it through that route's prompt.
   *
   * @example
   * ```typescript
   * const router = new Router(manager);
   * const { decision, output } = await router.route(ticket, {
   *   billing: 'You are a billing support specialist...',
   *   technical: 'You are a technical support engineer...',
   * });
   * ```
   */
  async route(input: string, routes: RouteTable): Promise<RouteResult> {
    const timing = new TimingTracker();
    const decision = await this.determineRoute(input, Object.keys(routes));

    const handled = await executeStep(
      this.client,
      formatInput(routes[decision.selection], input),
      this.config.handler
    );
    const steps = [decision.step, handled];

    return {
      decision,
      output: handled.output,
      steps,
      usage: summarizeUsage(steps),
      totalMs: timing.getTotalMs(),
    };
  }

  getStats(): RouterStats {
    return {
      totalRouted: this.totalRouted,
      fallbackCount: this.fallbackCount,
      routeDistribution: Object.fromEntries(this.routeCounts),
      avgDecisionLatencyMs: this.avgDecisionLatencyMs,
    };
  }

  resetStats(): void {
    this.totalRouted = 0;
    this.fallbackCount = 0;
    this.avgDecisionLatencyMs = 0;
    this.routeCounts.clear();
  }

  /**
   * Exact key first, then a case-insensitive match on the trimmed answer.
   */
  private matchRoute(answer: string, routeKeys: string[]): string | undefined {
    if (routeKeys.includes(answer)) {
      return answer;
    }
    const normalized = answer.trim().toLowerCase();
    return routeKeys.find(key => key.toLowerCase() === normalized);
  }

  private updateStats(decision: RouteDecision): void {
    this.totalRouted++;
    this.routeCounts.set(decision.selection, (this.routeCounts.get(decision.selection) ?? 0) + 1);

    if (decision.fallback) {
      this.fallbackCount++;
    }

    const n = this.totalRouted;
    this.avgDecisionLatencyMs =
      ((this.avgDecisionLatencyMs * (n - 1)) + decision.step.latencyMs) / n;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createRouter(client: ChatClient, config?: RouterConfig): Router {
  return new Router(client, config);
}
