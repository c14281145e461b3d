/**
 * Orchestrator-Workers
 *
 * An orchestrator call breaks a task into subtasks; a worker call then
 * handles each subtask with the original task as shared context.
 *
 * @module orchestrator
 */

import { z } from 'zod';
import { getConfig } from './config';
import { WorkflowError } from './errors';
import {
  TimingTracker,
  executeStep,
  fillTemplate,
  summarizeUsage,
  type StepOptions,
  type StepResult,
  type UsageSummary,
} from './executor';
import { mapWithConcurrency } from './parallel';
import type { ChatClient } from './providers';
import { parseStructured, withFormatInstructions } from './structured-output';

// =============================================================================
// Types
// =============================================================================

export interface WorkerTask {
  type: string;
  description: string;
}

export interface OrchestratorPlan {
  analysis: string;
  tasks: WorkerTask[];
  step: StepResult;
}

export interface WorkerResult {
  task: WorkerTask;
  output: string;
  step: StepResult;
}

export interface OrchestratorResult {
  analysis: string;
  tasks: WorkerTask[];
  workerResults: WorkerResult[];
  usage: UsageSummary;
  totalMs: number;
}

export type TaskContext = Record<string, string>;

export interface OrchestratorConfig {
  /** Planning template; receives {task} and {context} */
  orchestratorPrompt?: string;
  /** Worker template; receives {original_task}, {task_type}, {task_description} and {context} */
  workerPrompt?: string;
  /** Max worker calls in flight (default: ORCHESTRATOR_WORKERS) */
  workers?: number;
  planner?: StepOptions;
  worker?: StepOptions;
}

// =============================================================================
// Default Prompts
// =============================================================================

export const DEFAULT_ORCHESTRATOR_PROMPT = `Analyze this task and break it down into 2-3 distinct approaches:

Task: {task}
{context}
Return your response in this JSON format:
{
  "analysis": "Explain your understanding of the task and which variations would be valuable. Focus on how each approach serves different aspects of the task.",
  "tasks": [
    {
      "type": "formal",
      "description": "Write a precise, technical version that emphasizes specifications"
    },
    {
      "type": "conversational",
      "description": "Write an engaging, friendly version that connects with readers"
    }
  ]
}`;

export const DEFAULT_WORKER_PROMPT = `Generate content based on:
Task: {original_task}
Style: {task_type}
Guidelines: {task_description}
{context}`;

const PLAN_FORMAT = '{ "analysis": string, "tasks": [{ "type": string, "description": string }] }';

const planSchema = z.object({
  analysis: z.string(),
  tasks: z.array(
    z.object({
      type: z.string().min(1),
      description: z.string().min(1),
    })
  ),
});

/**
 * Render context as `key: value` lines under a heading; empty when there is none.
 */
export function formatContext(context?: TaskContext): string {
  const entries = Object.entries(context ?? {});
  if (entries.length === 0) {
    return '';
  }
  return `Context:\n${entries.map(([key, value]) => `${key}: ${value}`).join('\n')}\n`;
}

// =============================================================================
// Orchestrator
// =============================================================================

export class Orchestrator {
  private client: ChatClient;
  private config: OrchestratorConfig;

  constructor(client: ChatClient, config: OrchestratorConfig = {}) {
    this.client = client;
    this.config = config;
  }

  /**
   * Ask the orchestrator model to split `task` into subtasks.
   */
  async plan(task: string, context?: TaskContext): Promise<OrchestratorPlan> {
    this.assertTask(task);

    const prompt = fillTemplate(this.config.orchestratorPrompt ?? DEFAULT_ORCHESTRATOR_PROMPT, {
      task,
      context: formatContext(context),
    });

    const { systemPrompt, ...plannerOptions }: StepOptions = this.config.planner ?? {};
    const step = await executeStep(this.client, prompt, {
      ...plannerOptions,
      systemPrompt: withFormatInstructions(systemPrompt, PLAN_FORMAT),
      jsonMode: true,
    });
    const plan = parseStructured(step.output, planSchema);

    console.log(`[Orchestrator] Planned ${plan.tasks.length} subtask(s): ${plan.tasks.map(t => t.type).join(', ')}`);

    return { ...plan, step };
  }

  /**
   * Plan `task`, then run one worker per subtask. Worker results follow
   * the order of the plan.
   *
   * @example
   * ```typescript
   * const orchestrator = new Orchestrator(manager);
   * const result = await orchestrator.process(
   *   'Write a product description for a new eco-friendly water bottle',
   *   { target_audience: 'environmentally conscious millennials' }
   * );
   * result.workerResults.forEach(r => console.log(r.task.type, r.output));
   * ```
   */
  async process(task: string, context?: TaskContext): Promise<OrchestratorResult> {
    const timing = new TimingTracker();
    const plan = await this.plan(task, context);
    const workerTemplate = this.config.workerPrompt ?? DEFAULT_WORKER_PROMPT;
    const workers = this.config.workers ?? getConfig().workflows.orchestratorWorkers;
    const renderedContext = formatContext(context);

    const workerResults = await mapWithConcurrency(plan.tasks, workers, async (subtask) => {
      const prompt = fillTemplate(workerTemplate, {
        original_task: task,
        task_type: subtask.type,
        task_description: subtask.description,
        context: renderedContext,
      });
      const step = await executeStep(this.client, prompt, this.config.worker);
      console.log(`[Orchestrator] Worker '${subtask.type}' complete (${step.latencyMs}ms)`);
      return { task: subtask, output: step.output, step };
    });

    return {
      analysis: plan.analysis,
      tasks: plan.tasks,
      workerResults,
      usage: summarizeUsage([plan.step, ...workerResults.map(r => r.step)]),
      totalMs: timing.getTotalMs(),
    };
  }

  private assertTask(task: string): void {
    if (!task.trim()) {
      throw new WorkflowError('Task description must not be empty', 'invalid_input');
    }
  }
}

export function createOrchestrator(client: ChatClient, config?: OrchestratorConfig): Orchestrator {
  return new Orchestrator(client, config);
}
