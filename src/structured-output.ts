/**
 * Structured Outputs - JSON replies validated against a zod schema
 *
 * Models asked for JSON still wrap it in prose or code fences now and then,
 * so extraction tries the bare text first and digs for the payload after.
 *
 * @module structured-output
 */

import { z } from 'zod';
import { WorkflowError } from './errors';
import { executeStep, type StepOptions, type StepResult } from './executor';
import type { ChatClient } from './providers';

export type OutputSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface StructuredOptions extends Omit<StepOptions, 'jsonMode'> {
  /** Description or example of the JSON shape the model must return */
  format: string;
}

export interface StructuredResult<T> {
  value: T;
  step: StepResult;
}

const FENCED_BLOCK = /```(?:json)?\s*\n?([\s\S]*?)```/i;
const OBJECT_SPAN = /\{[\s\S]*\}/;

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Pull the JSON value out of a model reply.
 */
export function extractJson(text: string): unknown {
  const candidates = [text.trim()];

  const fenced = text.match(FENCED_BLOCK);
  if (fenced?.[1]) {
    candidates.push(fenced[1].trim());
  }

  const span = text.match(OBJECT_SPAN);
  if (span) {
    candidates.push(span[0]);
  }

  for (const candidate of candidates) {
    const parsed = tryParse(candidate);
    if (parsed.ok) {
      return parsed.value;
    }
  }

  throw new WorkflowError(
    `No JSON found in model response: ${text.slice(0, 120)}`,
    'invalid_response'
  );
}

/**
 * Extract JSON from a reply and validate it.
 */
export function parseStructured<T>(text: string, schema: OutputSchema<T>): T {
  const result = schema.safeParse(extractJson(text));
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new WorkflowError(`Model response failed validation: ${issues}`, 'invalid_response', result.error);
  }
  return result.data;
}

/**
 * Append the JSON format instructions to a system prompt.
 */
export function withFormatInstructions(systemPrompt: string | undefined, format: string): string {
  const instructions = `Respond only with JSON in this format:\n${format}`;
  return systemPrompt ? `${systemPrompt}\n\n${instructions}` : instructions;
}

/**
 * One JSON-mode call whose reply is parsed and validated against `schema`.
 */
export async function chatStructured<T>(
  client: ChatClient,
  prompt: string,
  schema: OutputSchema<T>,
  options: StructuredOptions
): Promise<StructuredResult<T>> {
  const { format, systemPrompt, ...stepOptions } = options;

  const step = await executeStep(client, prompt, {
    ...stepOptions,
    systemPrompt: withFormatInstructions(systemPrompt, format),
    jsonMode: true,
  });

  return { value: parseStructured(step.output, schema), step };
}
