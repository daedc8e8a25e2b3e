/**
 * Task Definitions for Legal Assist
 *
 * A task is a caller of the structured pipeline: an instruction, an input
 * schema, a shape and a schema hint. Tasks differ only in wording and shape;
 * parsing and fallback are never re-implemented per task.
 */

import { z } from 'zod';
import { createPromptSpec } from '../core/prompt-builder.js';
import type { PromptContent, PromptSpec, Shape } from '../types.js';

export interface PreparedTask {
  prompt: PromptSpec;
  shape: Shape;
}

export interface LegalTask {
  name: string;
  description: string;

  /** Top-level kind of the task's output */
  outputKind: Shape['kind'];

  /**
   * Validate raw input and produce the prompt and shape for one call.
   *
   * @throws TaskInputError when the input fails validation
   */
  prepare(input: unknown): PreparedTask;
}

export interface TaskDefinition<TInput> {
  name: string;
  description: string;
  instruction: string;
  inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;

  /** Fixed shape, or one derived from the validated input */
  shape: Shape | ((input: TInput) => Shape);

  schemaHint: string;
  render: (input: TInput) => PromptContent;
}

export function defineTask<TInput>(definition: TaskDefinition<TInput>): LegalTask {
  const resolveShape = (input: TInput): Shape =>
    typeof definition.shape === 'function' ? definition.shape(input) : definition.shape;

  const outputKind = typeof definition.shape === 'function'
    ? 'object'
    : definition.shape.kind;

  return {
    name: definition.name,
    description: definition.description,
    outputKind,
    prepare(input: unknown): PreparedTask {
      const parsed = definition.inputSchema.safeParse(input);
      if (!parsed.success) {
        throw new TaskInputError(definition.name, parsed.error);
      }

      return {
        prompt: createPromptSpec(
          definition.instruction,
          definition.render(parsed.data),
          definition.schemaHint
        ),
        shape: resolveShape(parsed.data)
      };
    }
  };
}

/**
 * Cut text to `maxChars`, marking the cut.
 */
export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  return `${text.slice(0, maxChars)}\n[... truncated ...]`;
}

// ============================================================================
// Errors
// ============================================================================

export class TaskInputError extends Error {
  readonly task: string;
  readonly issues: Array<{ path: string; message: string }>;

  constructor(task: string, error: z.ZodError) {
    const issues = error.issues.map(issue => ({
      path: issue.path.join('.') || '(root)',
      message: issue.message
    }));
    super(`Invalid input for task "${task}": ${issues.map(i => `${i.path}: ${i.message}`).join('; ')}`);
    this.name = 'TaskInputError';
    this.task = task;
    this.issues = issues;
  }
}

export class UnknownTaskError extends Error {
  readonly task: string;

  constructor(task: string) {
    super(`Unknown task "${task}"`);
    this.name = 'UnknownTaskError';
    this.task = task;
  }
}
