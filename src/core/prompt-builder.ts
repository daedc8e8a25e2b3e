/**
 * Prompt Builder
 *
 * Renders an instruction, the caller's content and an optional schema hint
 * into one prompt string. Pure: same inputs, same prompt.
 *
 * Truncation is the caller's concern; content is embedded as given.
 */

import { InvalidArgumentError } from './errors.js';
import { assistantPrompts } from '../config.js';
import { hasKey } from './shapes.js';
import type { PromptContent, PromptSpec, Shape } from '../types.js';

/** Prompts shorter than this never get the reasoning scaffold */
const SCAFFOLD_MIN_LENGTH = 200;

const SCAFFOLD_TRIGGERS = /\b(analy[sz]e|draft|identify)\b/i;

export interface BuildOptions {
  /** Append the step-by-step reasoning scaffold to long analytical prompts */
  reasoningScaffold?: boolean;
}

function serializeContent(content: PromptContent): string {
  return typeof content === 'string' ? content : JSON.stringify(content, null, 2);
}

/**
 * Build a single prompt string.
 *
 * @throws InvalidArgumentError if `instruction` is empty
 */
export function buildPrompt(
  instruction: string,
  content: PromptContent,
  schemaHint?: string,
  options: BuildOptions = {}
): string {
  if (!instruction.trim()) {
    throw new InvalidArgumentError('Prompt instruction must not be empty');
  }

  const sections = [instruction.trim(), serializeContent(content)];

  if (schemaHint?.trim()) {
    sections.push(`Respond as JSON matching: ${schemaHint.trim()}`);
  }

  const prompt = sections.join('\n\n');

  if (options.reasoningScaffold && shouldScaffold(prompt)) {
    return `${prompt}\n\n${assistantPrompts.reasoningScaffold}`;
  }

  return prompt;
}

function shouldScaffold(prompt: string): boolean {
  return prompt.length > SCAFFOLD_MIN_LENGTH && SCAFFOLD_TRIGGERS.test(prompt);
}

/**
 * Create an immutable PromptSpec.
 *
 * @throws InvalidArgumentError if `instruction` is empty
 */
export function createPromptSpec(
  instruction: string,
  inputPayload: PromptContent,
  schemaHint?: string
): PromptSpec {
  if (!instruction.trim()) {
    throw new InvalidArgumentError('Prompt instruction must not be empty');
  }

  const spec: PromptSpec = schemaHint === undefined
    ? { instruction, inputPayload }
    : { instruction, inputPayload, schemaHint };

  return Object.freeze(spec);
}

export function renderPrompt(spec: PromptSpec, options?: BuildOptions): string {
  return buildPrompt(spec.instruction, spec.inputPayload, spec.schemaHint, options);
}

/**
 * Describe a shape as a JSON template, for callers that don't write their own hint.
 */
export function describeShape(shape: Shape): string {
  if (shape.kind === 'array') {
    return 'a JSON array';
  }

  const template = Object.fromEntries(shape.requiredKeys.map(key =>
    [key, hasKey(shape.defaultValues, key) ? shape.defaultValues[key] : '...']
  ));
  return JSON.stringify(template);
}
