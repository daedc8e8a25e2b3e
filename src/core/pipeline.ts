/**
 * Structured Pipeline
 *
 * The single path every model-backed operation goes through:
 * PromptSpec → prompt text → ModelClient → StructuredExtractor.
 *
 * A failed or cancelled model call is not an exception here: the extractor
 * receives empty text and the caller gets the shape's fallback, tagged
 * `default_fallback`.
 */

import { renderPrompt } from './prompt-builder.js';
import { extract } from './structured-extractor.js';
import type {
  ArrayShape,
  CompletionClient,
  CompletionOptions,
  ExtractionResult,
  JsonObject,
  JsonValue,
  ModelResponse,
  ObjectShape,
  PromptSpec,
  Shape,
  TelemetryEvent,
  TelemetryHook
} from '../types.js';

export interface PipelineRequest<S extends Shape> {
  /** Name reported to telemetry */
  operation: string;
  prompt: PromptSpec;
  shape: S;
}

export interface PipelineOptions {
  /** Per-call overrides passed to the completion client */
  completion?: Omit<CompletionOptions, 'signal'>;

  /** Aborting cancels the model call; the outcome is then the fallback */
  signal?: AbortSignal;

  reasoningScaffold?: boolean;

  onTelemetry?: TelemetryHook;
}

export interface PipelineOutcome<T> {
  operation: string;
  result: ExtractionResult<T>;
  response: ModelResponse;

  /** False when the value is the fallback stand-in rather than a model answer */
  available: boolean;

  durationMs: number;
}

/**
 * Report to a telemetry hook. A throwing hook is logged, never propagated.
 */
export function emitTelemetry(hook: TelemetryHook | undefined, event: TelemetryEvent): void {
  if (!hook) return;
  try {
    hook(event);
  } catch (error) {
    console.warn(
      `Telemetry hook failed for "${event.operation}": ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Run one structured model operation.
 *
 * @throws InvalidArgumentError for an empty instruction or invalid completion options
 */
export async function runPipeline(
  client: CompletionClient,
  request: PipelineRequest<ObjectShape>,
  options?: PipelineOptions
): Promise<PipelineOutcome<JsonObject>>;
export async function runPipeline(
  client: CompletionClient,
  request: PipelineRequest<ArrayShape>,
  options?: PipelineOptions
): Promise<PipelineOutcome<JsonValue[]>>;
export async function runPipeline(
  client: CompletionClient,
  request: PipelineRequest<Shape>,
  options?: PipelineOptions
): Promise<PipelineOutcome<JsonObject | JsonValue[]>>;
export async function runPipeline(
  client: CompletionClient,
  request: PipelineRequest<Shape>,
  options: PipelineOptions = {}
): Promise<PipelineOutcome<JsonObject | JsonValue[]>> {
  const startTime = Date.now();

  const promptText = renderPrompt(request.prompt, {
    reasoningScaffold: options.reasoningScaffold
  });

  const response = await client.complete(promptText, {
    ...options.completion,
    signal: options.signal
  });

  const result = extract(response.success ? response.rawText : '', request.shape);
  const durationMs = Date.now() - startTime;

  emitTelemetry(options.onTelemetry, {
    operation: request.operation,
    durationMs,
    source: result.source,
    transportOk: response.success,
    errorKind: response.success ? undefined : response.error.kind,
    model: response.model,
    attempts: response.attempts,
    usage: response.success ? response.usage : undefined
  });

  return {
    operation: request.operation,
    result,
    response,
    available: result.source !== 'default_fallback',
    durationMs
  };
}
