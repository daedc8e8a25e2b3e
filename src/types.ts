/**
 * Type Definitions for Legal Assist Core
 *
 * Everything here lives for exactly one pipeline invocation:
 * prompt in, model text out, typed value back to the caller.
 */

// ============================================================================
// JSON Values
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

// ============================================================================
// Prompt
// ============================================================================

/** Free text, or any JSON-serialisable value rendered as indented JSON */
export type PromptContent = string | JsonValue;

export interface PromptSpec {
  /** Task-specific instruction placed at the top of the prompt */
  readonly instruction: string;

  /** The caller's input (already truncated if the caller needs a bound) */
  readonly inputPayload: PromptContent;

  /** Description of the expected output shape */
  readonly schemaHint?: string;
}

// ============================================================================
// Model Call
// ============================================================================

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export type ModelCallErrorKind =
  | 'timeout'           // Per-attempt deadline elapsed
  | 'network'           // fetch rejected (DNS, reset, refused)
  | 'provider'          // Non-2xx status from the endpoint
  | 'cancelled'         // Caller aborted through its AbortSignal
  | 'invalid-response'; // 2xx but the body had no usable completion

export interface ModelCallError {
  kind: ModelCallErrorKind;
  message: string;

  /** HTTP status, for provider errors */
  statusCode?: number;

  /** Transient failures (timeouts, network, 429, 5xx) are retried */
  retryable: boolean;
}

interface ModelResponseBase {
  /** Model identifier reported by the provider (or the one requested) */
  model: string;

  /** Wall-clock time across all attempts */
  latencyMs: number;

  /** Number of HTTP attempts made */
  attempts: number;
}

export interface ModelSuccess extends ModelResponseBase {
  success: true;
  rawText: string;
  usage?: TokenUsage;
}

export interface ModelFailure extends ModelResponseBase {
  success: false;
  rawText: '';
  error: ModelCallError;
}

export type ModelResponse = ModelSuccess | ModelFailure;

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  maxRetries?: number;

  /** Sent as the system message ahead of the prompt */
  systemPrompt?: string;

  /** Aborting cancels the in-flight request */
  signal?: AbortSignal;
}

/**
 * Anything that can turn a prompt into a ModelResponse.
 * ModelClient is the production implementation; tests script their own.
 */
export interface CompletionClient {
  complete(prompt: string, options?: CompletionOptions): Promise<ModelResponse>;
}

// ============================================================================
// Shapes
// ============================================================================

export interface ObjectShape {
  kind: 'object';

  /** Top-level keys the value must carry */
  requiredKeys: readonly string[];

  /** Used to fill required keys the model left out */
  defaultValues: Readonly<JsonObject>;

  /** Returned when nothing parseable was found; always carries every required key */
  fallback: Readonly<JsonObject>;
}

export interface ArrayShape {
  kind: 'array';
  fallback: readonly JsonValue[];
}

export type Shape = ObjectShape | ArrayShape;

// ============================================================================
// Extraction
// ============================================================================

export type ExtractionSource = 'strict_parse' | 'recovered_parse' | 'default_fallback';

export interface ExtractionResult<T> {
  /** Always conforms to the declared shape */
  value: T;

  /** Which tier produced the value */
  source: ExtractionSource;

  /** Untouched model text, kept for audit */
  rawText: string;
}

// ============================================================================
// Telemetry & Progress
// ============================================================================

export interface TelemetryEvent {
  /** Logical operation name (task name, or a caller-chosen label) */
  operation: string;

  /** Prompt build + model call + extraction */
  durationMs: number;

  /** Extraction tier that produced the value */
  source: ExtractionSource;

  /** Whether the model call itself succeeded */
  transportOk: boolean;

  /** Transport error kind, when the call failed */
  errorKind?: ModelCallErrorKind;

  model: string;
  attempts: number;
  usage?: TokenUsage;
}

/** Registered once by the hosting application */
export type TelemetryHook = (event: TelemetryEvent) => void;

export interface ProgressEvent {
  type: 'start' | 'task-start' | 'task-complete' | 'task-unavailable' | 'complete';

  /** Task name or panel role */
  label?: string;
  message?: string;
}

export type ProgressCallback = (event: ProgressEvent) => void;
