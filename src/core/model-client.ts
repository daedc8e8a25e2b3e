/**
 * Model Client
 *
 * Sends one prompt to an OpenAI-compatible chat-completions endpoint
 * (OpenRouter by default) and returns the raw text.
 * Includes per-attempt timeouts, exponential backoff retries and cancellation.
 *
 * Transport problems come back as `ModelResponse { success: false }`;
 * only invalid arguments are thrown.
 */

import { InvalidArgumentError } from './errors.js';
import { DEFAULT_API_URL, DEFAULT_MODEL_SETTINGS, type ModelDefaults } from '../config.js';
import {
  ChatCompletionResponseSchema,
  CompletionOptionsSchema
} from '../schemas.js';
import type {
  CompletionClient,
  CompletionOptions,
  ModelCallError,
  ModelResponse,
  TokenUsage
} from '../types.js';

export interface ModelClientOptions {
  apiKey: string;
  model: string;
  apiUrl?: string;

  /** Overrides for temperature, maxTokens, timeoutMs, maxRetries, retryBackoffMs */
  defaults?: Partial<ModelDefaults>;

  /** Default system message; a per-call `systemPrompt` replaces it */
  systemPrompt?: string;

  /** Transport override, used by tests */
  fetch?: typeof fetch;
}

type AttemptOutcome =
  | { ok: true; text: string; model: string; usage?: TokenUsage }
  | { ok: false; error: ModelCallError };

function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600);
}

function cancelledError(): ModelCallError {
  return { kind: 'cancelled', message: 'Request cancelled by caller', retryable: false };
}

export class ModelClient implements CompletionClient {
  private readonly apiKey: string;
  private readonly apiUrl: string;
  private readonly model: string;
  private readonly defaults: ModelDefaults;
  private readonly systemPrompt?: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ModelClientOptions) {
    if (!options.apiKey.trim()) {
      throw new InvalidArgumentError('Model client requires an API key');
    }
    if (!options.model.trim()) {
      throw new InvalidArgumentError('Model client requires a model identifier');
    }

    this.apiKey = options.apiKey;
    this.apiUrl = options.apiUrl ?? DEFAULT_API_URL;
    this.model = options.model;
    this.defaults = { ...DEFAULT_MODEL_SETTINGS, ...options.defaults };
    this.systemPrompt = options.systemPrompt;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  get modelId(): string {
    return this.model;
  }

  /**
   * Execute one completion with timeout and retry support
   *
   * @throws InvalidArgumentError for an empty prompt or out-of-range options
   */
  async complete(prompt: string, options: CompletionOptions = {}): Promise<ModelResponse> {
    if (!prompt.trim()) {
      throw new InvalidArgumentError('Prompt must not be empty');
    }

    const { signal, ...callOptions } = options;
    const checked = CompletionOptionsSchema.safeParse(callOptions);
    if (!checked.success) {
      const detail = checked.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new InvalidArgumentError(`Invalid completion options: ${detail}`);
    }

    const {
      temperature = this.defaults.temperature,
      maxTokens = this.defaults.maxTokens,
      timeoutMs = this.defaults.timeoutMs,
      maxRetries = this.defaults.maxRetries,
      systemPrompt = this.systemPrompt
    } = checked.data;

    const startTime = Date.now();
    let attempts = 0;
    let lastError: ModelCallError = cancelledError();

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (signal?.aborted) {
        lastError = cancelledError();
        break;
      }

      attempts++;
      const outcome = await this.executeRequest(
        prompt,
        { temperature, maxTokens, timeoutMs, systemPrompt },
        signal
      );

      if (outcome.ok) {
        return {
          success: true,
          rawText: outcome.text,
          model: outcome.model,
          latencyMs: Date.now() - startTime,
          attempts,
          usage: outcome.usage
        };
      }

      lastError = outcome.error;
      if (!lastError.retryable || attempt >= maxRetries) {
        break;
      }

      // Exponential backoff
      const backoffMs = this.defaults.retryBackoffMs * Math.pow(2, attempt);
      const slept = await this.sleep(backoffMs, signal);
      if (!slept) {
        lastError = cancelledError();
        break;
      }
    }

    return {
      success: false,
      rawText: '',
      model: this.model,
      latencyMs: Date.now() - startTime,
      attempts,
      error: lastError
    };
  }

  /**
   * Execute a single HTTP attempt with its own deadline. Never throws.
   */
  private async executeRequest(
    prompt: string,
    settings: { temperature: number; maxTokens: number; timeoutMs: number; systemPrompt?: string },
    signal?: AbortSignal
  ): Promise<AttemptOutcome> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, settings.timeoutMs);
    const onCallerAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const messages = [
        ...(settings.systemPrompt ? [{ role: 'system', content: settings.systemPrompt }] : []),
        { role: 'user', content: prompt }
      ];

      const response = await this.fetchImpl(this.apiUrl, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
          'X-Title': 'Legal Assist'
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          temperature: settings.temperature,
          max_tokens: settings.maxTokens
        }),
        signal: controller.signal
      });

      const bodyText = await response.text();

      if (!response.ok) {
        return {
          ok: false,
          error: {
            kind: 'provider',
            message: `Model API error (${response.status}): ${bodyText.slice(0, 500)}`,
            statusCode: response.status,
            retryable: isRetryableStatus(response.status)
          }
        };
      }

      return this.parseCompletion(bodyText);
    } catch (error) {
      if (signal?.aborted) {
        return { ok: false, error: cancelledError() };
      }
      if (timedOut) {
        return {
          ok: false,
          error: {
            kind: 'timeout',
            message: `Model call timed out after ${settings.timeoutMs}ms`,
            retryable: true
          }
        };
      }
      return {
        ok: false,
        error: {
          kind: 'network',
          message: `Model call failed: ${error instanceof Error ? error.message : String(error)}`,
          retryable: true
        }
      };
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private parseCompletion(bodyText: string): AttemptOutcome {
    let body: unknown;
    try {
      body = JSON.parse(bodyText);
    } catch {
      return {
        ok: false,
        error: { kind: 'invalid-response', message: 'Model API returned a non-JSON body', retryable: false }
      };
    }

    const parsed = ChatCompletionResponseSchema.safeParse(body);
    if (!parsed.success) {
      return {
        ok: false,
        error: {
          kind: 'invalid-response',
          message: `Model API returned an unexpected body: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`,
          retryable: false
        }
      };
    }

    const { choices, model, usage } = parsed.data;
    return {
      ok: true,
      text: choices[0]?.message.content ?? '',
      model: model ?? this.model,
      usage: usage && {
        promptTokens: usage.prompt_tokens,
        completionTokens: usage.completion_tokens,
        totalTokens: usage.total_tokens
      }
    };
  }

  /**
   * Sleep for specified milliseconds. Resolves false if the caller aborts first.
   */
  private sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    return new Promise(resolve => {
      if (signal?.aborted) {
        resolve(false);
        return;
      }
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve(false);
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve(true);
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Check if the endpoint is configured and accessible
   */
  async healthCheck(): Promise<{ ok: boolean; message: string }> {
    const response = await this.complete('Reply with OK', {
      maxTokens: 10,
      timeoutMs: 30000,
      maxRetries: 0
    });

    if (response.success) {
      return { ok: true, message: `Model endpoint reachable (${response.model})` };
    }
    return { ok: false, message: `Model endpoint check failed: ${response.error.message}` };
  }
}

/**
 * Factory function for creating a client from loaded configuration
 */
export function createModelClient(
  config: { apiKey: string; apiUrl: string; model: string; systemInstruction: string; defaults: ModelDefaults },
  transport?: typeof fetch
): ModelClient {
  return new ModelClient({
    apiKey: config.apiKey,
    apiUrl: config.apiUrl,
    model: config.model,
    systemPrompt: config.systemInstruction,
    defaults: config.defaults,
    fetch: transport
  });
}
