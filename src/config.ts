/**
 * Legal Assist Configuration
 *
 * The code knows there is one model endpoint and one model behind it.
 * Which model that is gets decided at deployment through the environment;
 * there is NO hardcoded model default.
 *
 * The host builds one ModelClient from this config and passes it down.
 */

// ============================================================================
// Configuration Structure
// ============================================================================

export interface ModelDefaults {
  /** Low temperature for precise legal reasoning */
  temperature: number;
  maxTokens: number;

  /** Per-attempt deadline for one model call */
  timeoutMs: number;

  /** Retries after the first attempt, transient failures only */
  maxRetries: number;

  /** Base delay for exponential backoff between retries */
  retryBackoffMs: number;
}

export interface AssistantConfig {
  apiKey: string;
  apiUrl: string;
  model: string;

  /** System message sent ahead of every prompt */
  systemInstruction: string;

  defaults: ModelDefaults;

  /** Maximum concurrent model calls when one request fans out to several tasks */
  concurrencyLimit: number;

  /** Append the step-by-step scaffold to long analytical prompts */
  reasoningScaffold: boolean;

  server: {
    port: number;

    /** Bearer token required by the HTTP API; unset leaves it open */
    apiToken?: string;
  };

  debug: boolean;
}

export const DEFAULT_API_URL = 'https://openrouter.ai/api/v1/chat/completions';

export const DEFAULT_MODEL_SETTINGS: ModelDefaults = {
  temperature: 0.1,
  maxTokens: 8192,
  timeoutMs: 60000,
  maxRetries: 2,
  retryBackoffMs: 1000
};

function readInt(raw: string | undefined, fallback: number, min = 0): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function readFloat(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseFloat(raw ?? '');
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readFlag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

/**
 * Load assistant configuration from environment variables.
 *
 * Required:
 *   OPENROUTER_API_KEY - API key for the completion endpoint
 *   ASSISTANT_MODEL    - Model identifier in the provider's naming
 *
 * Optional:
 *   MODEL_API_URL, MODEL_TEMPERATURE, MODEL_MAX_TOKENS, MODEL_TIMEOUT_MS,
 *   MODEL_MAX_RETRIES, ASSISTANT_CONCURRENCY_LIMIT, REASONING_SCAFFOLD,
 *   PORT, ASSISTANT_API_TOKEN, ASSISTANT_DEBUG
 */
export function loadAssistantConfig(env: NodeJS.ProcessEnv = process.env): AssistantConfig {
  const apiKey = env.OPENROUTER_API_KEY?.trim();
  const model = env.ASSISTANT_MODEL?.trim();

  if (!apiKey || !model) {
    const missing = [
      !apiKey ? 'OPENROUTER_API_KEY' : null,
      !model ? 'ASSISTANT_MODEL' : null
    ].filter(Boolean).join(', ');

    throw new ConfigurationError(
      `Missing required configuration: ${missing}.\n\n` +
      `Set them in your environment or .env file:\n` +
      `  OPENROUTER_API_KEY=your_key_here\n` +
      `  ASSISTANT_MODEL=provider/model-name\n\n` +
      `Model identifiers must match your API provider's naming convention.`
    );
  }

  return {
    apiKey,
    apiUrl: env.MODEL_API_URL?.trim() || DEFAULT_API_URL,
    model,
    systemInstruction: assistantPrompts.systemInstruction,
    defaults: {
      temperature: readFloat(env.MODEL_TEMPERATURE, DEFAULT_MODEL_SETTINGS.temperature),
      maxTokens: readInt(env.MODEL_MAX_TOKENS, DEFAULT_MODEL_SETTINGS.maxTokens, 1),
      timeoutMs: readInt(env.MODEL_TIMEOUT_MS, DEFAULT_MODEL_SETTINGS.timeoutMs, 1),
      maxRetries: readInt(env.MODEL_MAX_RETRIES, DEFAULT_MODEL_SETTINGS.maxRetries),
      retryBackoffMs: DEFAULT_MODEL_SETTINGS.retryBackoffMs
    },
    concurrencyLimit: readInt(env.ASSISTANT_CONCURRENCY_LIMIT, 3, 1),
    reasoningScaffold: readFlag(env.REASONING_SCAFFOLD, false),
    server: {
      port: readInt(env.PORT, 3000, 1),
      apiToken: env.ASSISTANT_API_TOKEN?.trim() || undefined
    },
    debug: readFlag(env.ASSISTANT_DEBUG, false)
  };
}

/**
 * Validate that required configuration is present.
 * Returns errors rather than throwing - use for pre-flight checks.
 */
export function validateConfig(
  env: NodeJS.ProcessEnv = process.env
): { valid: boolean; errors: string[]; warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!env.OPENROUTER_API_KEY?.trim()) {
    errors.push('OPENROUTER_API_KEY is required');
  }

  if (!env.ASSISTANT_MODEL?.trim()) {
    errors.push('ASSISTANT_MODEL is required. Set it to a model identifier, e.g. provider/model-name');
  }

  const timeout = env.MODEL_TIMEOUT_MS;
  if (timeout !== undefined && readInt(timeout, -1, 1) === -1) {
    warnings.push(`MODEL_TIMEOUT_MS="${timeout}" is not a positive integer; using ${DEFAULT_MODEL_SETTINGS.timeoutMs}`);
  }

  const temperature = env.MODEL_TEMPERATURE;
  if (temperature !== undefined && !Number.isFinite(Number.parseFloat(temperature))) {
    warnings.push(`MODEL_TEMPERATURE="${temperature}" is not a number; using ${DEFAULT_MODEL_SETTINGS.temperature}`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Prompt Constants (structure, not model-specific)
// ============================================================================

export const assistantPrompts = {
  systemInstruction: `You are a legal assistant with expertise in contract law, negotiation and dispute resolution.

Principles:
1. Be precise in legal language and reasoning
2. Consider every party's interests fairly
3. Identify risks proactively
4. Suggest practical solutions
5. Explain your reasoning transparently

When analyzing legal text, identify explicit and implicit obligations, ambiguities,
enforceability and jurisdiction issues, and imbalance between the parties.

When drafting, use clear and specific language, define terms precisely and follow
standard legal structure.

When asked for JSON, return JSON only.`,

  reasoningScaffold: `Work through this step by step before answering:
1. Break the task into its key components
2. Identify the relevant legal principles
3. Apply those principles to this situation
4. Give your final answer in the requested format`
};
