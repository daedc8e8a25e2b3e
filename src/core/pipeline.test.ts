import { describe, it, expect, vi } from 'vitest';
import { emitTelemetry, runPipeline } from './pipeline.js';
import { ModelClient } from './model-client.js';
import { createPromptSpec } from './prompt-builder.js';
import { arrayShape, objectShape } from './shapes.js';
import type { CompletionClient, CompletionOptions, ModelResponse, TelemetryEvent } from '../types.js';

function replyWith(rawText: string): CompletionClient {
  return {
    complete: async (): Promise<ModelResponse> => ({
      success: true,
      rawText,
      model: 'test/model',
      latencyMs: 5,
      attempts: 1,
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 }
    })
  };
}

const issuesShape = objectShape({ requiredKeys: ['issues'], defaultValues: { issues: [] } });
const prompt = createPromptSpec('Identify the legal issues.', 'The buyer may cancel at any time.', '{"issues": []}');

describe('runPipeline', () => {
  it('extracts a strict answer and reports it available', async () => {
    const outcome = await runPipeline(replyWith('{"issues": ["unilateral cancellation"]}'), {
      operation: 'identify-issues',
      prompt,
      shape: issuesShape
    });

    expect(outcome.available).toBe(true);
    expect(outcome.result.source).toBe('strict_parse');
    expect(outcome.result.value).toEqual({ issues: ['unilateral cancellation'] });
  });

  it('sends the rendered prompt and passes the signal through', async () => {
    const complete = vi.fn(async (_prompt: string, _options?: CompletionOptions): Promise<ModelResponse> => ({
      success: true, rawText: '[]', model: 'test/model', latencyMs: 1, attempts: 1
    }));
    const controller = new AbortController();

    await runPipeline(
      { complete },
      { operation: 'contract-risks', prompt, shape: arrayShape() },
      { signal: controller.signal, completion: { temperature: 0.2 } }
    );

    expect(complete).toHaveBeenCalledWith(
      'Identify the legal issues.\n\nThe buyer may cancel at any time.\n\nRespond as JSON matching: {"issues": []}',
      { temperature: 0.2, signal: controller.signal }
    );
  });

  it('falls back without throwing when the model call times out', async () => {
    const hangingFetch: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
    const client = new ModelClient({
      apiKey: 'test-secret',
      model: 'test/model',
      defaults: { timeoutMs: 20, maxRetries: 0 },
      fetch: hangingFetch
    });

    const outcome = await runPipeline(client, { operation: 'identify-issues', prompt, shape: issuesShape });

    expect(outcome.response.success).toBe(false);
    expect(outcome.result).toEqual({ value: { issues: [] }, source: 'default_fallback', rawText: '' });
    expect(outcome.available).toBe(false);
  });

  it('emits one telemetry event per call', async () => {
    const events: TelemetryEvent[] = [];
    await runPipeline(
      replyWith('Here you go: [{"risk": "x"}]'),
      { operation: 'contract-risks', prompt, shape: arrayShape() },
      { onTelemetry: event => events.push(event) }
    );

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      operation: 'contract-risks',
      source: 'recovered_parse',
      transportOk: true,
      model: 'test/model',
      attempts: 1,
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 }
    });
    expect(events[0].errorKind).toBeUndefined();
  });

  it('does not let a failing telemetry hook break the call', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const outcome = await runPipeline(
      replyWith('{"issues": []}'),
      { operation: 'identify-issues', prompt, shape: issuesShape },
      { onTelemetry: () => { throw new Error('sink down'); } }
    );

    expect(outcome.available).toBe(true);
    expect(warn).toHaveBeenCalledWith('Telemetry hook failed for "identify-issues": sink down');
    warn.mockRestore();
  });
});

describe('emitTelemetry', () => {
  it('does nothing without a hook', () => {
    expect(() => emitTelemetry(undefined, {
      operation: 'x', durationMs: 0, source: 'strict_parse', transportOk: true, model: 'm', attempts: 1
    })).not.toThrow();
  });
});
