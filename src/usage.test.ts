import { describe, it, expect } from 'vitest';
import { UsageTracker, formatUsageCompact, formatUsageSummary } from './usage.js';
import type { TelemetryEvent } from './types.js';

function event(overrides: Partial<TelemetryEvent>): TelemetryEvent {
  return {
    operation: 'identify-issues',
    durationMs: 100,
    source: 'strict_parse',
    transportOk: true,
    model: 'test/model',
    attempts: 1,
    ...overrides
  };
}

describe('UsageTracker', () => {
  it('aggregates calls, tokens and extraction tiers per operation', () => {
    const tracker = new UsageTracker();
    tracker.record(event({ usage: { promptTokens: 100, completionTokens: 50, totalTokens: 150 } }));
    tracker.record(event({ durationMs: 300, source: 'recovered_parse', usage: { promptTokens: 10, completionTokens: 10, totalTokens: 20 } }));
    tracker.record(event({ operation: 'contract-risks', source: 'default_fallback', transportOk: false, errorKind: 'timeout' }));

    expect(tracker.getOperation('identify-issues')).toEqual({
      operation: 'identify-issues',
      calls: 2,
      usage: { promptTokens: 110, completionTokens: 60, totalTokens: 170 },
      totalDurationMs: 400,
      transportFailures: 0,
      bySource: { strict_parse: 1, recovered_parse: 1, default_fallback: 0 }
    });

    const summary = tracker.getSummary();
    expect(summary.totalCalls).toBe(3);
    expect(summary.totalTokens).toBe(170);
    expect(summary.transportFailures).toBe(1);
    expect(summary.bySource).toEqual({ strict_parse: 1, recovered_parse: 1, default_fallback: 1 });
    expect(summary.fallbackRate).toBeCloseTo(1 / 3);
    expect(summary.byOperation).toEqual([
      { operation: 'identify-issues', calls: 2, tokens: 170, averageDurationMs: 200, fallbacks: 0 },
      { operation: 'contract-risks', calls: 1, tokens: 0, averageDurationMs: 100, fallbacks: 1 }
    ]);
  });

  it('works as a detached hook', () => {
    const tracker = new UsageTracker();
    const hook = tracker.record;
    hook(event({}));
    expect(tracker.getSummary().totalCalls).toBe(1);
  });

  it('hands out copies of its entries', () => {
    const tracker = new UsageTracker();
    tracker.record(event({}));
    const copy = tracker.getOperation('identify-issues');
    if (copy) copy.calls = 99;
    expect(tracker.getOperation('identify-issues')?.calls).toBe(1);
  });

  it('reports a zero fallback rate with no calls', () => {
    expect(new UsageTracker().getSummary().fallbackRate).toBe(0);
  });
});

describe('formatting', () => {
  it('formats a compact line', () => {
    const tracker = new UsageTracker();
    tracker.record(event({ source: 'default_fallback', usage: { promptTokens: 1000, completionTokens: 234, totalTokens: 1234 } }));
    const summary = { ...tracker.getSummary(), durationMs: 2500 };

    expect(formatUsageCompact(summary)).toBe('1 calls | 1,234 tokens | 1 fallback | 2.5s');
  });

  it('marks operations that fell back in the box', () => {
    const tracker = new UsageTracker();
    tracker.record(event({ operation: 'contract-risks', source: 'default_fallback' }));
    const lines = formatUsageSummary(tracker.getSummary()).split('\n');

    expect(lines[0]).toBe(`┌${'─'.repeat(53)}┐`);
    expect(lines.every(line => line.length === 55)).toBe(true);
    expect(lines).toContain(`│${'  ! = at least one answer was a fallback stand-in'.padEnd(53)}│`);
  });
});
