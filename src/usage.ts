/**
 * Usage Tracking for Legal Assist
 *
 * Aggregates telemetry events: calls, tokens, latency and which extraction
 * tier answered, broken down by operation. A high fallback rate means the
 * model is replying in prose the extractor cannot recover.
 */

import type { ExtractionSource, TelemetryEvent, TokenUsage } from './types.js';

export interface OperationUsage {
  operation: string;
  calls: number;
  usage: TokenUsage;
  totalDurationMs: number;
  transportFailures: number;
  bySource: Record<ExtractionSource, number>;
}

export interface UsageSummary {
  totalCalls: number;
  totalTokens: number;
  transportFailures: number;
  bySource: Record<ExtractionSource, number>;

  /** Share of calls answered by the fallback tier (0-1) */
  fallbackRate: number;

  durationMs: number;
  byOperation: OperationUsageSummary[];
}

export interface OperationUsageSummary {
  operation: string;
  calls: number;
  tokens: number;
  averageDurationMs: number;
  fallbacks: number;
}

function emptySources(): Record<ExtractionSource, number> {
  return { strict_parse: 0, recovered_parse: 0, default_fallback: 0 };
}

/**
 * Telemetry sink for one session (a CLI run, a server lifetime)
 */
export class UsageTracker {
  private readonly startTime = new Date();
  private readonly byOperation = new Map<string, OperationUsage>();

  /** Pass as the telemetry hook: `onTelemetry: tracker.record` */
  readonly record = (event: TelemetryEvent): void => {
    let entry = this.byOperation.get(event.operation);
    if (!entry) {
      entry = {
        operation: event.operation,
        calls: 0,
        usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
        totalDurationMs: 0,
        transportFailures: 0,
        bySource: emptySources()
      };
      this.byOperation.set(event.operation, entry);
    }

    entry.calls += 1;
    entry.totalDurationMs += event.durationMs;
    entry.bySource[event.source] += 1;

    if (!event.transportOk) {
      entry.transportFailures += 1;
    }

    if (event.usage) {
      entry.usage.promptTokens += event.usage.promptTokens;
      entry.usage.completionTokens += event.usage.completionTokens;
      entry.usage.totalTokens += event.usage.totalTokens;
    }
  };

  getOperation(operation: string): OperationUsage | undefined {
    const entry = this.byOperation.get(operation);
    return entry && structuredClone(entry);
  }

  /**
   * Get usage summary for display
   */
  getSummary(now: Date = new Date()): UsageSummary {
    const bySource = emptySources();
    const byOperation: OperationUsageSummary[] = [];
    let totalCalls = 0;
    let totalTokens = 0;
    let transportFailures = 0;

    for (const entry of this.byOperation.values()) {
      totalCalls += entry.calls;
      totalTokens += entry.usage.totalTokens;
      transportFailures += entry.transportFailures;
      bySource.strict_parse += entry.bySource.strict_parse;
      bySource.recovered_parse += entry.bySource.recovered_parse;
      bySource.default_fallback += entry.bySource.default_fallback;

      byOperation.push({
        operation: entry.operation,
        calls: entry.calls,
        tokens: entry.usage.totalTokens,
        averageDurationMs: Math.round(entry.totalDurationMs / entry.calls),
        fallbacks: entry.bySource.default_fallback
      });
    }

    // Most expensive first
    byOperation.sort((a, b) => b.tokens - a.tokens || a.operation.localeCompare(b.operation));

    return {
      totalCalls,
      totalTokens,
      transportFailures,
      bySource,
      fallbackRate: totalCalls === 0 ? 0 : bySource.default_fallback / totalCalls,
      durationMs: now.getTime() - this.startTime.getTime(),
      byOperation
    };
  }
}

/**
 * Format usage summary for CLI display
 */
export function formatUsageSummary(summary: UsageSummary): string {
  const width = 53;
  const row = (text: string): string => `│${text.padEnd(width)}│`;
  const rule = (left: string, right: string): string => `${left}${'─'.repeat(width)}${right}`;

  const lines: string[] = [];
  lines.push(rule('┌', '┐'));
  lines.push(row('                    USAGE SUMMARY'));
  lines.push(rule('├', '┤'));
  lines.push(row(`  Model calls:      ${String(summary.totalCalls).padStart(10)}`));
  lines.push(row(`  Total tokens:     ${summary.totalTokens.toLocaleString('en-US').padStart(10)}`));
  lines.push(row(`  Transport errors: ${String(summary.transportFailures).padStart(10)}`));
  lines.push(row(`  Duration:         ${(summary.durationMs / 1000).toFixed(1).padStart(9)}s`));
  lines.push(rule('├', '┤'));
  lines.push(row('  BY EXTRACTION TIER'));
  lines.push(row(`    Strict parse:    ${String(summary.bySource.strict_parse).padStart(6)}`));
  lines.push(row(`    Recovered parse: ${String(summary.bySource.recovered_parse).padStart(6)}`));
  lines.push(row(`    Fallback:        ${String(summary.bySource.default_fallback).padStart(6)}  (${(summary.fallbackRate * 100).toFixed(0)}%)`));

  if (summary.byOperation.length > 0) {
    lines.push(rule('├', '┤'));
    lines.push(row('  BY OPERATION'));
    for (const op of summary.byOperation) {
      const name = op.operation.substring(0, 20).padEnd(20);
      const marker = op.fallbacks > 0 ? '!' : ' ';
      lines.push(row(`  ${marker} ${name} ${String(op.calls).padStart(3)}x ${op.tokens.toLocaleString('en-US').padStart(8)} tk ${String(op.averageDurationMs).padStart(6)}ms`));
    }
    if (summary.byOperation.some(op => op.fallbacks > 0)) {
      lines.push(rule('├', '┤'));
      lines.push(row('  ! = at least one answer was a fallback stand-in'));
    }
  }

  lines.push(rule('└', '┘'));
  return lines.join('\n');
}

/**
 * Format compact usage for inline display
 */
export function formatUsageCompact(summary: UsageSummary): string {
  return `${summary.totalCalls} calls | ${summary.totalTokens.toLocaleString('en-US')} tokens | ${summary.bySource.default_fallback} fallback | ${(summary.durationMs / 1000).toFixed(1)}s`;
}
