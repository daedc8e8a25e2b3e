/**
 * Legal Assistant
 *
 * Host-facing layer over the task catalogue. Holds the injected completion
 * client, runs single tasks, fans a contract review out over several tasks and
 * runs the panel deliberation.
 *
 * Nothing here parses model output; every call goes through runPipeline.
 */

import type { AssistantConfig } from '../config.js';
import { InvalidArgumentError } from '../core/errors.js';
import { createPromptSpec } from '../core/prompt-builder.js';
import { objectShapeFromTemplate } from '../core/shapes.js';
import { type PipelineOptions, type PipelineOutcome, runPipeline } from '../core/pipeline.js';
import {
  ALL_TASKS,
  buildTimelineTask,
  extractConclusionsTask,
  extractTimeframesTask,
  getTask,
  parseComparisonInput,
  parseStartDate
} from '../tasks/catalog.js';
import { compareSections, type SectionChange } from '../tasks/sections.js';
import type {
  CompletionClient,
  ExtractionSource,
  JsonObject,
  JsonValue,
  ModelCallErrorKind,
  ProgressCallback,
  ProgressEvent,
  TelemetryHook
} from '../types.js';

// ============================================================================
// Result Types
// ============================================================================

export interface TaskSummary {
  name: string;
  description: string;
  outputKind: 'object' | 'array';
}

export interface TaskOutcome {
  task: string;
  value: JsonObject | JsonValue[];
  source: ExtractionSource;

  /** False when `value` is the fallback stand-in */
  available: boolean;

  model: string;
  attempts: number;
  durationMs: number;

  /** Set when the model call itself failed */
  errorKind?: ModelCallErrorKind;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface ContractReview {
  risks: TaskOutcome;
  weaknesses: TaskOutcome;
  issues: TaskOutcome;

  /** Task names whose answer is a fallback */
  unavailable: string[];
}

export interface DocumentComparison {
  changes: SectionChange[];

  /** Absent when the documents have no section-level differences */
  analysis?: TaskOutcome;
}

export interface ContractTimeline {
  startDate: string;
  timeframes: TaskOutcome;

  /** Absent when no timeframes were extracted */
  timeline?: TaskOutcome;
}

export type PanelRole = 'drafter' | 'risk-analyst' | 'client-advocate' | 'opposing-advocate';

export interface PanelPosition {
  role: PanelRole;
  position: string;
  arguments: JsonValue[];
  concerns: JsonValue[];
  available: boolean;
}

export interface Deliberation {
  question: string;
  positions: PanelPosition[];
  quorumReached: boolean;

  /** Judge's evaluation of the positions; null without quorum */
  evaluation: TaskOutcome | null;

  /** Extracted conclusions; null without quorum or when the judge had no answer */
  conclusions: TaskOutcome | null;

  durationMs: number;
}

export interface LegalAssistantOptions {
  onTelemetry?: TelemetryHook;
  onProgress?: ProgressCallback;
}

// ============================================================================
// Panel
// ============================================================================

/** Minimum available positions before the judge pass runs */
export const DELIBERATION_QUORUM = 2;

const PANEL_ROLES: ReadonlyArray<{ role: PanelRole; brief: string }> = [
  {
    role: 'drafter',
    brief: 'You are a legal drafter. Focus on precise language, structure and how the position would be documented.'
  },
  {
    role: 'risk-analyst',
    brief: 'You are a legal risk analyst. Focus on exposure, likelihood of disputes and worst realistic outcomes.'
  },
  {
    role: 'client-advocate',
    brief: 'You are counsel for the client. Argue for the position that best protects the client\'s interests.'
  },
  {
    role: 'opposing-advocate',
    brief: 'You are counsel for the opposing party. Argue the strongest case against the client\'s position.'
  }
];

const POSITION_SHAPE = objectShapeFromTemplate({
  position: '',
  arguments: [],
  concerns: []
});

const EVALUATION_SHAPE = objectShapeFromTemplate({
  evaluation: '',
  strongest_arguments: [],
  unresolved_questions: []
});

const JUDGE_INSTRUCTION = `You are a judge reviewing the positions of a legal panel on the question below.
Weigh the arguments on their legal merit, say which are strongest and why,
and write a reasoned evaluation of how the question should be resolved.`;

function asString(value: JsonValue | undefined): string {
  return typeof value === 'string' ? value : '';
}

function asArray(value: JsonValue | undefined): JsonValue[] {
  return Array.isArray(value) ? value : [];
}

/**
 * Run async tasks with a concurrency limit, preserving result order.
 */
async function withConcurrencyLimit<T>(
  tasks: Array<() => Promise<T>>,
  limit: number
): Promise<T[]> {
  const results = new Array<T>(tasks.length);
  let currentIndex = 0;

  async function runNext(): Promise<void> {
    while (currentIndex < tasks.length) {
      const index = currentIndex++;
      results[index] = await tasks[index]();
    }
  }

  // Start up to `limit` concurrent workers
  const workers = Array.from({ length: Math.min(Math.max(1, limit), tasks.length) }, () => runNext());

  await Promise.all(workers);
  return results;
}

// ============================================================================
// Assistant
// ============================================================================

export class LegalAssistant {
  private readonly client: CompletionClient;
  private readonly config: AssistantConfig;
  private readonly onTelemetry?: TelemetryHook;
  private readonly onProgress?: ProgressCallback;

  constructor(client: CompletionClient, config: AssistantConfig, options: LegalAssistantOptions = {}) {
    this.client = client;
    this.config = config;
    this.onTelemetry = options.onTelemetry;
    this.onProgress = options.onProgress;
  }

  listTasks(): TaskSummary[] {
    return ALL_TASKS.map(task => ({
      name: task.name,
      description: task.description,
      outputKind: task.outputKind
    }));
  }

  /**
   * Run one catalogue task.
   *
   * @throws UnknownTaskError
   * @throws TaskInputError
   */
  async runTask(name: string, input: unknown, options: RunOptions = {}): Promise<TaskOutcome> {
    const task = getTask(name);
    const prepared = task.prepare(input);

    this.progress({ type: 'task-start', label: name, message: task.description });

    const outcome = await runPipeline(
      this.client,
      { operation: name, prompt: prepared.prompt, shape: prepared.shape },
      this.pipelineOptions(options.signal)
    );

    return this.toTaskOutcome(outcome);
  }

  /**
   * Contract risks, adversarial weaknesses and issue spotting over one text.
   *
   * @throws TaskInputError for empty text
   */
  async reviewContract(text: string, options: RunOptions = {}): Promise<ContractReview> {
    // Validate every input before spending a model call
    const names = ['contract-risks', 'find-weaknesses', 'identify-issues'] as const;
    for (const name of names) {
      getTask(name).prepare({ text });
    }

    this.progress({ type: 'start', message: `Reviewing contract with ${names.length} analyses` });

    const [risks, weaknesses, issues] = await withConcurrencyLimit(
      names.map(name => () => this.runTask(name, { text }, options)),
      this.config.concurrencyLimit
    );

    const unavailable = [risks, weaknesses, issues]
      .filter(outcome => !outcome.available)
      .map(outcome => outcome.task);

    this.progress({
      type: 'complete',
      message: unavailable.length === 0
        ? 'Contract review complete'
        : `Contract review complete, unavailable: ${unavailable.join(', ')}`
    });

    return { risks, weaknesses, issues, unavailable };
  }

  /**
   * Section-level comparison; the model is only consulted when something changed.
   *
   * @throws TaskInputError when either document is empty
   */
  async compareDocuments(original: string, revised: string, options: RunOptions = {}): Promise<DocumentComparison> {
    const input = parseComparisonInput({ original, revised });
    const changes = compareSections(input.original, input.revised);
    if (changes.length === 0) {
      return { changes };
    }

    const analysis = await this.runTask('compare-documents', input, options);
    return { changes, analysis };
  }

  /**
   * Extract the contract's timeframes, then date them from `startDate`.
   *
   * @throws TaskInputError for empty text or a malformed start date
   */
  async buildTimeline(text: string, startDate: string, options: RunOptions = {}): Promise<ContractTimeline> {
    const start = parseStartDate(startDate);
    extractTimeframesTask.prepare({ text });

    const timeframes = await this.runTask(extractTimeframesTask.name, { text }, options);
    if (!timeframes.available || !Array.isArray(timeframes.value) || timeframes.value.length === 0) {
      return { startDate: start, timeframes };
    }

    const timeline = await this.runTask(
      buildTimelineTask.name,
      { startDate: start, timeframes: timeframes.value },
      options
    );
    return { startDate: start, timeframes, timeline };
  }

  /**
   * Panel deliberation: four roles take positions, a judge evaluates them and
   * the conclusions are extracted from the evaluation.
   *
   * @throws InvalidArgumentError for an empty question
   */
  async deliberate(question: string, context = '', options: RunOptions = {}): Promise<Deliberation> {
    if (!question.trim()) {
      throw new InvalidArgumentError('Deliberation question must not be empty');
    }

    const startTime = Date.now();
    const brief: JsonObject = context.trim()
      ? { question: question.trim(), context: context.trim() }
      : { question: question.trim() };

    const prompts = PANEL_ROLES.map(({ role, brief: roleBrief }) => ({
      role,
      prompt: createPromptSpec(
        `${roleBrief}\nState your position on the question, the arguments for it and your concerns.`,
        brief,
        '{"position": string, "arguments": [string], "concerns": [string]}'
      )
    }));

    this.progress({ type: 'start', message: `Panel of ${PANEL_ROLES.length} deliberating` });

    const positions = await withConcurrencyLimit(
      prompts.map(({ role, prompt }) => async (): Promise<PanelPosition> => {
        this.progress({ type: 'task-start', label: role });
        const outcome = await runPipeline(
          this.client,
          { operation: `deliberate:${role}`, prompt, shape: POSITION_SHAPE },
          this.pipelineOptions(options.signal)
        );
        this.reportOutcome(role, outcome.available, outcome.result.source);

        const value = outcome.result.value;
        return {
          role,
          position: asString(value.position),
          arguments: asArray(value.arguments),
          concerns: asArray(value.concerns),
          available: outcome.available
        };
      }),
      this.config.concurrencyLimit
    );

    const available = positions.filter(p => p.available);
    const quorumReached = available.length >= DELIBERATION_QUORUM;

    if (!quorumReached) {
      this.progress({
        type: 'complete',
        message: `No quorum: ${available.length} of ${DELIBERATION_QUORUM} required positions available`
      });
      return {
        question,
        positions,
        quorumReached,
        evaluation: null,
        conclusions: null,
        durationMs: Date.now() - startTime
      };
    }

    this.progress({ type: 'task-start', label: 'deliberate:judge' });
    const judged = await runPipeline(
      this.client,
      {
        operation: 'deliberate:judge',
        prompt: createPromptSpec(
          JUDGE_INSTRUCTION,
          {
            ...brief,
            positions: available.map(p => ({
              role: p.role,
              position: p.position,
              arguments: p.arguments,
              concerns: p.concerns
            }))
          },
          '{"evaluation": string, "strongest_arguments": [string], "unresolved_questions": [string]}'
        ),
        shape: EVALUATION_SHAPE
      },
      this.pipelineOptions(options.signal)
    );
    const evaluation = this.toTaskOutcome(judged);

    const evaluationText = asString(judged.result.value.evaluation).trim();
    let conclusions: TaskOutcome | null = null;
    if (judged.available && evaluationText) {
      conclusions = await this.runTask(extractConclusionsTask.name, { evaluation: evaluationText }, options);
    }

    this.progress({ type: 'complete', message: 'Deliberation complete' });

    return {
      question,
      positions,
      quorumReached,
      evaluation,
      conclusions,
      durationMs: Date.now() - startTime
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private pipelineOptions(signal?: AbortSignal): PipelineOptions {
    return {
      signal,
      reasoningScaffold: this.config.reasoningScaffold,
      onTelemetry: this.onTelemetry
    };
  }

  private toTaskOutcome(outcome: PipelineOutcome<JsonObject | JsonValue[]>): TaskOutcome {
    const { response } = outcome;
    this.reportOutcome(outcome.operation, outcome.available, outcome.result.source);

    return {
      task: outcome.operation,
      value: outcome.result.value,
      source: outcome.result.source,
      available: outcome.available,
      model: response.model,
      attempts: response.attempts,
      durationMs: outcome.durationMs,
      errorKind: response.success ? undefined : response.error.kind
    };
  }

  private reportOutcome(label: string, available: boolean, source: ExtractionSource): void {
    this.progress(available
      ? { type: 'task-complete', label, message: source }
      : { type: 'task-unavailable', label, message: 'analysis unavailable' });
  }

  private progress(event: ProgressEvent): void {
    if (!this.onProgress) return;
    try {
      this.onProgress(event);
    } catch (error) {
      console.warn(
        `Progress callback failed for "${event.label ?? event.type}": ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}
