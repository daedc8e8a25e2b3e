/**
 * Legal Assist
 *
 * Structured legal analysis over a language model: one pipeline from prompt
 * to shaped JSON, with a fallback value whenever the model's answer cannot be
 * recovered.
 */

// Core
export { extract } from './core/structured-extractor.js';
export {
  arrayShape,
  completeObject,
  conformsTo,
  isJsonArray,
  isJsonObject,
  objectShape,
  objectShapeFromTemplate
} from './core/shapes.js';
export type { ArrayShapeDeclaration, ObjectShapeDeclaration } from './core/shapes.js';
export { buildPrompt, createPromptSpec, describeShape, renderPrompt } from './core/prompt-builder.js';
export type { BuildOptions } from './core/prompt-builder.js';
export { ModelClient, createModelClient } from './core/model-client.js';
export type { ModelClientOptions } from './core/model-client.js';
export { emitTelemetry, runPipeline } from './core/pipeline.js';
export type { PipelineOptions, PipelineOutcome, PipelineRequest } from './core/pipeline.js';
export { InvalidArgumentError } from './core/errors.js';

// Tasks
export { ALL_TASKS, getTask, hasTask, parseComparisonInput, parseStartDate } from './tasks/catalog.js';
export type { ComparisonInput } from './tasks/catalog.js';
export { TaskInputError, UnknownTaskError, defineTask, truncateText } from './tasks/definitions.js';
export type { LegalTask, PreparedTask, TaskDefinition } from './tasks/definitions.js';
export { boundChanges, compareSections, extractSections } from './tasks/sections.js';
export type { BoundedChanges, DocumentSection, SectionChange } from './tasks/sections.js';

// Assistant
export { DELIBERATION_QUORUM, LegalAssistant } from './assistant/legal-assistant.js';
export type {
  ContractReview,
  ContractTimeline,
  Deliberation,
  DocumentComparison,
  LegalAssistantOptions,
  PanelPosition,
  PanelRole,
  RunOptions,
  TaskOutcome,
  TaskSummary
} from './assistant/legal-assistant.js';

// Server
export { createApp } from './server/app.js';
export type { AppOptions } from './server/app.js';

// Configuration
export {
  ConfigurationError,
  DEFAULT_API_URL,
  DEFAULT_MODEL_SETTINGS,
  assistantPrompts,
  loadAssistantConfig,
  validateConfig
} from './config.js';
export type { AssistantConfig, ModelDefaults } from './config.js';

// Usage
export { UsageTracker, formatUsageCompact, formatUsageSummary } from './usage.js';
export type { OperationUsage, OperationUsageSummary, UsageSummary } from './usage.js';

// Types
export type * from './types.js';
