/**
 * Legal Task Catalogue
 *
 * Every task here is a caller of the structured pipeline. Input bounds keep
 * prompts within model context; the shape keeps the frontend's contract.
 */

import { z } from 'zod';
import { JsonValueSchema, arrayShape, objectShape, objectShapeFromTemplate } from '../core/shapes.js';
import { boundChanges, compareSections } from './sections.js';
import { type LegalTask, TaskInputError, UnknownTaskError, defineTask, truncateText } from './definitions.js';
import type { JsonObject } from '../types.js';

// Input bounds (characters)
const MAX_DOCUMENT_CHARS = 8000;
const MAX_QUESTION_CHARS = 2000;
const MAX_EVALUATION_CHARS = 6000;
const MAX_SECTION_CHARS = 2000;
const MAX_GRAPH_CHARS = 12000;

const TextInputSchema = z.object({
  text: z.string().trim().min(1, 'text must not be empty')
});

// ============================================================================
// Issue Spotting & Analysis
// ============================================================================

export const identifyIssuesTask = defineTask({
  name: 'identify-issues',
  description: 'Spot legal issues in a document or fact pattern',
  instruction: `Identify the legal issues raised by the following text.
For each issue, state the issue, why it matters and how severe it is.`,
  inputSchema: TextInputSchema,
  shape: objectShape({ requiredKeys: ['issues'], defaultValues: { issues: [] } }),
  schemaHint: '{"issues": [{"issue": string, "explanation": string, "severity": "critical" | "significant" | "minor"}]}',
  render: ({ text }) => truncateText(text, MAX_DOCUMENT_CHARS)
});

export const analyzeTextTask = defineTask({
  name: 'analyze-text',
  description: 'Extract entities, obligations, rights, timeframes and risks from legal text',
  instruction: `Perform a legal analysis of the following text.
Identify the parties and other entities, each party's obligations and rights,
every deadline or time period, and the risks each party carries.
Include every key in your answer, even when its value is empty.`,
  inputSchema: TextInputSchema,
  shape: objectShapeFromTemplate({
    entities: [],
    obligations: [],
    rights: [],
    timeframes: [],
    risks: {}
  }),
  schemaHint: '{"entities": [], "obligations": [], "rights": [], "timeframes": [], "risks": {}}',
  render: ({ text }) => truncateText(text, MAX_DOCUMENT_CHARS)
});

export const legalQuestionTask = defineTask({
  name: 'legal-question',
  description: 'Answer a legal question with principles, citations and exceptions',
  instruction: `Answer the following legal question. Explain the applicable legal principles,
cite the relevant legal standards or authorities, describe the practical implications
and note any important exceptions.`,
  inputSchema: z.object({
    question: z.string().trim().min(1, 'question must not be empty')
  }),
  shape: objectShapeFromTemplate({
    explanation: '',
    legal_principles: [],
    practical_implications: [],
    exceptions: []
  }),
  schemaHint: '{"explanation": string, "legal_principles": [{"principle": string, "description": string, "citation": string}], "practical_implications": [string], "exceptions": [string]}',
  render: ({ question }) => truncateText(question, MAX_QUESTION_CHARS)
});

// ============================================================================
// Contract Review
// ============================================================================

export const contractRisksTask = defineTask({
  name: 'contract-risks',
  description: 'List risky, ambiguous or unfavourable contract clauses',
  instruction: `Analyze the following contract for legal risks, ambiguities and unfavourable terms.
Identify the specific clauses that could lead to disputes.`,
  inputSchema: TextInputSchema,
  shape: arrayShape(),
  schemaHint: '[{"clause": string, "risk": string, "recommendation": string}]',
  render: ({ text }) => truncateText(text, MAX_DOCUMENT_CHARS)
});

const PERSPECTIVES = {
  neutral: 'Analyze this contract objectively to identify its weaknesses.',
  aggressive: 'You represent a party looking to exploit any loophole or ambiguity in this contract.',
  defensive: 'You represent a party that wants to protect itself from problems in this contract.',
  judge: 'You are a judge evaluating this contract for issues that could lead to litigation.'
} as const;

export const findWeaknessesTask = defineTask({
  name: 'find-weaknesses',
  description: 'Adversarially test a contract for loopholes, ambiguity and missing protections',
  instruction: `Look for loopholes, ambiguous language, missing clauses or protections,
conflicting provisions and strategic weaknesses.
For each problem, quote the language briefly, explain the problem, how it could be exploited
and suggest a fix.`,
  inputSchema: TextInputSchema.extend({
    perspective: z.enum(['neutral', 'aggressive', 'defensive', 'judge']).default('neutral')
  }),
  shape: arrayShape(),
  schemaHint: '[{"problematic_language": string, "problem": string, "potential_exploitation": string, "suggested_fix": string}]',
  render: ({ text, perspective }) =>
    `${PERSPECTIVES[perspective]}\n\nCONTRACT:\n${truncateText(text, MAX_DOCUMENT_CHARS)}`
});

export const complianceCheckTask = defineTask({
  name: 'compliance-check',
  description: 'Check a contract against regulatory domains in a jurisdiction',
  instruction: `Check the following contract for compliance with regulations in each listed domain.
For each domain, name the applicable regulations, assess compliance,
flag issues and recommend fixes. Use each domain name as a top-level key.`,
  inputSchema: TextInputSchema.extend({
    domains: z.array(z.string().trim().min(1)).min(1).default(['data privacy', 'employment']),
    jurisdiction: z.string().trim().min(1).default('US')
  }),
  shape: ({ domains }) => {
    const perDomain: JsonObject = {
      applicable_regulations: [],
      compliance_status: 'undetermined',
      issues: [],
      recommendations: []
    };
    return objectShape({
      requiredKeys: domains,
      defaultValues: Object.fromEntries(domains.map(domain => [domain, perDomain]))
    });
  },
  schemaHint: '{"<domain>": {"applicable_regulations": [string], "compliance_status": string, "issues": [string], "recommendations": [string]}}',
  render: ({ text, domains, jurisdiction }) =>
    `Domains: ${domains.join(', ')}\nJurisdiction: ${jurisdiction}\n\nCONTRACT:\n${truncateText(text, MAX_DOCUMENT_CHARS)}`
});

const ComparisonInputSchema = z.object({
  original: z.string().trim().min(1, 'original must not be empty'),
  revised: z.string().trim().min(1, 'revised must not be empty')
});

export type ComparisonInput = z.infer<typeof ComparisonInputSchema>;

export const compareDocumentsTask = defineTask({
  name: 'compare-documents',
  description: 'Explain the legal significance of the differences between two versions of a document',
  instruction: `The following section-level changes were found between two versions of a legal document.
Summarize the significant changes, their legal implications and your recommendations.`,
  inputSchema: ComparisonInputSchema,
  shape: objectShapeFromTemplate({
    significant_changes: [],
    legal_implications: [],
    recommendations: []
  }),
  schemaHint: '{"significant_changes": [string], "legal_implications": [string], "recommendations": [string]}',
  // Diff the full texts; only the change list is bounded
  render: ({ original, revised }): JsonObject => {
    const { changes, omitted } = boundChanges(
      compareSections(original, revised),
      MAX_DOCUMENT_CHARS,
      MAX_SECTION_CHARS
    );
    return omitted > 0 ? { changes, omitted_changes: omitted } : { changes };
  }
});

/**
 * @throws TaskInputError
 */
export function parseComparisonInput(input: unknown): ComparisonInput {
  const parsed = ComparisonInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new TaskInputError(compareDocumentsTask.name, parsed.error);
  }
  return parsed.data;
}

// ============================================================================
// Reasoning Frameworks
// ============================================================================

export const iracAnalysisTask = defineTask({
  name: 'irac-analysis',
  description: 'Work a question through Issue, Rule, Analysis and Conclusion',
  instruction: `Apply the IRAC legal reasoning framework to the question and text below.
Issue: state the precise legal issue presented.
Rule: identify the legal rules, principles or standards that apply.
Analysis: apply those rules to the facts in the text.
Conclusion: state the conclusion that follows from the analysis.`,
  inputSchema: TextInputSchema.extend({
    question: z.string().trim().min(1).default('What are the main legal obligations in this contract?')
  }),
  shape: objectShapeFromTemplate({
    issue: '',
    rule: '',
    analysis: '',
    conclusion: ''
  }),
  schemaHint: '{"issue": string, "rule": string, "analysis": string, "conclusion": string}',
  render: ({ text, question }) =>
    `Legal question: ${truncateText(question, MAX_QUESTION_CHARS)}\n\nLEGAL TEXT:\n${truncateText(text, MAX_DOCUMENT_CHARS)}`
});

const KnowledgeGraphSchema = z.object({
  entities: z.array(JsonValueSchema),
  relationships: z.array(JsonValueSchema).default([])
});

export const extractGraphTask = defineTask({
  name: 'extract-graph',
  description: 'Build a knowledge graph of concepts, parties, obligations and conditions',
  instruction: `Extract a legal knowledge graph from the following text.
Entities are legal concepts, parties, obligations and conditions or timeframes; give each
a unique id, a name, an entity_type (concept, party, obligation or condition) and its key properties.
Relationships link a source_id to a target_id with a relation_type such as
has_obligation, is_subject_to or must_comply_with.`,
  inputSchema: TextInputSchema,
  shape: objectShapeFromTemplate({ entities: [], relationships: [] }),
  schemaHint: '{"entities": [{"id": string, "name": string, "entity_type": string, "properties": {}}], "relationships": [{"source_id": string, "target_id": string, "relation_type": string}]}',
  render: ({ text }) => truncateText(text, MAX_DOCUMENT_CHARS)
});

export const queryGraphTask = defineTask({
  name: 'query-graph',
  description: 'Answer a question from a previously extracted knowledge graph',
  instruction: `Answer the query using only the legal knowledge graph below.
Give the direct answer, the reasoning based on the graph structure and the entities and
relationships that support it.`,
  inputSchema: z.object({
    query: z.string().trim().min(1, 'query must not be empty'),
    graph: KnowledgeGraphSchema.refine(
      graph => JSON.stringify(graph).length <= MAX_GRAPH_CHARS,
      `graph must serialize to at most ${MAX_GRAPH_CHARS} characters`
    )
  }),
  shape: objectShapeFromTemplate({
    answer: '',
    reasoning: '',
    supporting_evidence: []
  }),
  schemaHint: '{"answer": string, "reasoning": string, "supporting_evidence": [string]}',
  render: ({ query, graph }) => ({ query: truncateText(query, MAX_QUESTION_CHARS), graph })
});

// ============================================================================
// Deadlines & Timelines
// ============================================================================

export const extractTimeframesTask = defineTask({
  name: 'extract-timeframes',
  description: 'List every deadline and time-based obligation in a contract',
  instruction: `Extract every timeframe and time-based obligation from the following contract.
For each, give the obligation or event, the time period or deadline, the triggering event
if there is one and the consequences of meeting or missing it.`,
  inputSchema: TextInputSchema,
  shape: arrayShape(),
  schemaHint: '[{"obligation": string, "period": string, "trigger": string, "consequences": string}]',
  render: ({ text }) => truncateText(text, MAX_DOCUMENT_CHARS)
});

export const criticalDeadlinesTask = defineTask({
  name: 'critical-deadlines',
  description: 'Rank the deadlines whose breach carries serious consequences',
  instruction: `Identify the most critical deadlines in the following contract: only those with
significant legal or business consequences if missed. For each, give the deadline, the clause
it appears in, the consequences of missing it, a risk level and how to monitor compliance.`,
  inputSchema: TextInputSchema,
  shape: arrayShape(),
  schemaHint: '[{"deadline": string, "clause": string, "consequences": string, "risk_level": "high" | "medium" | "low", "monitoring": string}]',
  render: ({ text }) => truncateText(text, MAX_DOCUMENT_CHARS)
});

const StartDateSchema = z.string().trim().date('startDate must be an ISO date (YYYY-MM-DD)');

export const buildTimelineTask = defineTask({
  name: 'build-timeline',
  description: 'Lay extracted timeframes out as dated events from a start date',
  instruction: `Create a timeline from the timeframes below, starting on the given date.
For each event, compute the calendar date, describe the obligation or event, note any
dependencies or conditions and name the responsible party. Sort the events chronologically.`,
  inputSchema: z.object({
    startDate: StartDateSchema,
    timeframes: z.array(JsonValueSchema).min(1, 'timeframes must not be empty')
  }),
  shape: arrayShape(),
  schemaHint: '[{"date": "YYYY-MM-DD", "days_from_start": number, "event": string, "dependencies": [string], "responsible_party": string}]',
  render: ({ startDate, timeframes }) => ({ start_date: startDate, timeframes })
});

/**
 * @throws TaskInputError
 */
export function parseStartDate(value: unknown): string {
  const parsed = z.object({ startDate: StartDateSchema }).safeParse({ startDate: value });
  if (!parsed.success) {
    throw new TaskInputError(buildTimelineTask.name, parsed.error);
  }
  return parsed.data.startDate;
}

// ============================================================================
// Drafting & Research
// ============================================================================

export const draftContractTask = defineTask({
  name: 'draft-contract',
  description: 'Draft a contract from parties and negotiated terms',
  instruction: `Draft a formal legal contract with the details below. Include sections for
definitions, scope, term and termination, payment, confidentiality, intellectual property,
liability and indemnification, and general provisions. Use proper legal language.`,
  inputSchema: z.object({
    contractType: z.string().trim().min(1),
    parties: z.array(z.string().trim().min(1)).min(2, 'a contract needs at least two parties'),
    terms: z.array(z.object({
      type: z.string().trim().min(1),
      details: z.string().trim().min(1)
    })).default([])
  }),
  shape: objectShape({
    requiredKeys: ['title', 'sections'],
    defaultValues: { sections: [], notes: [] }
  }),
  schemaHint: '{"title": string, "sections": [{"heading": string, "text": string}], "notes": [string]}',
  render: ({ contractType, parties, terms }) => [
    `Contract type: ${contractType}`,
    `Parties: ${parties.join(', ')}`,
    'Terms:',
    ...terms.map(term => `- ${term.type}: ${term.details}`)
  ].join('\n')
});

export const precedentSearchTask = defineTask({
  name: 'precedent-search',
  description: 'Suggest precedents relevant to a legal question',
  instruction: `List court decisions relevant to the following legal question.
Only include cases you are confident exist. Mark any citation you are unsure of as unverified.`,
  inputSchema: z.object({
    query: z.string().trim().min(1, 'query must not be empty'),
    jurisdiction: z.string().trim().min(1).optional()
  }),
  shape: arrayShape(),
  schemaHint: '[{"case_name": string, "citation": string, "court": string, "holding": string, "relevance": string, "verified": boolean}]',
  render: ({ query, jurisdiction }) => {
    const question = truncateText(query, MAX_QUESTION_CHARS);
    return jurisdiction ? `${question}\n\nJurisdiction: ${jurisdiction}` : question;
  }
});

export const extractConclusionsTask = defineTask({
  name: 'extract-conclusions',
  description: 'Extract findings, a recommended position and actions from an evaluation',
  instruction: `Based on the following evaluation from a legal deliberation, extract the key
findings, the recommended legal position, the specific actions to take and the legal
principles that should guide them.`,
  inputSchema: z.object({
    evaluation: z.string().trim().min(1, 'evaluation must not be empty')
  }),
  shape: objectShapeFromTemplate({
    key_findings: [],
    recommended_position: '',
    action_items: [],
    guiding_principles: []
  }),
  schemaHint: '{"key_findings": [string], "recommended_position": string, "action_items": [string], "guiding_principles": [string]}',
  render: ({ evaluation }) => truncateText(evaluation, MAX_EVALUATION_CHARS)
});

// ============================================================================
// Registry
// ============================================================================

export const ALL_TASKS: readonly LegalTask[] = [
  identifyIssuesTask,
  analyzeTextTask,
  legalQuestionTask,
  contractRisksTask,
  findWeaknessesTask,
  complianceCheckTask,
  compareDocumentsTask,
  iracAnalysisTask,
  extractGraphTask,
  queryGraphTask,
  extractTimeframesTask,
  criticalDeadlinesTask,
  buildTimelineTask,
  draftContractTask,
  precedentSearchTask,
  extractConclusionsTask
];

const TASKS_BY_NAME = new Map(ALL_TASKS.map(task => [task.name, task]));

/**
 * @throws UnknownTaskError
 */
export function getTask(name: string): LegalTask {
  const task = TASKS_BY_NAME.get(name);
  if (!task) {
    throw new UnknownTaskError(name);
  }
  return task;
}

export function hasTask(name: string): boolean {
  return TASKS_BY_NAME.has(name);
}
