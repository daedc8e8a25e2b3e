#!/usr/bin/env node
/**
 * Legal Assist - CLI Interface
 *
 * Usage:
 *   npx tsx src/cli.ts "Is a verbal agreement to sell land enforceable?"
 *   npx tsx src/cli.ts --task contract-risks --file ./contract.txt
 *   npx tsx src/cli.ts --task compare-documents --input ./versions.json
 *   npx tsx src/cli.ts --review --file ./contract.txt
 *   npx tsx src/cli.ts --timeline 2026-01-01 --file ./contract.txt
 *   npx tsx src/cli.ts --deliberate "Should we terminate for convenience?"
 *   npx tsx src/cli.ts --list-tasks
 *
 * Environment:
 *   OPENROUTER_API_KEY - Required (can be in .env file)
 *   ASSISTANT_MODEL    - Required model identifier
 */

import 'dotenv/config';
import chalk from 'chalk';
import { program } from 'commander';
import * as fs from 'fs';
import { z } from 'zod';

import {
  type ContractReview,
  type ContractTimeline,
  type Deliberation,
  type DocumentComparison,
  LegalAssistant,
  type TaskOutcome
} from './assistant/legal-assistant.js';
import { type AssistantConfig, ConfigurationError, loadAssistantConfig, validateConfig } from './config.js';
import { InvalidArgumentError } from './core/errors.js';
import { createModelClient } from './core/model-client.js';
import { ALL_TASKS, compareDocumentsTask, parseComparisonInput } from './tasks/catalog.js';
import { TaskInputError, UnknownTaskError } from './tasks/definitions.js';
import type { JsonValue, ProgressEvent } from './types.js';
import { formatUsageSummary, UsageTracker } from './usage.js';

const CliOptionsSchema = z.object({
  task: z.string().optional(),
  file: z.string().optional(),
  input: z.string().optional(),
  context: z.string().optional(),
  listTasks: z.boolean().optional(),
  review: z.boolean().optional(),
  timeline: z.string().optional(),
  deliberate: z.boolean().optional(),
  health: z.boolean().optional(),
  json: z.boolean().optional(),
  progress: z.boolean().default(true),
  debug: z.boolean().optional()
});

type CliOptions = z.infer<typeof CliOptionsSchema>;

/** Input field that receives free text, for tasks not taking `text` */
const TEXT_FIELDS: Record<string, string> = {
  'legal-question': 'question',
  'precedent-search': 'query',
  'extract-conclusions': 'evaluation'
};

const DEFAULT_TASK = 'legal-question';

/** Exit code when an answer is the fallback stand-in */
const EXIT_UNAVAILABLE = 2;

/**
 * Validate configuration and show helpful errors
 */
function checkConfiguration(): AssistantConfig {
  const validation = validateConfig();

  for (const warning of validation.warnings) {
    console.log(chalk.yellow(`⚠ ${warning}`));
  }

  if (!validation.valid) {
    console.log(chalk.red('\nConfiguration Error:'));
    for (const error of validation.errors) {
      console.log(chalk.red(`  • ${error}`));
    }
    console.log();
    console.log(chalk.dim('Create a .env file with your configuration:'));
    console.log(chalk.dim('  OPENROUTER_API_KEY=your_key_here'));
    console.log(chalk.dim('  ASSISTANT_MODEL=provider/model-name'));
    process.exit(1);
  }

  try {
    return loadAssistantConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.log(chalk.red(`\nConfiguration Error:\n${error.message}`));
      process.exit(1);
    }
    throw error;
  }
}

function logSection(title: string): void {
  console.log();
  console.log(chalk.cyan('═'.repeat(60)));
  console.log(chalk.bold(`  ${title}`));
  console.log(chalk.cyan('═'.repeat(60)));
}

/**
 * Display progress while tasks run
 */
function createProgressHandler(): (event: ProgressEvent) => void {
  return (event: ProgressEvent) => {
    switch (event.type) {
      case 'start':
        console.log(chalk.blue(`\n▶ ${event.message ?? ''}`));
        break;
      case 'task-start':
        console.log(chalk.dim(`  ◦ ${event.label ?? ''}`));
        break;
      case 'task-complete':
        console.log(chalk.green(`  ✓ ${event.label ?? ''} (${event.message ?? ''})`));
        break;
      case 'task-unavailable':
        console.log(chalk.red(`  ✗ ${event.label ?? ''}: ${event.message ?? ''}`));
        break;
      case 'complete':
        console.log(chalk.green(`✓ ${event.message ?? ''}`));
        break;
    }
  };
}

function printValue(value: JsonValue): void {
  console.log(JSON.stringify(value, null, 2));
}

function printOutcome(title: string, outcome: TaskOutcome): void {
  logSection(title);
  if (!outcome.available) {
    const reason = outcome.errorKind ? ` (${outcome.errorKind})` : '';
    console.log(chalk.yellow(`⚠ Analysis unavailable${reason}, please retry`));
    return;
  }
  console.log(chalk.dim(`Model: ${outcome.model} | ${outcome.source} | ${(outcome.durationMs / 1000).toFixed(1)}s`));
  printValue(outcome.value);
}

function printReview(review: ContractReview): void {
  printOutcome('CONTRACT RISKS', review.risks);
  printOutcome('WEAKNESSES', review.weaknesses);
  printOutcome('ISSUES IDENTIFIED', review.issues);
}

function printComparison(comparison: DocumentComparison): void {
  logSection('SECTION CHANGES');
  if (comparison.changes.length === 0) {
    console.log(chalk.green('No section-level differences'));
    return;
  }
  for (const change of comparison.changes) {
    console.log(`${chalk.magenta(change.changeType.padEnd(9))} ${change.section}`);
  }
  if (comparison.analysis) {
    printOutcome('ANALYSIS', comparison.analysis);
  }
}

function printTimeline(result: ContractTimeline): void {
  printOutcome('TIMEFRAMES', result.timeframes);
  if (result.timeline) {
    printOutcome(`TIMELINE FROM ${result.startDate}`, result.timeline);
  }
}

function printDeliberation(result: Deliberation): void {
  logSection('PANEL POSITIONS');
  for (const position of result.positions) {
    if (!position.available) {
      console.log(chalk.yellow(`${position.role}: unavailable`));
      continue;
    }
    console.log(chalk.magenta(`${position.role}: `) + position.position);
    for (const argument of position.arguments) {
      console.log(chalk.dim(`  + ${typeof argument === 'string' ? argument : JSON.stringify(argument)}`));
    }
    for (const concern of position.concerns) {
      console.log(chalk.dim(`  - ${typeof concern === 'string' ? concern : JSON.stringify(concern)}`));
    }
  }

  if (!result.quorumReached) {
    console.log();
    console.log(chalk.red('✗ No quorum: too few panel positions were available, please retry'));
    return;
  }

  if (result.evaluation) {
    printOutcome('EVALUATION', result.evaluation);
  }
  if (result.conclusions) {
    printOutcome('CONCLUSIONS', result.conclusions);
  }
}

function readTextFile(path: string): string {
  if (!fs.existsSync(path)) {
    console.log(chalk.red(`Error: File not found: ${path}`));
    process.exit(1);
  }
  return fs.readFileSync(path, 'utf-8').trim();
}

function readInputFile(path: string): unknown {
  const raw = readTextFile(path);
  try {
    return JSON.parse(raw);
  } catch (error) {
    console.log(chalk.red(`Error: ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }
}

function listTasks(): void {
  logSection('AVAILABLE TASKS');
  for (const task of ALL_TASKS) {
    console.log(`${chalk.bold(task.name.padEnd(22))} ${chalk.dim(`[${task.outputKind}]`)} ${task.description}`);
  }
}

async function run(textParts: string[], options: CliOptions): Promise<void> {
  if (options.listTasks) {
    listTasks();
    return;
  }

  const text = options.file ? readTextFile(options.file) : textParts.join(' ').trim();
  if (!text && !options.input && !options.health) {
    program.help();
    return;
  }

  const config = checkConfiguration();
  const client = createModelClient(config);

  if (options.health) {
    const health = await client.healthCheck();
    console.log(health.ok ? chalk.green(`✓ ${health.message}`) : chalk.red(`✗ ${health.message}`));
    process.exitCode = health.ok ? 0 : 1;
    return;
  }

  const tracker = new UsageTracker();
  const showProgress = options.progress && !options.json;
  const assistant = new LegalAssistant(client, config, {
    onTelemetry: (event) => {
      tracker.record(event);
      if (options.debug || config.debug) {
        console.log(chalk.dim(`[telemetry] ${event.operation} ${event.source} ${event.durationMs}ms attempts=${event.attempts}${event.errorKind ? ` error=${event.errorKind}` : ''}`));
      }
    },
    onProgress: showProgress ? createProgressHandler() : undefined
  });

  // Ctrl-C cancels in-flight model calls
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());
  const runOptions = { signal: controller.signal };

  if (!options.json) {
    console.log(chalk.cyan(`Legal Assist (model: ${client.modelId})`));
  }

  let available: boolean;

  if (options.review) {
    const review = await assistant.reviewContract(text, runOptions);
    available = review.unavailable.length === 0;
    if (options.json) {
      console.log(JSON.stringify(review, null, 2));
    } else {
      printReview(review);
    }
  } else if (options.timeline) {
    const result = await assistant.buildTimeline(text, options.timeline, runOptions);
    available = result.timeframes.available && result.timeline?.available !== false;
    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      printTimeline(result);
    }
  } else if (options.deliberate) {
    const context = options.context ? readTextFile(options.context) : '';
    const result = await assistant.deliberate(text, context, runOptions);
    available = result.quorumReached && result.conclusions?.available === true;
    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      printDeliberation(result);
    }
  } else {
    const taskName = options.task ?? DEFAULT_TASK;
    const input = options.input
      ? readInputFile(options.input)
      : { [TEXT_FIELDS[taskName] ?? 'text']: text };

    if (taskName === compareDocumentsTask.name) {
      const { original, revised } = parseComparisonInput(input);
      const comparison = await assistant.compareDocuments(original, revised, runOptions);
      available = comparison.analysis?.available !== false;
      if (options.json) {
        console.log(JSON.stringify(comparison, null, 2));
      } else {
        printComparison(comparison);
      }
    } else {
      const outcome = await assistant.runTask(taskName, input, runOptions);
      available = outcome.available;
      if (options.json) {
        console.log(JSON.stringify(outcome, null, 2));
      } else {
        printOutcome(taskName.toUpperCase(), outcome);
      }
    }
  }

  if (!options.json) {
    logSection('USAGE');
    console.log(formatUsageSummary(tracker.getSummary()));
  }

  if (!available) {
    process.exitCode = EXIT_UNAVAILABLE;
  }
}

// CLI setup with commander
program
  .name('legal-assist')
  .description('Structured legal analysis backed by a language model')
  .version('0.3.0')
  .argument('[text...]', 'Question or document text')
  .option('-t, --task <name>', `Task to run (default: ${DEFAULT_TASK})`)
  .option('-f, --file <path>', 'Read the text from a file')
  .option('-i, --input <path>', 'Read the task input from a JSON file')
  .option('-r, --review', 'Full contract review: risks, weaknesses and issues')
  .option('--timeline <date>', 'Date the contract\'s deadlines from a start date (YYYY-MM-DD)')
  .option('-d, --deliberate', 'Panel deliberation on a question')
  .option('-c, --context <path>', 'Background facts for --deliberate')
  .option('-l, --list-tasks', 'List available tasks')
  .option('--health', 'Check that the model endpoint is reachable')
  .option('--json', 'Print results as JSON')
  .option('--no-progress', 'Disable progress output')
  .option('--debug', 'Print telemetry for every model call')
  .action(async (textParts: string[], rawOptions: unknown) => {
    const options = CliOptionsSchema.parse(rawOptions);
    try {
      await run(textParts, options);
    } catch (error) {
      if (error instanceof UnknownTaskError) {
        console.log(chalk.red(`Error: ${error.message}. Run with --list-tasks to see the catalogue.`));
      } else if (error instanceof TaskInputError) {
        console.log(chalk.red(`Invalid input for "${error.task}":`));
        for (const issue of error.issues) {
          console.log(chalk.red(`  • ${issue.path}: ${issue.message}`));
        }
      } else if (error instanceof InvalidArgumentError) {
        console.log(chalk.red(`Error: ${error.message}`));
      } else {
        console.log(chalk.red(`\nError: ${error instanceof Error ? error.message : 'Unknown error'}`));
      }
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
