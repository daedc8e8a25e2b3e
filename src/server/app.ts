import { Hono } from 'hono';
import type { Context, Next } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { z } from 'zod';
import { LegalAssistant, type TaskOutcome } from '../assistant/legal-assistant.js';
import { InvalidArgumentError } from '../core/errors.js';
import { compareDocumentsTask, parseComparisonInput } from '../tasks/catalog.js';
import { TaskInputError, UnknownTaskError } from '../tasks/definitions.js';

export interface AppOptions {
  /** Bearer token required on every route except /health */
  apiToken?: string;

  /** Request logging, off in tests */
  logRequests?: boolean;
}

const ReviewBodySchema = z.object({
  text: z.string().trim().min(1, 'text must not be empty')
});

const TimelineBodySchema = z.object({
  text: z.string(),
  startDate: z.string()
});

const DeliberateBodySchema = z.object({
  question: z.string().trim().min(1, 'question must not be empty'),
  context: z.string().default('')
});

const UNAVAILABLE_MESSAGE = 'Analysis unavailable, please retry';

function unavailableBody(outcome: TaskOutcome) {
  return {
    error: 'analysis_unavailable',
    message: UNAVAILABLE_MESSAGE,
    task: outcome.task,
    source: outcome.source,
    reason: outcome.errorKind ?? 'unparseable-output'
  };
}

function issuesOf(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map(issue => ({
    path: issue.path.join('.') || '(root)',
    message: issue.message
  }));
}

/**
 * Read a JSON body; `undefined` when the body is missing or not JSON.
 */
async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch {
    return undefined;
  }
}

export function createApp(assistant: LegalAssistant, options: AppOptions = {}): Hono {
  const app = new Hono();

  app.use('*', cors());
  if (options.logRequests) {
    app.use('*', logger());
  }

  /**
   * Authentication middleware
   * Requires Bearer token matching the configured API token
   */
  app.use('*', async (c: Context, next: Next) => {
    if (!options.apiToken || c.req.path === '/health') {
      return next();
    }

    const authHeader = c.req.header('Authorization');
    if (!authHeader) {
      return c.json({ error: 'Missing Authorization header' }, 401);
    }

    const [scheme, token] = authHeader.split(' ');
    if (scheme !== 'Bearer' || !token) {
      return c.json({ error: 'Invalid Authorization format. Use: Bearer <token>' }, 401);
    }

    if (token !== options.apiToken) {
      return c.json({ error: 'Invalid token' }, 401);
    }

    return next();
  });

  app.get('/health', (c) => {
    return c.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/tasks', (c) => {
    return c.json({ tasks: assistant.listTasks() });
  });

  /**
   * RUN TASK
   * Payload: the task's input object
   */
  app.post('/tasks/:name', async (c) => {
    const name = c.req.param('name');
    const body = await readJson(c);
    const signal = c.req.raw.signal;

    // Unchanged documents never reach the model
    if (name === compareDocumentsTask.name) {
      const { original, revised } = parseComparisonInput(body);
      const comparison = await assistant.compareDocuments(original, revised, { signal });
      if (comparison.analysis && !comparison.analysis.available) {
        return c.json(unavailableBody(comparison.analysis), 503);
      }
      return c.json({
        task: name,
        source: comparison.analysis?.source ?? null,
        changes: comparison.changes,
        result: comparison.analysis?.value ?? null
      });
    }

    const outcome = await assistant.runTask(name, body, { signal });
    if (!outcome.available) {
      return c.json(unavailableBody(outcome), 503);
    }
    return c.json({ task: outcome.task, source: outcome.source, result: outcome.value });
  });

  /**
   * CONTRACT REVIEW
   * Payload: { text: string }
   */
  app.post('/review', async (c) => {
    const parsed = ReviewBodySchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return c.json({ error: 'invalid_input', issues: issuesOf(parsed.error) }, 400);
    }

    const review = await assistant.reviewContract(parsed.data.text, { signal: c.req.raw.signal });
    if (review.unavailable.length === 3) {
      return c.json(unavailableBody(review.risks), 503);
    }

    return c.json({
      risks: review.risks.available ? review.risks.value : null,
      weaknesses: review.weaknesses.available ? review.weaknesses.value : null,
      issues: review.issues.available ? review.issues.value : null,
      unavailable: review.unavailable
    });
  });

  /**
   * CONTRACT TIMELINE
   * Payload: { text: string, startDate: "YYYY-MM-DD" }
   */
  app.post('/timeline', async (c) => {
    const parsed = TimelineBodySchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return c.json({ error: 'invalid_input', issues: issuesOf(parsed.error) }, 400);
    }

    const result = await assistant.buildTimeline(parsed.data.text, parsed.data.startDate, { signal: c.req.raw.signal });
    if (!result.timeframes.available) {
      return c.json(unavailableBody(result.timeframes), 503);
    }
    if (result.timeline && !result.timeline.available) {
      return c.json(unavailableBody(result.timeline), 503);
    }

    return c.json({
      startDate: result.startDate,
      timeframes: result.timeframes.value,
      timeline: result.timeline?.value ?? []
    });
  });

  /**
   * PANEL DELIBERATION
   * Payload: { question: string, context?: string }
   */
  app.post('/deliberate', async (c) => {
    const parsed = DeliberateBodySchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return c.json({ error: 'invalid_input', issues: issuesOf(parsed.error) }, 400);
    }

    const result = await assistant.deliberate(
      parsed.data.question,
      parsed.data.context,
      { signal: c.req.raw.signal }
    );

    if (!result.quorumReached) {
      return c.json({
        error: 'analysis_unavailable',
        message: UNAVAILABLE_MESSAGE,
        reason: 'no-quorum',
        positions: result.positions
      }, 503);
    }

    return c.json({
      question: result.question,
      positions: result.positions,
      evaluation: result.evaluation?.available ? result.evaluation.value : null,
      conclusions: result.conclusions?.available ? result.conclusions.value : null,
      durationMs: result.durationMs
    });
  });

  app.onError((error, c) => {
    if (error instanceof UnknownTaskError) {
      return c.json({ error: 'unknown_task', message: error.message }, 404);
    }
    if (error instanceof TaskInputError) {
      return c.json({ error: 'invalid_input', message: error.message, issues: error.issues }, 400);
    }
    if (error instanceof InvalidArgumentError) {
      return c.json({ error: 'invalid_input', message: error.message }, 400);
    }
    console.error('Request failed:', error);
    return c.json({ error: 'internal_error', message: 'Internal server error' }, 500);
  });

  return app;
}
