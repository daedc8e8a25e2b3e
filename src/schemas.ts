/**
 * Zod Schemas for Model Calls
 *
 * Call options are checked before any I/O; the provider's response body is
 * checked before its text is handed to the extractor.
 */

import { z } from 'zod';

// ============================================================================
// Completion Options
// ============================================================================

export const CompletionOptionsSchema = z.object({
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive().optional(),
  maxRetries: z.number().int().min(0).max(10).optional(),
  systemPrompt: z.string().optional()
});

// ============================================================================
// Chat Completions Response (OpenAI-compatible)
// ============================================================================

export const ChatCompletionUsageSchema = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  total_tokens: z.number()
});

export const ChatCompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable().optional()
    })
  })).min(1, 'No choices in response'),
  usage: ChatCompletionUsageSchema.optional()
});

