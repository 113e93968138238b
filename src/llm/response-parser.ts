/**
 * Completion Response Parsing
 *
 * Decodes an HTTP 200 body from the chat-completions endpoint into either
 * text content or a classifiable failure. Tolerates string content,
 * list-of-parts content and a couple of alternate response keys.
 */

import { z } from 'zod';
import type { TokenUsage } from '../core/types.js';
import type { CompletionExtraction } from './types.js';

const contentPartSchema = z
  .object({
    type: z.string().nullish(),
    text: z.unknown().optional(),
  })
  .passthrough();

const choiceSchema = z
  .object({
    message: z
      .object({
        content: z.union([z.string(), z.array(contentPartSchema)]).nullish(),
      })
      .passthrough()
      .nullish(),
    text: z.string().nullish(),
    finish_reason: z.string().nullish(),
  })
  .passthrough();

const completionSchema = z
  .object({
    choices: z.array(choiceSchema).nullish(),
    output_text: z.string().nullish(),
    error: z
      .union([
        z.string(),
        z
          .object({
            message: z.string().nullish(),
            code: z.union([z.string(), z.number()]).nullish(),
          })
          .passthrough(),
      ])
      .nullish(),
    usage: z
      .object({
        prompt_tokens: z.number().nullish(),
        completion_tokens: z.number().nullish(),
        total_tokens: z.number().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

type CompletionBody = z.infer<typeof completionSchema>;
type Choice = z.infer<typeof choiceSchema>;

function toUsage(usage: CompletionBody['usage']): TokenUsage | undefined {
  if (!usage) return undefined;
  const promptTokens = usage.prompt_tokens ?? 0;
  const completionTokens = usage.completion_tokens ?? 0;
  return {
    promptTokens,
    completionTokens,
    totalTokens: usage.total_tokens ?? promptTokens + completionTokens,
  };
}

function describeApiError(error: NonNullable<CompletionBody['error']>): string {
  if (typeof error === 'string') return error;
  if (error.message) return error.code ? `${error.message} (code=${error.code})` : error.message;
  return error.code !== undefined && error.code !== null ? `code=${error.code}` : 'unspecified error';
}

/**
 * Pull text out of a choice: string content, then non-empty text parts,
 * then the legacy `text` key.
 */
function contentFromChoice(choice: Choice): string {
  const content = choice.message?.content;

  if (typeof content === 'string' && content.trim()) {
    return content;
  }

  if (Array.isArray(content)) {
    const joined = content
      .map((part) => (typeof part.text === 'string' ? part.text : ''))
      .filter((text) => text.trim().length > 0)
      .join('');
    if (joined) return joined;
  }

  return choice.text?.trim() ? choice.text : '';
}

/**
 * Decode a completion body.
 *
 * Failures (not retried by the chat layer):
 * - an `error` field on the body -> api-error
 * - no choices -> empty-completion
 * - `finish_reason: content_filter` -> content-filtered
 *
 * Empty content is reported as a completion with `content: ''` so the
 * orchestrator can still escalate a length-truncated answer.
 */
export function extractCompletion(raw: unknown): CompletionExtraction {
  const parsed = completionSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      kind: 'failure',
      code: 'empty-completion',
      message: 'Unparseable completion payload',
      finishReason: null,
    };
  }

  const body = parsed.data;
  const usage = toUsage(body.usage);

  if (body.error) {
    return {
      kind: 'failure',
      code: 'api-error',
      message: `API error: ${describeApiError(body.error)}`,
      finishReason: null,
      usage,
    };
  }

  const choice = body.choices?.[0];
  if (!choice) {
    return {
      kind: 'failure',
      code: 'empty-completion',
      message: 'No choices in completion response',
      finishReason: null,
      usage,
    };
  }

  const finishReason = choice.finish_reason ?? null;
  if (finishReason === 'content_filter') {
    return {
      kind: 'failure',
      code: 'content-filtered',
      message: 'Completion blocked by content filter',
      finishReason,
      usage,
    };
  }

  let content = contentFromChoice(choice);
  if (!content && body.output_text?.trim()) {
    content = body.output_text;
  }

  return { kind: 'completion', content, finishReason, usage };
}
