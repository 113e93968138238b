/**
 * Chat Request Shaping
 *
 * Builds a model-family-appropriate request body.
 */

import type { ChatRequest } from '../core/types.js';
import type { ChatMessage, ChatPayload } from './types.js';

/**
 * Convert a ChatRequest into the JSON body for chat-completions.
 *
 * - constrained: system and user text merged into one user message,
 *   `max_completion_tokens`, no temperature / top_p.
 * - standard: separate system and user messages, `max_tokens`, and the
 *   sampling knobs when set.
 */
export function buildChatPayload(request: ChatRequest): ChatPayload {
  if (request.modelFamily === 'constrained') {
    const combined = [request.systemPrompt, request.userPrompt]
      .filter((part) => part.length > 0)
      .join('\n\n');
    return {
      messages: [{ role: 'user', content: combined }],
      max_completion_tokens: request.maxOutputTokens,
    };
  }

  const messages: ChatMessage[] = [];
  if (request.systemPrompt) {
    messages.push({ role: 'system', content: request.systemPrompt });
  }
  messages.push({ role: 'user', content: request.userPrompt });

  const payload: ChatPayload = {
    messages,
    max_tokens: request.maxOutputTokens,
  };
  if (request.temperature !== null) {
    payload.temperature = request.temperature;
  }
  if (request.topP !== null) {
    payload.top_p = request.topP;
  }
  return payload;
}
