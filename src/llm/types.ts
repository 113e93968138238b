/**
 * LLM Chat Types
 *
 * Wire-level shapes for the chat-completions endpoint and the transport
 * abstraction the orchestrator talks to.
 */

import type { ChatErrorCode, TokenUsage } from '../core/types.js';

/**
 * Message format for chat completions
 */
export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

/**
 * Request body for the chat-completions endpoint.
 * Standard models use `max_tokens` plus sampling knobs; constrained models
 * use `max_completion_tokens` only.
 */
export interface ChatPayload {
  messages: ChatMessage[];
  max_tokens?: number;
  max_completion_tokens?: number;
  temperature?: number;
  top_p?: number;
}

export interface TransportRequestOptions {
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
}

/**
 * A single HTTP round trip to the completion endpoint.
 *
 * Implementations issue exactly one request (no internal retries), resolve
 * with the decoded JSON body on HTTP 200 and reject with the client's error
 * otherwise. Retry policy lives in the orchestrator.
 */
export interface ChatTransport {
  /** Deployment / model identifier, for logs and events */
  readonly deployment: string;
  complete(payload: ChatPayload, options: TransportRequestOptions): Promise<unknown>;
}

/**
 * How a failed request should be retried.
 */
export type BackoffKind = 'exponential' | 'linear';

export interface TransportFailure {
  code: ChatErrorCode;
  message: string;
  status?: number;
  /** null means the failure is not retryable */
  backoff: BackoffKind | null;
}

/**
 * Decoded HTTP 200 response.
 */
export type CompletionExtraction =
  | {
      kind: 'completion';
      /** Text content, '' when the model produced none */
      content: string;
      finishReason: string | null;
      usage?: TokenUsage;
    }
  | {
      kind: 'failure';
      code: Extract<ChatErrorCode, 'api-error' | 'empty-completion' | 'content-filtered'>;
      message: string;
      finishReason: string | null;
      usage?: TokenUsage;
    };
