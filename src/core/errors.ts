/**
 * Custom Error Classes for kql-pilot
 *
 * Provides a consistent error handling pattern across the pipeline.
 * All errors extend KqlPilotError for unified catching and logging.
 */

import type { ChatErrorCode, Domain } from './types.js';

/**
 * Base error class for kql-pilot errors.
 * Includes error code and optional cause for error chaining.
 */
export class KqlPilotError extends Error {
  readonly code: string;
  readonly cause?: Error;

  constructor(message: string, code = 'KQL_PILOT_ERROR', cause?: Error) {
    super(message);
    this.name = 'KqlPilotError';
    this.code = code;
    this.cause = cause;

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get the full error chain message including cause
   */
  getFullMessage(): string {
    let msg = `[${this.code}] ${this.message}`;
    if (this.cause) {
      msg += `\n  Caused by: ${this.cause.message}`;
    }
    return msg;
  }
}

/**
 * Error thrown when a question carries no usable domain signal.
 * Both match sets are kept so callers can explain what was (not) seen.
 */
export class DomainClassificationError extends KqlPilotError {
  readonly question: string;
  readonly matches: Readonly<Record<Domain, readonly string[]>>;

  constructor(question: string, matches: Record<Domain, readonly string[]>) {
    super(
      "Unable to classify domain. Please include explicit domain indicators (e.g. 'pod', 'containerlogv2' or 'request', 'apprequests').",
      'DOMAIN_AMBIGUOUS'
    );
    this.name = 'DomainClassificationError';
    this.question = question;
    this.matches = matches;
  }
}

/**
 * Error thrown when a reference corpus cannot be read.
 */
export class CorpusError extends KqlPilotError {
  readonly filePath?: string;

  constructor(message: string, filePath?: string, cause?: Error) {
    super(message, 'CORPUS_ERROR', cause);
    this.name = 'CorpusError';
    this.filePath = filePath;
  }
}

/**
 * A failure a custom ChatTransport can throw with its chat error code
 * already decided. `classifyTransportError` passes the code through.
 */
export class ChatRequestError extends KqlPilotError {
  readonly errorCode: ChatErrorCode;
  readonly status?: number;

  constructor(message: string, errorCode: ChatErrorCode, status?: number, cause?: Error) {
    super(message, 'CHAT_REQUEST_ERROR', cause);
    this.name = 'ChatRequestError';
    this.errorCode = errorCode;
    this.status = status;
  }
}

/**
 * Error thrown by embedding providers.
 */
export class EmbeddingError extends KqlPilotError {
  readonly provider: string;

  constructor(message: string, provider: string, cause?: Error) {
    super(message, 'EMBEDDING_ERROR', cause);
    this.name = 'EmbeddingError';
    this.provider = provider;
  }
}

/**
 * Error thrown when an embedding provider is rate limited.
 * Includes optional retry-after hint from the API response.
 */
export class RateLimitError extends EmbeddingError {
  readonly retryAfterMs?: number;

  constructor(provider: string, retryAfterMs?: number) {
    super(`Rate limit exceeded for ${provider}`, provider);
    this.name = 'RateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Type guard to check if an error is a KqlPilotError
 */
export function isKqlPilotError(error: unknown): error is KqlPilotError {
  return error instanceof KqlPilotError;
}

/**
 * Wrap an unknown error in a KqlPilotError if it isn't one already
 */
export function wrapError(
  error: unknown,
  defaultMessage: string,
  defaultCode = 'KQL_PILOT_ERROR'
): KqlPilotError {
  if (error instanceof KqlPilotError) {
    return error;
  }

  if (error instanceof Error) {
    return new KqlPilotError(`${defaultMessage}: ${error.message}`, defaultCode, error);
  }

  return new KqlPilotError(`${defaultMessage}: ${String(error)}`, defaultCode);
}
