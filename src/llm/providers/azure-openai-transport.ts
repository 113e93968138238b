/**
 * Azure OpenAI Transport
 *
 * One chat-completions round trip through the openai SDK's AzureOpenAI
 * client, plus the mapping from SDK errors to chat error codes.
 */

import OpenAI, { AzureOpenAI } from 'openai';
import { ChatRequestError } from '../../core/errors.js';
import type { AzureChatSettings } from '../../config/llm-config.js';
import type {
  ChatPayload,
  ChatTransport,
  TransportFailure,
  TransportRequestOptions,
} from '../types.js';

const BODY_SNIPPET_CHARS = 200;

type OpenAIMessage = OpenAI.Chat.ChatCompletionMessageParam;

export class AzureOpenAIChatTransport implements ChatTransport {
  readonly deployment: string;
  private client: AzureOpenAI;

  constructor(settings: AzureChatSettings) {
    this.deployment = settings.deployment;
    this.client = new AzureOpenAI({
      endpoint: settings.endpoint,
      apiKey: settings.apiKey,
      apiVersion: settings.apiVersion,
      deployment: settings.deployment,
      // Retries are owned by the orchestrator
      maxRetries: 0,
    });
  }

  async complete(payload: ChatPayload, options: TransportRequestOptions): Promise<unknown> {
    const messages: OpenAIMessage[] = payload.messages.map((message) =>
      message.role === 'system'
        ? { role: 'system', content: message.content }
        : { role: 'user', content: message.content }
    );

    const response = await this.client.chat.completions.create(
      {
        model: this.deployment,
        messages,
        max_tokens: payload.max_tokens,
        max_completion_tokens: payload.max_completion_tokens,
        temperature: payload.temperature,
        top_p: payload.top_p,
      },
      { timeout: options.timeoutMs, maxRetries: 0 }
    );
    return response;
  }
}

function bodySnippet(error: InstanceType<typeof OpenAI.APIError>): string {
  const body = error.error === undefined ? error.message : JSON.stringify(error.error);
  return body.slice(0, BODY_SNIPPET_CHARS);
}

/**
 * Map anything a transport throws onto a chat error code and backoff kind.
 *
 * - 429 -> rate-limit, exponential backoff
 * - timeout / connection failure -> linear backoff
 * - 401, 404 and other HTTP statuses -> not retried
 */
export function classifyTransportError(error: unknown, deployment: string): TransportFailure {
  if (error instanceof ChatRequestError) {
    const retryable = ['rate-limit', 'timeout', 'connection'].includes(error.errorCode);
    return {
      code: error.errorCode,
      message: error.message,
      status: error.status,
      backoff: !retryable ? null : error.errorCode === 'rate-limit' ? 'exponential' : 'linear',
    };
  }

  // Subclasses first: the timeout error is a connection error is an APIError
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return { code: 'timeout', message: 'Request timed out', backoff: 'linear' };
  }

  if (error instanceof OpenAI.APIConnectionError) {
    return {
      code: 'connection',
      message: `Connection error: ${error.message}`,
      backoff: 'linear',
    };
  }

  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    if (status === 429) {
      return { code: 'rate-limit', message: 'Rate limited (HTTP 429)', status, backoff: 'exponential' };
    }
    if (status === 401) {
      return {
        code: 'authentication',
        message: 'Authentication failed (HTTP 401): check AZURE_OPENAI_KEY',
        status,
        backoff: null,
      };
    }
    if (status === 404) {
      return {
        code: 'deployment-not-found',
        message: `Deployment not found (HTTP 404): ${deployment}`,
        status,
        backoff: null,
      };
    }
    if (status !== undefined) {
      return { code: 'http', message: `HTTP ${status}: ${bodySnippet(error)}`, status, backoff: null };
    }
    return { code: 'unknown', message: error.message, backoff: null };
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || /timed? ?out|ETIMEDOUT/i.test(error.message)) {
      return { code: 'timeout', message: 'Request timed out', backoff: 'linear' };
    }
    if (/ECONNRESET|ECONNREFUSED|ENOTFOUND|EAI_AGAIN|socket hang up/i.test(error.message)) {
      return { code: 'connection', message: `Connection error: ${error.message}`, backoff: 'linear' };
    }
    return { code: 'unknown', message: error.message, backoff: null };
  }

  return { code: 'unknown', message: String(error), backoff: null };
}
