/**
 * Chat Orchestrator
 *
 * Sends one chat request through a transport with bounded retries, then
 * optionally reissues a length-truncated answer with a larger output budget
 * (and a slightly higher temperature). Every outcome, including failures,
 * comes back as a ChatResult; nothing is thrown.
 */

import { DEFAULTS } from '../config/defaults.js';
import type { PipelineConfig } from '../config/pipeline-config.js';
import {
  exponentialDelay,
  linearDelay,
  sleep,
  type Deadline,
  type NowFn,
  type SleepFn,
} from '../core/concurrency.js';
import { createLogger } from '../core/logger.js';
import type { ChatErrorCode, ChatRequest, ChatResult, ModelFamily, TokenUsage } from '../core/types.js';
import { classifyTransportError } from './providers/azure-openai-transport.js';
import { buildChatPayload } from './request-builder.js';
import { extractCompletion } from './response-parser.js';
import type { ChatTransport, CompletionExtraction } from './types.js';

const log = createLogger('chat-orchestrator');

export interface ChatOrchestratorOptions {
  transport: ChatTransport;
  modelFamily: ModelFamily;
  maxOutputTokens: number;
  maxOutputTokensCeiling: number;
  temperature: number;
  topP: number;
  temperatureIncrement: number;
  temperatureMax: number;
  /** Raise temperature alongside the token budget on escalation */
  adaptTemperature: boolean;
  allowEscalation: boolean;
  /** Attempts per request, first try included */
  maxRetries: number;
  retryBaseDelayMs: number;
  requestTimeoutMs: number;
  sleep?: SleepFn;
  now?: NowFn;
}

export interface ChatRunOptions {
  /** Label carried into metadata and logs (e.g. 'translate') */
  purpose?: string;
  /** Per-call override of the configured escalation switch */
  allowEscalation?: boolean;
  deadline?: Deadline;
}

type AttemptFailure = {
  kind: 'failure';
  code: ChatErrorCode;
  message: string;
  finishReason: string | null;
  usage?: TokenUsage;
};

type AttemptOutcome = CompletionExtraction | AttemptFailure;

interface SendResult {
  attempts: number;
  outcome: AttemptOutcome;
}

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Next output-token budget after a length truncation:
 * `min(ceiling, max(ceil(current * factor), current + minStep))`.
 * Returns `current` unchanged once the ceiling is reached.
 */
export function maybeEscalateTokens(
  current: number,
  ceiling: number,
  factor: number = DEFAULTS.ESCALATION_TOKEN_FACTOR,
  minStep: number = DEFAULTS.ESCALATION_MIN_TOKEN_STEP
): number {
  if (current >= ceiling) {
    return current;
  }
  return Math.min(ceiling, Math.max(Math.ceil(current * factor), current + minStep));
}

/**
 * Next temperature on escalation, rounded to two decimals and capped.
 * Null (sampling disabled) stays null.
 */
export function maybeEscalateTemperature(
  current: number | null,
  increment: number,
  max: number
): number | null {
  if (current === null || current >= max) {
    return current;
  }
  return Math.min(max, roundTo2(current + increment));
}

export class ChatOrchestrator {
  private readonly transport: ChatTransport;
  private readonly sleep: SleepFn;
  private readonly now: NowFn;

  constructor(private readonly options: ChatOrchestratorOptions) {
    this.transport = options.transport;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Build an orchestrator from pipeline settings.
   */
  static fromConfig(
    config: PipelineConfig,
    transport: ChatTransport,
    modelFamily: ModelFamily,
    overrides: Pick<ChatOrchestratorOptions, 'sleep' | 'now'> = {}
  ): ChatOrchestrator {
    return new ChatOrchestrator({
      transport,
      modelFamily,
      maxOutputTokens: config.maxOutputTokens,
      maxOutputTokensCeiling: config.maxOutputTokensCeiling,
      temperature: config.temperature,
      topP: config.topP,
      temperatureIncrement: config.temperatureIncrement,
      temperatureMax: config.temperatureMax,
      adaptTemperature: config.adaptTemperature,
      allowEscalation: config.allowEscalation,
      maxRetries: config.chatMaxRetries,
      retryBaseDelayMs: config.retryBaseDelayMs,
      requestTimeoutMs: config.requestTimeoutMs,
      ...overrides,
    });
  }

  get deployment(): string {
    return this.transport.deployment;
  }

  get modelFamily(): ModelFamily {
    return this.options.modelFamily;
  }

  /**
   * Request with the configured budget. Constrained models carry no
   * sampling parameters.
   */
  createRequest(systemPrompt: string, userPrompt: string): ChatRequest {
    const constrained = this.options.modelFamily === 'constrained';
    return {
      systemPrompt,
      userPrompt,
      modelFamily: this.options.modelFamily,
      maxOutputTokens: this.options.maxOutputTokens,
      temperature: constrained ? null : this.options.temperature,
      topP: constrained ? null : this.options.topP,
    };
  }

  async run(request: ChatRequest, runOptions: ChatRunOptions = {}): Promise<ChatResult> {
    const started = this.now();
    const purpose = runOptions.purpose ?? 'translate';
    const allowEscalation = runOptions.allowEscalation ?? this.options.allowEscalation;
    const { deadline } = runOptions;

    const primary = await this.sendWithRetry(request, deadline);
    let outcome = primary.outcome;
    let finalRequest = request;
    let escalated = false;
    let escalationAttempts = 0;
    let escalationError: string | undefined;

    if (outcome.kind === 'completion' && outcome.finishReason === 'length' && allowEscalation) {
      const nextTokens = maybeEscalateTokens(
        request.maxOutputTokens,
        this.options.maxOutputTokensCeiling
      );

      if (nextTokens > request.maxOutputTokens) {
        const nextTemperature = this.options.adaptTemperature
          ? maybeEscalateTemperature(
              request.temperature,
              this.options.temperatureIncrement,
              this.options.temperatureMax
            )
          : request.temperature;

        finalRequest = { ...request, maxOutputTokens: nextTokens, temperature: nextTemperature };
        escalated = true;

        log.info(
          {
            purpose,
            fromTokens: request.maxOutputTokens,
            toTokens: nextTokens,
            fromTemperature: request.temperature,
            toTemperature: nextTemperature,
          },
          'Completion truncated, escalating output budget'
        );

        const second = await this.sendWithRetry(finalRequest, deadline);
        escalationAttempts = second.attempts;
        if (second.outcome.kind === 'completion') {
          outcome = second.outcome;
        } else {
          // Keep the truncated answer from the first pass
          escalationError = second.outcome.message;
          log.warn({ purpose, error: escalationError }, 'Escalated request failed');
        }
      } else {
        log.debug({ purpose, maxTokens: request.maxOutputTokens }, 'Token ceiling reached, not escalating');
      }
    }

    let content: string | null = null;
    let error: string | null = null;
    let errorCode: ChatErrorCode | null = null;

    if (outcome.kind === 'failure') {
      error = outcome.message;
      errorCode = outcome.code;
    } else if (!outcome.content.trim()) {
      error = `Empty completion (finish_reason=${outcome.finishReason ?? 'none'})`;
      errorCode = 'empty-completion';
    } else {
      content = outcome.content;
    }

    const result: ChatResult = {
      content,
      finishReason: outcome.finishReason,
      error,
      errorCode,
      attempts: primary.attempts,
      escalated,
      metadata: {
        purpose,
        deployment: this.transport.deployment,
        modelFamily: request.modelFamily,
        initialMaxTokens: request.maxOutputTokens,
        finalMaxTokens: finalRequest.maxOutputTokens,
        initialTemperature: request.temperature,
        finalTemperature: finalRequest.temperature,
        errorCode,
        escalationAttempts,
        ...(escalationError !== undefined && { escalationError }),
        ...(outcome.usage && { usage: outcome.usage }),
        durationMs: this.now() - started,
      },
    };

    if (errorCode) {
      log.warn({ purpose, errorCode, attempts: result.attempts }, error ?? 'Chat request failed');
    } else {
      log.debug(
        { purpose, attempts: result.attempts, escalated, finishReason: result.finishReason },
        'Completion received'
      );
    }

    return result;
  }

  /**
   * Issue the request, retrying rate limits (exponential backoff) and
   * timeouts / connection failures (linear backoff). A completed HTTP 200,
   * whatever its body, ends the loop.
   */
  private async sendWithRetry(request: ChatRequest, deadline?: Deadline): Promise<SendResult> {
    const payload = buildChatPayload(request);
    const maxAttempts = Math.max(1, this.options.maxRetries);
    const baseDelay = this.options.retryBaseDelayMs;
    let attempts = 0;
    let lastFailure: AttemptFailure | undefined;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      if (deadline?.expired()) {
        return { attempts, outcome: this.deadlineFailure(lastFailure) };
      }

      attempts++;
      const timeoutMs = deadline
        ? deadline.clip(this.options.requestTimeoutMs)
        : this.options.requestTimeoutMs;

      try {
        const raw = await this.transport.complete(payload, { timeoutMs });
        return { attempts, outcome: extractCompletion(raw) };
      } catch (error) {
        const failure = classifyTransportError(error, this.transport.deployment);
        lastFailure = { kind: 'failure', code: failure.code, message: failure.message, finishReason: null };

        if (!failure.backoff) {
          return { attempts, outcome: lastFailure };
        }

        if (attempt === maxAttempts - 1) {
          return {
            attempts,
            outcome: { ...lastFailure, message: `${failure.message} after ${attempts} attempts` },
          };
        }

        const delay =
          failure.backoff === 'exponential'
            ? exponentialDelay(baseDelay, attempt)
            : linearDelay(baseDelay, attempt);

        if (deadline && deadline.remaining() <= delay) {
          return { attempts, outcome: this.deadlineFailure(lastFailure) };
        }

        log.warn(
          { code: failure.code, attempt: attempts, delayMs: delay },
          'Chat request failed, retrying'
        );
        await this.sleep(delay);
      }
    }

    return { attempts, outcome: this.deadlineFailure(lastFailure) };
  }

  private deadlineFailure(last: AttemptFailure | undefined): AttemptFailure {
    return {
      kind: 'failure',
      code: 'deadline-exceeded',
      message: last
        ? `Translation deadline exceeded (last error: ${last.message})`
        : 'Translation deadline exceeded',
      finishReason: null,
    };
  }
}
