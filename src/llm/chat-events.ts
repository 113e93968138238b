/**
 * Chat Event Log
 *
 * Optional append-only JSONL record of every chat call. Content is stored
 * as a short hash plus a preview unless full content is explicitly allowed.
 * Writes are serialized so lines never interleave.
 */

import { createHash } from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { DEFAULTS } from '../config/defaults.js';
import type { PipelineConfig } from '../config/pipeline-config.js';
import { createLogger } from '../core/logger.js';
import type {
  ChatErrorCode,
  ChatResult,
  CompressionStage,
  Domain,
  ModelFamily,
  TokenUsage,
} from '../core/types.js';

const log = createLogger('chat-events');

export interface ChatEvent {
  timestamp: string;
  purpose: string;
  deployment: string;
  modelFamily: ModelFamily;
  domain?: Domain;
  pipelineAttempt?: number;
  slim?: boolean;
  compressionStage?: CompressionStage;
  promptHash?: string;
  attempts: number;
  escalated: boolean;
  finishReason: string | null;
  errorCode: ChatErrorCode | null;
  error: string | null;
  maxTokens: { initial: number; final: number };
  temperature: { initial: number | null; final: number | null };
  durationMs: number;
  usage?: TokenUsage;
  contentHash: string | null;
  contentPreview: string | null;
  content?: string;
}

export interface ChatEventContext {
  domain?: Domain;
  /** One-based pipeline attempt index */
  pipelineAttempt?: number;
  slim?: boolean;
  compressionStage?: CompressionStage;
  /** hashContent() of system + user prompt */
  promptHash?: string;
}

export interface ChatEventLoggerOptions {
  enabled: boolean;
  filePath: string;
  /** Store the whole completion text, not just hash and preview */
  includeFullContent?: boolean;
  previewChars?: number;
  now?: () => Date;
}

/**
 * First 16 hex chars of the sha256 of the content.
 */
export function hashContent(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}

export function buildChatEvent(
  result: ChatResult,
  context: ChatEventContext,
  options: Pick<ChatEventLoggerOptions, 'includeFullContent' | 'previewChars'> & { timestamp: Date }
): ChatEvent {
  const previewChars = options.previewChars ?? DEFAULTS.EVENT_PREVIEW_CHARS;
  const { metadata } = result;

  const event: ChatEvent = {
    timestamp: options.timestamp.toISOString(),
    purpose: metadata.purpose,
    deployment: metadata.deployment,
    modelFamily: metadata.modelFamily,
    ...context,
    attempts: result.attempts,
    escalated: result.escalated,
    finishReason: result.finishReason,
    errorCode: result.errorCode,
    error: result.error,
    maxTokens: { initial: metadata.initialMaxTokens, final: metadata.finalMaxTokens },
    temperature: { initial: metadata.initialTemperature, final: metadata.finalTemperature },
    durationMs: metadata.durationMs,
    contentHash: result.content === null ? null : hashContent(result.content),
    contentPreview: result.content === null ? null : result.content.slice(0, previewChars),
  };
  if (metadata.usage) {
    event.usage = metadata.usage;
  }
  if (options.includeFullContent && result.content !== null) {
    event.content = result.content;
  }
  return event;
}

export class ChatEventLogger {
  private pending: Promise<void> = Promise.resolve();

  constructor(private readonly options: ChatEventLoggerOptions) {}

  static fromConfig(config: PipelineConfig): ChatEventLogger {
    return new ChatEventLogger({
      enabled: config.chatEventLog,
      filePath: path.resolve(config.chatEventLogPath),
      includeFullContent: config.chatEventFullContent,
    });
  }

  get enabled(): boolean {
    return this.options.enabled;
  }

  /**
   * Queue one event line. Resolves once it is written; write failures are
   * logged, never rethrown.
   */
  record(result: ChatResult, context: ChatEventContext = {}): Promise<void> {
    if (!this.options.enabled) {
      return Promise.resolve();
    }

    const event = buildChatEvent(result, context, {
      includeFullContent: this.options.includeFullContent,
      previewChars: this.options.previewChars,
      timestamp: (this.options.now ?? (() => new Date()))(),
    });
    const line = `${JSON.stringify(event)}\n`;

    this.pending = this.pending.then(() => this.write(line));
    return this.pending;
  }

  /** Wait for queued writes */
  flush(): Promise<void> {
    return this.pending;
  }

  private async write(line: string): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(this.options.filePath), { recursive: true });
      await fs.promises.appendFile(this.options.filePath, line, 'utf-8');
    } catch (error) {
      log.warn({ err: error, filePath: this.options.filePath }, 'Failed to write chat event');
    }
  }
}
