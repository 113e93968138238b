/**
 * KQL Translator Service
 *
 * Translates a natural-language question into a KQL query.
 *
 * Pipeline (per question):
 *   1. Shortcuts: table listing / schema questions answered directly.
 *   2. Domain classification: no signal means no model call.
 *   3. Example selection: hybrid heuristic + embedding relevance. The
 *      translation deadline starts here and also bounds embedding.
 *   4. Attempts: assemble prompt -> chat orchestrator -> validate. Every
 *      attempt after the first uses the slim prompt. Authentication,
 *      missing deployment and an expired deadline end the loop early.
 *   5. Example fallback: reuse the closest example's query when it
 *      overlaps the question enough.
 *
 * Failures are returned as a tagged TranslationResult; `translate()`
 * renders them as a `// Error: ...` string for callers that want text.
 */

import { detectModelFamily, describeChatSettings, resolveAzureChatSettings } from '../config/llm-config.js';
import { loadConfig, type PipelineConfig } from '../config/pipeline-config.js';
import { Deadline, type NowFn, type SleepFn } from '../core/concurrency.js';
import { CorpusError, DomainClassificationError, wrapError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import type {
  Domain,
  DomainCorpus,
  Example,
  ScoredExample,
  TranslationErrorKind,
  TranslationResult,
} from '../core/types.js';
import { ChatEventLogger, hashContent } from '../llm/chat-events.js';
import { ChatOrchestrator } from '../llm/chat-orchestrator.js';
import { AzureOpenAIChatTransport } from '../llm/providers/azure-openai-transport.js';
import type { ChatTransport } from '../llm/types.js';
import { CorpusLoader } from './corpus/corpus-loader.js';
import { EmbeddingCapability, createEmbeddingProvider } from './embeddings/embedding-service.js';
import type { EmbeddingProvider } from './embeddings/types.js';
import { classifyDomain } from './kql/domain-classifier.js';
import { tokenOverlapScore } from './kql/lexical-scoring.js';
import { assemblePrompt } from './kql/prompt-assembler.js';
import { selectRelevantExamples } from './kql/relevance-selector.js';
import { validateCompletion } from './kql/response-validator.js';
import { matchShortcut } from './kql/shortcuts.js';
import type { TokenCounter } from './kql/token-counter.js';

const log = createLogger('kql-translator');

export const ERROR_SENTINEL = '// Error:';

/** Chat errors no prompt change can fix */
const TERMINAL_ERRORS: ReadonlySet<TranslationErrorKind> = new Set([
  'authentication',
  'deployment-not-found',
  'deadline-exceeded',
]);

interface AttemptError {
  kind: TranslationErrorKind;
  message: string;
}

export interface KqlTranslatorDeps {
  config: PipelineConfig;
  /** null when no chat endpoint is configured */
  orchestrator: ChatOrchestrator | null;
  corpus: CorpusLoader;
  embeddings: EmbeddingCapability;
  events?: ChatEventLogger;
  tokenCounter?: TokenCounter;
  now?: NowFn;
}

/**
 * Pick the selected example whose question overlaps the user's question
 * most (earlier wins ties). Null when it does not reach minOverlap.
 */
export function findFallbackExample(
  question: string,
  candidates: readonly ScoredExample[],
  minOverlap: number
): Example | null {
  let best: Example | null = null;
  let bestScore = -1;
  for (const candidate of candidates) {
    const score = tokenOverlapScore(question, candidate.example.question);
    if (score > bestScore) {
      best = candidate.example;
      bestScore = score;
    }
  }
  return best && bestScore >= minOverlap ? best : null;
}

function quoteForComment(text: string): string {
  return text.replace(/\s+/g, ' ').replace(/'/g, "\\'");
}

/**
 * Render a result as text: the query (with its annotation line, if any),
 * or a `// Error: ...` string.
 */
export function renderTranslation(result: TranslationResult): string {
  if (result.ok) {
    return result.annotation ? `${result.annotation}\n${result.query}` : result.query;
  }

  const { error } = result;
  if (error.attempts === 0) {
    return `${ERROR_SENTINEL} ${error.message}`;
  }
  return `${ERROR_SENTINEL} Could not translate question to KQL after ${error.attempts} attempts: ${error.question}\n${error.message}`;
}

export class KqlTranslator {
  private readonly config: PipelineConfig;
  private readonly orchestrator: ChatOrchestrator | null;
  private readonly corpus: CorpusLoader;
  private readonly embeddings: EmbeddingCapability;
  private readonly events?: ChatEventLogger;
  private readonly tokenCounter?: TokenCounter;
  private readonly now: NowFn;

  constructor(deps: KqlTranslatorDeps) {
    this.config = deps.config;
    this.orchestrator = deps.orchestrator;
    this.corpus = deps.corpus;
    this.embeddings = deps.embeddings;
    this.events = deps.events;
    this.tokenCounter = deps.tokenCounter;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Translate and render as text.
   */
  async translate(question: string): Promise<string> {
    return renderTranslation(await this.translateToResult(question));
  }

  /**
   * Translate to a tagged result. Never throws.
   */
  async translateToResult(question: string): Promise<TranslationResult> {
    try {
      return await this.run(question);
    } catch (error) {
      const wrapped = wrapError(error, 'Translation failed');
      log.error({ err: wrapped }, 'Unexpected translation failure');
      return {
        ok: false,
        error: {
          kind: error instanceof CorpusError ? 'configuration' : 'unknown',
          message: wrapped.message,
          question,
          attempts: 0,
        },
      };
    }
  }

  private async run(question: string): Promise<TranslationResult> {
    const shortcut = matchShortcut(question);
    if (shortcut) {
      log.debug({ shortcut: shortcut.name }, 'Answered by shortcut');
      return { ok: true, query: shortcut.query, provenance: 'shortcut', attempts: 0 };
    }

    let domain: Domain;
    try {
      domain = classifyDomain(question).domain;
    } catch (error) {
      if (error instanceof DomainClassificationError) {
        return {
          ok: false,
          error: { kind: 'domain-ambiguous', message: error.message, question, attempts: 0 },
        };
      }
      throw error;
    }

    const deadline = new Deadline(this.config.translationDeadlineMs, this.now);
    const corpus = await this.corpus.load(domain);
    const selection = await selectRelevantExamples(question, corpus.examples, {
      embeddings: this.embeddings,
      embeddingBudgetMs: deadline.clip(this.config.embeddingTimeoutMs),
    });

    const { attempts, lastError, success } = await this.attempt(
      question,
      domain,
      corpus,
      selection.selected,
      deadline
    );
    if (success) {
      return success;
    }

    const fallback = findFallbackExample(question, selection.selected, this.config.fallbackMinOverlap);
    if (fallback) {
      log.info({ domain, reusedQuestion: fallback.question, lastError: lastError.kind }, 'Using example fallback');
      return {
        ok: true,
        query: fallback.query,
        provenance: 'example-fallback',
        domain,
        attempts,
        annotation: `// meta: domain=${domain} fallback=example reused_question='${quoteForComment(fallback.question)}'`,
      };
    }

    return {
      ok: false,
      error: { kind: lastError.kind, message: lastError.message, question, domain, attempts },
    };
  }

  private async attempt(
    question: string,
    domain: Domain,
    corpus: DomainCorpus,
    selected: readonly ScoredExample[],
    deadline: Deadline
  ): Promise<{ attempts: number; lastError: AttemptError; success?: TranslationResult }> {
    if (!this.orchestrator) {
      return {
        attempts: 0,
        lastError: {
          kind: 'configuration',
          message: 'Azure OpenAI endpoint or key not configured (AZURE_OPENAI_ENDPOINT, AZURE_OPENAI_KEY)',
        },
      };
    }

    const examples = selected.map((entry) => entry.example);
    let lastError: AttemptError = { kind: 'unknown', message: 'No attempt was made' };
    let attempts = 0;

    for (let attempt = 0; attempt < this.config.pipelineMaxAttempts; attempt++) {
      if (deadline.expired()) {
        lastError = { kind: 'deadline-exceeded', message: `Translation deadline exceeded (last error: ${lastError.message})` };
        break;
      }

      attempts++;
      const slim = attempt > 0;
      const prompt = assemblePrompt({
        question,
        domain,
        examples,
        corpus,
        tokenLimit: this.config.promptTokenLimit,
        slim,
        counter: this.tokenCounter,
      });

      const request = this.orchestrator.createRequest(prompt.systemPrompt, prompt.userPrompt);
      const result = await this.orchestrator.run(request, { purpose: 'translate', deadline });

      await this.events?.record(result, {
        domain,
        pipelineAttempt: attempts,
        slim,
        compressionStage: prompt.compressionStage,
        promptHash: hashContent(`${prompt.systemPrompt}\n${prompt.userPrompt}`),
      });

      if (result.errorCode) {
        lastError = { kind: result.errorCode, message: result.error ?? result.errorCode };
        log.warn({ attempt: attempts, slim, kind: lastError.kind }, 'Translation attempt failed');
        if (TERMINAL_ERRORS.has(result.errorCode)) {
          break;
        }
        continue;
      }

      const validation = validateCompletion(result.content);
      if (!validation.valid) {
        lastError = {
          kind: 'invalid-response',
          message: `${validation.message} [domain=${domain} examples=${prompt.selectedExamples.length} slim=${slim}]`,
        };
        log.warn({ attempt: attempts, slim, reason: validation.reason }, 'Completion rejected');
        continue;
      }

      if (attempt > 0) {
        log.info({ attempt: attempts, slim }, 'Translation succeeded on retry');
      }

      return {
        attempts,
        lastError,
        success: {
          ok: true,
          query: validation.query,
          provenance: 'model',
          domain,
          attempts,
          ...(this.config.annotateResults && {
            annotation: `// meta: domain=${domain} slim=${slim} examples=${prompt.selectedExamples.length} stage=${prompt.compressionStage} tokens=${prompt.tokenCount}`,
          }),
        },
      };
    }

    return { attempts, lastError };
  }
}

export interface CreateKqlTranslatorOptions {
  config?: PipelineConfig;
  /** Replaces the Azure OpenAI transport */
  transport?: ChatTransport;
  /** Replaces the configured embedding provider; null disables embeddings */
  embeddingProvider?: EmbeddingProvider | null;
  tokenCounter?: TokenCounter;
  sleep?: SleepFn;
  now?: NowFn;
}

/**
 * Single creation point wiring configuration, transport, orchestrator,
 * corpus, embeddings and the event log.
 */
export function createKqlTranslator(options: CreateKqlTranslatorOptions = {}): KqlTranslator {
  const config = options.config ?? loadConfig();
  const settings = resolveAzureChatSettings(config);

  let transport: ChatTransport | null = options.transport ?? null;
  if (!transport && settings) {
    transport = new AzureOpenAIChatTransport(settings);
  }

  if (settings) {
    log.info({ settings: describeChatSettings(settings) }, 'Chat endpoint configured');
  } else if (!transport) {
    log.warn('Azure OpenAI endpoint or key missing, only shortcuts and example fallback are available');
  }

  const modelFamily = settings?.modelFamily ?? config.modelFamily ?? detectModelFamily(config.deployment);
  const orchestrator = transport
    ? ChatOrchestrator.fromConfig(config, transport, modelFamily, {
        ...(options.sleep && { sleep: options.sleep }),
        ...(options.now && { now: options.now }),
      })
    : null;

  const embeddingProvider =
    options.embeddingProvider !== undefined ? options.embeddingProvider : createEmbeddingProvider(config);

  return new KqlTranslator({
    config,
    orchestrator,
    corpus: new CorpusLoader({ corpusDir: config.corpusDir }),
    embeddings: new EmbeddingCapability(embeddingProvider),
    events: ChatEventLogger.fromConfig(config),
    tokenCounter: options.tokenCounter,
    now: options.now,
  });
}
