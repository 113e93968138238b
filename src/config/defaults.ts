/**
 * Centralized Default Configuration Values
 *
 * All magic numbers and default values are defined here for consistency
 * and maintainability. Users can override most of these via environment
 * variables or the config file.
 */

export const DEFAULTS = {
  /**
   * Azure OpenAI deployment used when none is configured.
   * Env: AZURE_OPENAI_DEPLOYMENT
   */
  DEPLOYMENT: 'gpt-35-turbo',

  /**
   * Initial completion token budget.
   * Env: KQL_MAX_OUTPUT_TOKENS
   */
  MAX_OUTPUT_TOKENS: 500,

  /**
   * Ceiling for token escalation after a truncated completion.
   * Env: KQL_MAX_OUTPUT_TOKENS_CEILING
   */
  MAX_OUTPUT_TOKENS_CEILING: 1200,

  /**
   * Minimum growth of the token budget on escalation.
   */
  ESCALATION_MIN_TOKEN_STEP: 50,

  /**
   * Relative growth of the token budget on escalation.
   */
  ESCALATION_TOKEN_FACTOR: 1.5,

  /** Base sampling temperature (standard models only). */
  TEMPERATURE: 0.2,

  /** Nucleus sampling (standard models only). */
  TOP_P: 0.9,

  /** Temperature nudge applied on escalation. */
  TEMPERATURE_INCREMENT: 0.1,

  /** Temperature is never escalated past this value. */
  TEMPERATURE_MAX: 0.7,

  /**
   * HTTP attempts per chat invocation (429 / timeout / connection are retried).
   * Env: KQL_CHAT_MAX_RETRIES
   */
  CHAT_MAX_RETRIES: 3,

  /**
   * Base delay for chat retries in milliseconds.
   * 429 backs off exponentially, timeouts linearly.
   */
  RETRY_BASE_DELAY_MS: 1000,

  /**
   * Per-request timeout for the completion endpoint.
   */
  REQUEST_TIMEOUT_MS: 30000,

  /**
   * Wall-clock budget for one translation across every retry and escalation.
   */
  TRANSLATION_DEADLINE_MS: 120000,

  /**
   * Budget for embedding the question and examples; selection scores
   * heuristically once it runs out. Also the embedding clients' timeout.
   */
  EMBEDDING_TIMEOUT_MS: 10000,

  /**
   * Pipeline attempts; every attempt after the first uses the slim prompt.
   */
  PIPELINE_MAX_ATTEMPTS: 3,

  /**
   * Prompt token budget before staged compression kicks in.
   * Env: PROMPT_TOKEN_LIMIT
   */
  PROMPT_TOKEN_LIMIT: 6000,

  /** Number of examples injected into the prompt. */
  FEW_SHOT_TOP_K: 3,

  /** Corpus-order examples used when nothing scores positive. */
  FEW_SHOT_MIN_GROUNDING: 2,

  /** Token overlap needed to reuse a raw example after every attempt failed. */
  FALLBACK_MIN_OVERLAP: 2,

  /** Character caps for auxiliary prompt sections. */
  CAPSULE_CHAR_LIMIT: 600,
  FUNCTION_LIST_CHAR_LIMIT: 1000,
  FUNCTION_LIST_TRUNCATED_CHAR_LIMIT: 600,

  /** Raw capsule file read limit. */
  CAPSULE_READ_LIMIT: 800,

  /** Event log content preview length. */
  EVENT_PREVIEW_CHARS: 120,

  /** Chat event log location (relative to the working directory). */
  CHAT_EVENT_LOG_PATH: 'logs/chat-events.jsonl',

  /** Embedding model used for example relevance. */
  EMBEDDING_MODEL: 'text-embedding-3-small',
} as const;

/**
 * Type for the defaults object
 */
export type Defaults = typeof DEFAULTS;
