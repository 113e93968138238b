/**
 * Core type definitions for kql-pilot
 */

// === Domain Types ===

/**
 * Telemetry category a question is routed to.
 * Determines which example corpus and vocabulary apply.
 */
export type Domain = 'appinsights' | 'containers';

export const DOMAINS: readonly Domain[] = ['appinsights', 'containers'];

/**
 * Outcome of domain classification, including the signals that decided it.
 */
export interface DomainClassification {
  domain: Domain;
  /** Matched keywords and synthetic signals per domain */
  matches: Record<Domain, string[]>;
  /** Why this domain won */
  reason: 'exclusive' | 'strong-signal' | 'default-on-conflict';
}

// === Corpus Types ===

/**
 * A worked (question, query) pair. Identity is its index within the domain corpus.
 */
export interface Example {
  readonly question: string;
  readonly query: string;
}

/**
 * Helper function declaration parsed from a domain function file.
 */
export interface FunctionSignature {
  /** Rendered signature, e.g. `ContainerErrors(startTime:datetime)` */
  signature: string;
  /** One-line description from the preceding comment block (may be empty) */
  description: string;
}

/**
 * Everything loaded for one domain.
 */
export interface DomainCorpus {
  domain: Domain;
  examples: Example[];
  /** Capsule summary excerpt ('' when the domain has none) */
  capsule: string;
  functions: FunctionSignature[];
}

// === Selection Types ===

export interface ScoredExample {
  example: Example;
  /** Position of the example in its corpus */
  index: number;
  heuristicScore: number;
  embeddingScore: number | null;
  finalScore: number;
}

export interface RelevanceSelection {
  /** At most topK examples, score-descending */
  selected: ScoredExample[];
  /** Every example, score-descending (ties in corpus order) */
  ranked: ScoredExample[];
  embeddingsUsed: boolean;
  /** True when nothing scored positive and corpus-order grounding was used */
  usedFallback: boolean;
}

// === Prompt Types ===

export type CompressionStage =
  | 'none'
  | 'capsule-removed'
  | 'fn-truncated'
  | 'fewshot-truncated'
  | 'slim';

export interface PromptContext {
  instructionTemplate: string;
  selectedExamples: Example[];
  auxiliaryText: string;
  tokenCount: number;
  compressionStage: CompressionStage;
  systemPrompt: string;
  userPrompt: string;
}

// === Chat Types ===

/**
 * `constrained` models (o-series reasoning deployments) accept a single user
 * message, `max_completion_tokens`, and no sampling knobs.
 */
export type ModelFamily = 'standard' | 'constrained';

export interface ChatRequest {
  systemPrompt: string;
  userPrompt: string;
  modelFamily: ModelFamily;
  maxOutputTokens: number;
  temperature: number | null;
  topP: number | null;
}

export type ChatErrorCode =
  | 'authentication'
  | 'rate-limit'
  | 'deployment-not-found'
  | 'timeout'
  | 'connection'
  | 'http'
  | 'api-error'
  | 'empty-completion'
  | 'content-filtered'
  | 'deadline-exceeded'
  | 'unknown';

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ChatResultMetadata {
  purpose: string;
  deployment: string;
  modelFamily: ModelFamily;
  initialMaxTokens: number;
  finalMaxTokens: number;
  initialTemperature: number | null;
  finalTemperature: number | null;
  errorCode: ChatErrorCode | null;
  /** HTTP requests spent on the escalated reissue */
  escalationAttempts: number;
  /** Set when the escalated reissue failed and the truncated content was kept */
  escalationError?: string;
  usage?: TokenUsage;
  durationMs: number;
}

export interface ChatResult {
  content: string | null;
  finishReason: string | null;
  error: string | null;
  errorCode: ChatErrorCode | null;
  /** HTTP requests issued by the primary retry loop */
  attempts: number;
  escalated: boolean;
  metadata: ChatResultMetadata;
}

// === Translation Types ===

export type TranslationErrorKind =
  | ChatErrorCode
  | 'domain-ambiguous'
  | 'invalid-response'
  | 'configuration';

export interface TranslationError {
  kind: TranslationErrorKind;
  message: string;
  question: string;
  domain?: Domain;
  /** Pipeline attempts made before giving up */
  attempts: number;
}

export type TranslationProvenance = 'model' | 'example-fallback' | 'shortcut';

export interface TranslationSuccess {
  ok: true;
  query: string;
  provenance: TranslationProvenance;
  domain?: Domain;
  attempts: number;
  /** Provenance comment line (without trailing newline) */
  annotation?: string;
}

export interface TranslationFailure {
  ok: false;
  error: TranslationError;
}

export type TranslationResult = TranslationSuccess | TranslationFailure;
