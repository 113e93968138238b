/**
 * KQL Translation Building Blocks
 */

export {
  LEXICAL_SCORING,
  TYPO_CORRECTIONS,
  tokenize,
  editDistanceWithin,
  scoreHeuristic,
  tokenOverlapScore,
} from './lexical-scoring.js';

export { classifyDomain, TABLE_SIGNAL, PODS_PENDING_SIGNAL } from './domain-classifier.js';

export { selectRelevantExamples, BLEND_WEIGHTS, type SelectionOptions } from './relevance-selector.js';

export { getTokenCounter, wordTokenCounter, type TokenCounter } from './token-counter.js';

export { KQL_SYSTEM_PROMPT, KQL_USER_PROMPT, fillTemplate } from './prompts.js';

export {
  assemblePrompt,
  formatExamples,
  buildInstructionTemplate,
  buildUserPrompt,
  type PromptAssemblyInput,
} from './prompt-assembler.js';

export {
  normalizeCompletion,
  validateCompletion,
  MIN_QUERY_CHARS,
  type ValidationResult,
} from './response-validator.js';

export { matchShortcut, LIST_TABLES_QUERY, type Shortcut } from './shortcuts.js';
