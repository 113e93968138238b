/**
 * Prompt Assembler
 *
 * Builds the system and user prompts for one translation attempt and keeps
 * them within the token budget. Compression stages are cumulative and stop
 * as soon as the prompt fits:
 *
 *   none -> capsule-removed -> fn-truncated -> fewshot-truncated
 *
 * Slim mode (retries) skips the budget check: best example only, no
 * auxiliary text.
 */

import { DEFAULTS } from '../../config/defaults.js';
import { DOMAIN_DEFINITIONS } from '../../config/domains.js';
import { createLogger } from '../../core/logger.js';
import type { CompressionStage, Domain, DomainCorpus, Example, PromptContext } from '../../core/types.js';
import { formatFunctionSignatures } from '../corpus/function-signatures.js';
import { KQL_SYSTEM_PROMPT, KQL_USER_PROMPT, fillTemplate } from './prompts.js';
import { getTokenCounter, type TokenCounter } from './token-counter.js';

const log = createLogger('prompt-assembler');

export interface PromptAssemblyInput {
  question: string;
  domain: Domain;
  /** Selected examples, best first */
  examples: readonly Example[];
  corpus: Pick<DomainCorpus, 'capsule' | 'functions'>;
  tokenLimit?: number;
  slim?: boolean;
  counter?: TokenCounter;
}

interface SectionPlan {
  examples: readonly Example[];
  functionChars: number | null;
  capsuleChars: number | null;
}

/**
 * Render examples as `Q: ...` / `KQL:` blocks separated by blank lines.
 */
export function formatExamples(examples: readonly Example[]): string {
  return examples.map((example) => `Q: ${example.question}\nKQL:\n${example.query}`).join('\n\n');
}

export function buildInstructionTemplate(domain: Domain): string {
  const definition = DOMAIN_DEFINITIONS[domain];
  return fillTemplate(KQL_SYSTEM_PROMPT, {
    DOMAIN: domain,
    DOMAIN_LABEL: definition.label,
    TABLES: definition.tables.join(', '),
  }).trim();
}

export function buildUserPrompt(question: string, domain: Domain): string {
  return fillTemplate(KQL_USER_PROMPT, { DOMAIN: domain, QUESTION: question.trim() });
}

function plansFor(input: PromptAssemblyInput): [CompressionStage, SectionPlan][] {
  const all = input.examples;
  const first = all.slice(0, 1);
  return [
    ['none', { examples: all, functionChars: DEFAULTS.FUNCTION_LIST_CHAR_LIMIT, capsuleChars: DEFAULTS.CAPSULE_CHAR_LIMIT }],
    ['capsule-removed', { examples: all, functionChars: DEFAULTS.FUNCTION_LIST_CHAR_LIMIT, capsuleChars: null }],
    ['fn-truncated', { examples: all, functionChars: DEFAULTS.FUNCTION_LIST_TRUNCATED_CHAR_LIMIT, capsuleChars: null }],
    ['fewshot-truncated', { examples: first, functionChars: DEFAULTS.FUNCTION_LIST_TRUNCATED_CHAR_LIMIT, capsuleChars: null }],
  ];
}

function renderAuxiliary(input: PromptAssemblyInput, plan: SectionPlan): string {
  const parts: string[] = [];
  const { functions, capsule } = input.corpus;

  if (plan.functionChars !== null && functions.length > 0) {
    const listing = formatFunctionSignatures(functions);
    const truncated = listing.length > plan.functionChars;
    parts.push(
      `FunctionSignatures (${functions.length} detected${truncated ? ', truncated' : ''}):\n` +
        listing.slice(0, plan.functionChars)
    );
  }

  if (plan.capsuleChars !== null && capsule.trim()) {
    parts.push(`CapsuleSummaryExcerpt:\n${capsule.slice(0, plan.capsuleChars)}`);
  }

  return parts.join('\n\n');
}

function renderExamples(examples: readonly Example[], total: number): string {
  if (examples.length === 0) return '';
  const header =
    examples.length < total
      ? `FewShotPrimary (${total} total, truncated to ${examples.length}):`
      : `FewShotsSelected (${examples.length}):`;
  return `${header}\n${formatExamples(examples)}`;
}

function joinSections(...sections: string[]): string {
  return sections.filter((section) => section.length > 0).join('\n\n');
}

export function assemblePrompt(input: PromptAssemblyInput): PromptContext {
  const counter = input.counter ?? getTokenCounter();
  const tokenLimit = input.tokenLimit ?? DEFAULTS.PROMPT_TOKEN_LIMIT;
  const instructionTemplate = buildInstructionTemplate(input.domain);
  const userPrompt = buildUserPrompt(input.question, input.domain);

  const measure = (systemPrompt: string) => counter.count(`${systemPrompt}\n\n${userPrompt}`);

  if (input.slim) {
    const selectedExamples = input.examples.slice(0, 1);
    const systemPrompt = joinSections(
      instructionTemplate,
      selectedExamples.length > 0
        ? `FewShot (slim domain=${input.domain}):\n${formatExamples(selectedExamples)}`
        : ''
    );
    const context: PromptContext = {
      instructionTemplate,
      selectedExamples,
      auxiliaryText: '',
      tokenCount: measure(systemPrompt),
      compressionStage: 'slim',
      systemPrompt,
      userPrompt,
    };
    log.debug({ stage: context.compressionStage, tokens: context.tokenCount }, 'Prompt assembled');
    return context;
  }

  let context: PromptContext | null = null;
  for (const [stage, plan] of plansFor(input)) {
    const auxiliaryText = renderAuxiliary(input, plan);
    const systemPrompt = joinSections(
      instructionTemplate,
      renderExamples(plan.examples, input.examples.length),
      auxiliaryText
    );
    context = {
      instructionTemplate,
      selectedExamples: [...plan.examples],
      auxiliaryText,
      tokenCount: measure(systemPrompt),
      compressionStage: stage,
      systemPrompt,
      userPrompt,
    };
    if (context.tokenCount <= tokenLimit) {
      break;
    }
  }

  // plansFor always yields at least one stage
  if (!context) {
    throw new Error('No prompt compression stages defined');
  }

  if (context.tokenCount > tokenLimit) {
    log.warn(
      { tokens: context.tokenCount, tokenLimit, counter: counter.name },
      'Prompt exceeds token budget after every compression stage'
    );
  } else {
    log.debug(
      { stage: context.compressionStage, tokens: context.tokenCount, tokenLimit, counter: counter.name },
      'Prompt assembled'
    );
  }
  return context;
}
