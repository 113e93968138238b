/**
 * Domain Classifier
 *
 * Routes a question to exactly one telemetry domain from keyword and
 * table-name signals. A question with no signal at all is rejected rather
 * than routed to a default corpus.
 */

import {
  CONFLICT_DEFAULT_DOMAIN,
  DOMAIN_DEFINITIONS,
  type DomainDefinition,
} from '../../config/domains.js';
import { DomainClassificationError } from '../../core/errors.js';
import { createLogger } from '../../core/logger.js';
import { DOMAINS, type Domain, type DomainClassification } from '../../core/types.js';

const log = createLogger('domain-classifier');

/** Synthetic signal: a canonical table name was mentioned */
export const TABLE_SIGNAL = '<table-match>';
/** Synthetic signal: pods stuck in Pending */
export const PODS_PENDING_SIGNAL = '<pods-pending>';

const STRONG_SIGNALS = new Set([TABLE_SIGNAL, PODS_PENDING_SIGNAL]);

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function matchesWord(text: string, keyword: string): boolean {
  return new RegExp(`\\b${escapeRegExp(keyword).replace(/ /g, '\\s+')}\\b`).test(text);
}

function collectMatches(question: string, definition: DomainDefinition): string[] {
  const matches = definition.keywords.filter((keyword) => matchesWord(question, keyword));
  if (definition.tablePattern.test(question)) {
    matches.push(TABLE_SIGNAL);
  }
  return matches;
}

/**
 * Classify a question.
 *
 * 1. Only one domain matched: that domain.
 * 2. Both matched: containers when it carries a strong signal (table name
 *    or pods + pending), otherwise the conflict default (appinsights).
 * 3. Neither matched: DomainClassificationError.
 *
 * @throws DomainClassificationError when no signal is present
 */
export function classifyDomain(
  question: string,
  definitions: Record<Domain, DomainDefinition> = DOMAIN_DEFINITIONS
): DomainClassification {
  const text = question.toLowerCase();

  const matches: Record<Domain, string[]> = {
    appinsights: collectMatches(text, definitions.appinsights),
    containers: collectMatches(text, definitions.containers),
  };

  if ((matchesWord(text, 'pod') || matchesWord(text, 'pods')) && matchesWord(text, 'pending')) {
    matches.containers.push(PODS_PENDING_SIGNAL);
  }

  const matched = DOMAINS.filter((domain) => matches[domain].length > 0);
  let result: DomainClassification;

  if (matched.length === 1) {
    result = { domain: matched[0], matches, reason: 'exclusive' };
  } else if (matched.length > 1) {
    const strong = matches.containers.some((signal) => STRONG_SIGNALS.has(signal));
    result = strong
      ? { domain: 'containers', matches, reason: 'strong-signal' }
      : { domain: CONFLICT_DEFAULT_DOMAIN, matches, reason: 'default-on-conflict' };
  } else {
    log.debug({ question }, 'No domain signal');
    throw new DomainClassificationError(question, matches);
  }

  log.debug(
    {
      domain: result.domain,
      reason: result.reason,
      appinsights: matches.appinsights,
      containers: matches.containers,
    },
    'Domain classified'
  );
  return result;
}
