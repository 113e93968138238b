/**
 * Prompt token counting: cl100k_base through js-tiktoken, or a word count
 * when the encoder cannot be loaded.
 */

import { getEncoding } from 'js-tiktoken';
import { createLogger } from '../../core/logger.js';

const log = createLogger('token-counter');

export interface TokenCounter {
  readonly name: string;
  count(text: string): number;
}

export const wordTokenCounter: TokenCounter = {
  name: 'words',
  count: (text) => text.match(/\w+/g)?.length ?? 0,
};

let _counter: TokenCounter | null = null;

/**
 * Shared counter, created on first use.
 */
export function getTokenCounter(): TokenCounter {
  if (_counter) {
    return _counter;
  }
  try {
    const encoder = getEncoding('cl100k_base');
    _counter = {
      name: 'cl100k_base',
      // Special-token strings in user text are counted as ordinary text
      count: (text) => encoder.encode(text, [], []).length,
    };
  } catch (error) {
    log.warn({ err: error }, 'Tokenizer unavailable, counting words instead');
    _counter = wordTokenCounter;
  }
  return _counter;
}
