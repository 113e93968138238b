/**
 * Example Corpus Parser
 *
 * Reads worked (question, query) pairs from reference files. Two layouts:
 *
 * Markdown (preferred):
 *
 *     **How many requests failed today?**
 *     ```kql
 *     AppRequests | where Success == false | count
 *     ```
 *
 * Legacy line-oriented:
 *
 *     Q: How many requests failed today?
 *     KQL:
 *     AppRequests | where Success == false | count
 *
 * When a file contains any markdown example, only markdown examples are
 * returned. Malformed blocks are skipped.
 */

import * as fs from 'node:fs';
import { CorpusError } from '../../core/errors.js';
import type { Example } from '../../core/types.js';

const MARKDOWN_QUESTION = /^\*\*(.+?)\*\*$/;
const FENCE_START = /^```kql\s*$/i;
const FENCE_END = /^```\s*$/;

function parseMarkdownExamples(lines: string[]): Example[] {
  const examples: Example[] = [];
  let i = 0;

  while (i < lines.length) {
    const match = MARKDOWN_QUESTION.exec(lines[i].trim());
    if (!match) {
      i++;
      continue;
    }

    const question = match[1].trim();

    let fenceStart = i + 1;
    while (fenceStart < lines.length && !FENCE_START.test(lines[fenceStart].trim())) {
      // A new question before any fence means this one has no query
      if (MARKDOWN_QUESTION.test(lines[fenceStart].trim())) break;
      fenceStart++;
    }
    if (fenceStart >= lines.length || !FENCE_START.test(lines[fenceStart].trim())) {
      i = fenceStart;
      continue;
    }

    const body: string[] = [];
    let fenceEnd = fenceStart + 1;
    while (fenceEnd < lines.length && !FENCE_END.test(lines[fenceEnd].trim())) {
      body.push(lines[fenceEnd]);
      fenceEnd++;
    }

    // Unclosed fence: drop the block
    if (fenceEnd >= lines.length) {
      break;
    }

    const query = body.join('\n').trim();
    if (question && query) {
      examples.push({ question, query });
    }
    i = fenceEnd + 1;
  }

  return examples;
}

function startsWithPrefix(line: string, prefix: string): boolean {
  return line.trim().toLowerCase().startsWith(prefix);
}

function parseLegacyExamples(lines: string[]): Example[] {
  const examples: Example[] = [];
  let question: string | null = null;
  let body: string[] = [];
  let collecting = false;

  const flush = () => {
    const query = body.join('\n').trim();
    if (question && query) {
      examples.push({ question, query });
    }
  };

  lines.forEach((line, i) => {
    const stripped = line.trim();

    if (startsWithPrefix(stripped, 'q:')) {
      flush();
      question = stripped.slice(2).trim();
      body = [];
      collecting = false;
      return;
    }

    if (startsWithPrefix(stripped, 'kql:')) {
      collecting = true;
      // Inline query on the KQL: line itself
      const inline = stripped.slice(4).trim();
      if (inline) body.push(inline);
      return;
    }

    if (!collecting) return;

    const next = lines[i + 1];
    if (!stripped && next !== undefined && startsWithPrefix(next, 'q:')) {
      collecting = false;
      return;
    }
    body.push(line);
  });

  flush();
  return examples;
}

/**
 * Parse examples from file text. Never throws on malformed content.
 */
export function parseExamples(text: string): Example[] {
  const lines = text.split(/\r?\n/);
  const markdown = parseMarkdownExamples(lines);
  return markdown.length > 0 ? markdown : parseLegacyExamples(lines);
}

/**
 * Parse examples from a file. A missing file yields no examples; an
 * unreadable one raises CorpusError.
 */
export async function parseExampleFile(filePath: string): Promise<Example[]> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw new CorpusError(
      `Could not read example file: ${filePath}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
  return parseExamples(text);
}
