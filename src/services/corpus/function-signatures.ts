/**
 * Function Signature Index
 *
 * Extracts helper function declarations from a KQL function file:
 *
 *     // Errors emitted by a workload in the given window
 *     let WorkloadErrors = (workload:string, lookback:timespan) {
 *
 * Declarations may span several lines before the opening brace. The last
 * non-empty line of the contiguous `//` block above a declaration becomes
 * its description.
 */

import type { FunctionSignature } from '../../core/types.js';

const DECLARATION = /^let\s+([A-Za-z0-9_]+)\s*=\s*\((.*?)\)\s*\{/;
/** Lines scanned after `let` looking for the opening brace */
const MAX_DECLARATION_LINES = 6;
const MAX_DESCRIPTION_CHARS = 110;

function describeDeclaration(lines: string[], declarationIndex: number): string {
  const comments: string[] = [];
  for (let j = declarationIndex - 1; j >= 0; j--) {
    const prev = lines[j].trim();
    if (!prev.startsWith('//')) break;
    comments.unshift(prev.replace(/^[/\s]+/, ''));
  }

  const summary = [...comments].reverse().find((line) => line.trim().length > 0)?.trim() ?? '';
  return summary.length > MAX_DESCRIPTION_CHARS
    ? `${summary.slice(0, MAX_DESCRIPTION_CHARS - 3)}...`
    : summary;
}

export function parseFunctionSignatures(text: string): FunctionSignature[] {
  const lines = text.split(/\r?\n/);
  const results: FunctionSignature[] = [];
  let i = 0;

  while (i < lines.length) {
    const stripped = lines[i].trim();
    if (!stripped.startsWith('let ')) {
      i++;
      continue;
    }

    const declaration = [stripped];
    let k = i + 1;
    let foundBrace = stripped.includes('{');
    while (!foundBrace && k < lines.length && k < i + MAX_DECLARATION_LINES) {
      const next = lines[k].trim();
      declaration.push(next);
      foundBrace = next.includes('{');
      k++;
    }

    const match = DECLARATION.exec(declaration.join(' ').replace(/\s+/g, ' '));
    if (match) {
      results.push({
        signature: `${match[1]}(${match[2].trim()})`,
        description: describeDeclaration(lines, i),
      });
    }
    i = k;
  }

  return results;
}

/**
 * Render signatures as a bullet list: `- Name(params)  // description`.
 */
export function formatFunctionSignatures(signatures: FunctionSignature[]): string {
  if (signatures.length === 0) {
    return '(No function signatures)';
  }
  return signatures
    .map(({ signature, description }) =>
      description ? `- ${signature}  // ${description}` : `- ${signature}`
    )
    .join('\n');
}
