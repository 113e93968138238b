/**
 * Lexical Scoring Utilities
 *
 * Question-to-example similarity used by the relevance selector and the
 * example fallback.
 */

/**
 * Scoring weights for lexical matching.
 */
export const LEXICAL_SCORING = {
  /** One question contains the other */
  CONTAINMENT: 10,
  /** Some token pair is within APPROX_MAX_DISTANCE edits */
  APPROX_MATCH: 1,
  /** Both mention the same domain signal term */
  SIGNAL_BONUS: 2,
  APPROX_MAX_DISTANCE: 2,
  /** Shorter tokens are within two edits of almost anything */
  APPROX_MIN_TOKEN_LENGTH: 4,
} as const;

/**
 * Common misspellings corrected before comparison.
 */
export const TYPO_CORRECTIONS: Readonly<Record<string, string>> = {
  calcualte: 'calculate',
  latncy: 'latency',
};

/**
 * Signal groups: +SIGNAL_BONUS when both texts contain a term of the group.
 * `workload` and `latency` share a single bonus.
 */
const SIGNAL_GROUPS: readonly (readonly (readonly string[])[])[] = [
  [['workload'], ['latency']],
  [['pod', 'pods']],
];

/**
 * Split into lowercase alphanumeric runs longer than one character, with
 * typo corrections applied.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 1)
    .map((token) => TYPO_CORRECTIONS[token] ?? token);
}

/**
 * True when the Levenshtein distance between a and b is at most maxDistance.
 * Stops as soon as every cell of a row exceeds the bound.
 */
export function editDistanceWithin(a: string, b: string, maxDistance: number): boolean {
  if (a === b) return true;
  if (Math.abs(a.length - b.length) > maxDistance) return false;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    let rowMin = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      const value = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
      current.push(value);
      rowMin = Math.min(rowMin, value);
    }
    if (rowMin > maxDistance) return false;
    previous = current;
  }
  return previous[b.length] <= maxDistance;
}

function isContained(a: string, b: string): boolean {
  if (!a || !b) return false;
  return a.includes(b) || b.includes(a);
}

/**
 * Heuristic relevance of an example question to the user's question.
 *
 * Scoring:
 * - One lower-cased question contains the other: +10
 * - Each shared token: +1
 * - Any near-identical token pair (edit distance <= 2): +1
 * - Both mention workload or latency: +2
 * - Both mention pod(s): +2
 */
export function scoreHeuristic(question: string, exampleQuestion: string): number {
  const q = question.toLowerCase().trim();
  const ex = exampleQuestion.toLowerCase().trim();
  const qTokens = new Set(tokenize(q));
  const exTokens = new Set(tokenize(ex));

  let score = 0;

  if (isContained(q, ex)) {
    score += LEXICAL_SCORING.CONTAINMENT;
  }

  for (const token of qTokens) {
    if (exTokens.has(token)) score += 1;
  }

  const approxCandidates = [...exTokens].filter(
    (token) => token.length >= LEXICAL_SCORING.APPROX_MIN_TOKEN_LENGTH
  );
  const hasApproxPair = [...qTokens].some(
    (token) =>
      token.length >= LEXICAL_SCORING.APPROX_MIN_TOKEN_LENGTH &&
      approxCandidates.some((other) =>
        editDistanceWithin(token, other, LEXICAL_SCORING.APPROX_MAX_DISTANCE)
      )
  );
  if (hasApproxPair) {
    score += LEXICAL_SCORING.APPROX_MATCH;
  }

  for (const group of SIGNAL_GROUPS) {
    const fires = group.some(
      (terms) => terms.some((t) => qTokens.has(t)) && terms.some((t) => exTokens.has(t))
    );
    if (fires) score += LEXICAL_SCORING.SIGNAL_BONUS;
  }

  return score;
}

/**
 * Shared-token count plus the containment bonus. Used to decide whether a
 * raw example is close enough to reuse as an answer.
 */
export function tokenOverlapScore(question: string, exampleQuestion: string): number {
  const q = question.toLowerCase().trim();
  const ex = exampleQuestion.toLowerCase().trim();
  const exTokens = new Set(tokenize(ex));
  let shared = 0;
  for (const token of new Set(tokenize(q))) {
    if (exTokens.has(token)) shared++;
  }
  return shared + (isContained(q, ex) ? LEXICAL_SCORING.CONTAINMENT : 0);
}
