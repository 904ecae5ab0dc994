/**
 * Similarity Estimator - token-set Jaccard index used to judge round-trip drift
 */

import { normalizeWhitespace } from './reverse.js';

const PUNCTUATION = /[.,;:!?"']/g;

/**
 * Lowercase, normalize spacing the way the expander does, strip punctuation
 */
export function normalizeForComparison(text: string): string {
  return normalizeWhitespace(text.toLowerCase()).replace(PUNCTUATION, '').trim();
}

export function tokenSet(text: string): Set<string> {
  return new Set(normalizeForComparison(text).split(/\s+/).filter(token => token.length > 0));
}

/**
 * Jaccard similarity of the two token sets, in [0, 1].
 * Two texts with no tokens are identical.
 */
export function similarity(a: string, b: string): number {
  const tokensA = tokenSet(a);
  const tokensB = tokenSet(b);

  if (tokensA.size === 0 && tokensB.size === 0) {
    return 1.0;
  }

  let intersection = 0;
  for (const token of tokensA) {
    if (tokensB.has(token)) intersection++;
  }
  const union = tokensA.size + tokensB.size - intersection;

  return intersection / union;
}
