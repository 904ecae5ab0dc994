/**
 * Word-boundary helpers shared by the matchers and detectors.
 *
 * Word characters are Unicode letters, digits and underscore, so Greek and
 * letterlike glyphs (λ, Δ, ℕ) count as word characters while operators
 * (∀, ⇒, ≜) do not.
 */

const WORD_CHAR = /[\p{L}\p{N}_]/u;

export const NOT_WORD_BEFORE = '(?<![\\p{L}\\p{N}_])';
export const NOT_WORD_AFTER = '(?![\\p{L}\\p{N}_])';

export function isWordChar(char: string): boolean {
  return WORD_CHAR.test(char);
}

export function escapeRegex(text: string): string {
  return text.replace(/[\\^$.*+?()[\]{}|/]/g, '\\$&');
}

/**
 * Regex source for a literal phrase with boundary assertions on the edges that
 * are word characters. Operator-like phrases (">=", "=>") have no word edge to
 * anchor and match wherever they occur.
 */
export function boundedSource(phrase: string): string {
  const chars = Array.from(phrase);
  const first = chars[0] ?? '';
  const last = chars[chars.length - 1] ?? '';

  const head = isWordChar(first) ? NOT_WORD_BEFORE : '';
  const tail = isWordChar(last) ? NOT_WORD_AFTER : '';
  return `${head}${escapeRegex(phrase)}${tail}`;
}

/**
 * Case-insensitive matcher for any of the given words or phrases.
 */
export function wordMatcher(words: readonly string[]): RegExp {
  const alternatives = words.map(escapeRegex).join('|');
  return new RegExp(`${NOT_WORD_BEFORE}(?:${alternatives})${NOT_WORD_AFTER}`, 'iu');
}
