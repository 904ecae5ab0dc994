/**
 * Forward Matcher - converts prose to Rosetta symbols
 *
 * Each step takes and returns a string, so the pipeline is a fold over the
 * matcher order followed by fixed rewrites.
 */

import type { ConversionOutcome } from '../types.js';
import type { MatcherIndex } from './indexes.js';
import { escapeRegex, NOT_WORD_AFTER, NOT_WORD_BEFORE } from './boundary.js';

// Operators whose surrounding whitespace is dropped
const TIGHT_OPERATORS = ['≜', '≔', '⇒', '∈', '→', '⇔', '∧', '∨'];

const OPERATOR_SPACING = TIGHT_OPERATORS.map(op => ({
  op,
  regex: new RegExp(`\\s*${escapeRegex(op)}\\s*`, 'gu'),
}));

const IDENT = '([\\p{L}\\p{N}_]+)';

// const x = 5, Define x as 5, let x = 5 → x≜5
const ASSIGNMENTS = [
  new RegExp(`${NOT_WORD_BEFORE}const\\s+${IDENT}\\s*=\\s*(\\S+)`, 'giu'),
  new RegExp(`${NOT_WORD_BEFORE}define\\s+${IDENT}\\s+as\\s+(\\S+)`, 'giu'),
  new RegExp(`${NOT_WORD_BEFORE}let\\s+${IDENT}\\s*=\\s*(\\S+)`, 'giu'),
];

const STOPWORDS = new Set([
  'the', 'with', 'that', 'this', 'from', 'into', 'when', 'where', 'which', 'what',
]);

const CANDIDATE_WORD = new RegExp(`${NOT_WORD_BEFORE}[a-zA-Z]{3,}${NOT_WORD_AFTER}`, 'gu');

export interface SubstitutionResult {
  text: string;
  mappedCharacterCount: number;
}

/**
 * Replace every table pattern, longest entries first. Each replacement sees
 * the text left by the previous one, so "for all" is gone before "all" runs.
 */
export function substitutePatterns(index: MatcherIndex, input: string): SubstitutionResult {
  return index.compiled.reduce<SubstitutionResult>(
    (state, { entry, patterns }) =>
      patterns.reduce<SubstitutionResult>((acc, { regex }) => {
        let matched = 0;
        const text = acc.text.replace(regex, (span: string) => {
          matched += span.length;
          return entry.symbol;
        });
        return { text, mappedCharacterCount: acc.mappedCharacterCount + matched };
      }, state),
    { text: input, mappedCharacterCount: 0 }
  );
}

export function cleanupOperators(input: string): string {
  return OPERATOR_SPACING.reduce((text, { op, regex }) => text.replace(regex, op), input);
}

export function rewriteAssignments(input: string): string {
  return ASSIGNMENTS.reduce((text, regex) => text.replace(regex, '$1≜$2'), input);
}

/**
 * Alphabetic words of 3+ letters left after conversion, minus stopwords
 */
export function findUnmappedWords(text: string): string[] {
  const words = new Set<string>();
  for (const match of text.matchAll(CANDIDATE_WORD)) {
    const word = match[0].toLowerCase();
    if (!STOPWORDS.has(word)) {
      words.add(word);
    }
  }
  return [...words].sort();
}

export function computeConfidence(inputLength: number, mappedCharacterCount: number): number {
  if (inputLength === 0) {
    return 1.0;
  }
  return Math.min(1.0, mappedCharacterCount / inputLength);
}

/**
 * Convert prose to symbols. Total: any string in, an outcome out.
 */
export function matchProse(index: MatcherIndex, input: string): ConversionOutcome {
  const { text, mappedCharacterCount } = substitutePatterns(index, input);
  const symbolicText = rewriteAssignments(cleanupOperators(text)).trim();

  return Object.freeze({
    symbolicText,
    mappedCharacterCount,
    unmappedWords: Object.freeze(findUnmappedWords(symbolicText)),
    confidence: computeConfidence(input.length, mappedCharacterCount),
  });
}
