/**
 * Reverse Expander - converts Rosetta symbols back to prose
 */

import type { MatcherIndex } from './indexes.js';

const JOINERS = [
  'for all', 'exists', 'implies', 'and', 'or', 'not', 'if', 'then', 'else', 'in',
  'defined as', 'identical to', 'true', 'false', 'lambda', 'function', 'returns',
  'boolean', 'integer', 'string', 'natural', 'real', 'proves', 'therefore', 'yields',
];

const CAMEL_BOUNDARY = /([a-z])([A-Z])/g;
const JOINER_BOUNDARY = new RegExp(`([a-zA-Z])\\s+(${JOINERS.join('|')})\\s+`, 'g');

/**
 * Replace each registered symbol, longest first, with its padded primary
 * pattern. Unregistered glyphs are left as they are.
 */
export function expandSymbols(index: MatcherIndex, input: string): string {
  return index.expansions.reduce((text, rule) => {
    if (rule.matcher) {
      return text.replace(rule.matcher, () => rule.expansion);
    }
    return text.split(rule.symbol).join(rule.expansion);
  }, input);
}

/**
 * Split words fused by expansion: camelCase joins, and joiner words that sit
 * against their neighbours with irregular spacing.
 */
export function repairWordBoundaries(input: string): string {
  return input
    .replace(CAMEL_BOUNDARY, '$1 $2')
    .replace(JOINER_BOUNDARY, '$1 $2 ');
}

export function normalizeWhitespace(input: string): string {
  return input
    .replace(/\s+/g, ' ')
    .replace(/\s+([.,;:!?])/g, '$1')
    .replace(/([([{])\s+/g, '$1')
    .replace(/\s+([)\]}])/g, '$1')
    .trim();
}

// A word-like symbol glued to another symbol or split off by camelCase repair
// only stands alone after a pass, so expansion repeats until nothing changes.
const MAX_EXPANSION_PASSES = 4;

function expandPass(index: MatcherIndex, input: string): string {
  return normalizeWhitespace(repairWordBoundaries(expandSymbols(index, input)));
}

/**
 * Convert symbolic text to prose. Total: never throws.
 */
export function expandToProse(index: MatcherIndex, input: string): string {
  let text = expandPass(index, input);
  for (let pass = 1; pass < MAX_EXPANSION_PASSES; pass++) {
    const next = expandPass(index, text);
    if (next === text) {
      break;
    }
    text = next;
  }
  return text;
}
