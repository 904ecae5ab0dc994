/**
 * Rosetta Indexes - lookup maps and matcher ordering derived from a table
 */

import type { MappingEntry, RosettaTable } from '../types.js';
import { logger } from '../logger.js';
import { RosettaTableError } from './table.js';
import { boundedSource, escapeRegex, NOT_WORD_AFTER, NOT_WORD_BEFORE } from './boundary.js';

export interface CompiledPattern {
  pattern: string;
  regex: RegExp;
}

export interface CompiledEntry {
  entry: MappingEntry;
  patterns: readonly CompiledPattern[];
}

export interface ExpansionRule {
  symbol: string;
  expansion: string;
  // Set for word-like symbols ("Pre", "List"), which only expand as whole words
  matcher?: RegExp;
}

export interface MatcherIndex {
  readonly patternToSymbol: ReadonlyMap<string, string>;
  readonly symbolToPrimaryPattern: ReadonlyMap<string, string>;
  /** Entries sorted by their longest pattern, longest first */
  readonly orderedEntries: readonly MappingEntry[];
  /** Same order as orderedEntries; shadowed duplicate patterns are left out */
  readonly compiled: readonly CompiledEntry[];
  /** Symbols sorted longest first, one rule per distinct symbol */
  readonly expansions: readonly ExpansionRule[];
  readonly warnings: readonly string[];
}

export interface IndexOptions {
  /** Treat duplicate patterns and reused symbols as fatal */
  strict?: boolean;
  onWarning?: (message: string) => void;
}

const WORD_SYMBOL = /^[A-Za-z]+$/;

export function normalizePattern(pattern: string): string {
  return pattern.toLowerCase().replace(/\s+/g, ' ').trim();
}

function longestPattern(entry: MappingEntry): number {
  return Math.max(...entry.patterns.map(p => p.length));
}

function symbolLength(symbol: string): number {
  return Array.from(symbol).length;
}

function compilePattern(entry: MappingEntry, pattern: string): CompiledPattern {
  try {
    return { pattern, regex: new RegExp(boundedSource(pattern), 'giu') };
  } catch (error) {
    throw new RosettaTableError(
      `Pattern "${pattern}" of ${entry.symbol} cannot be compiled: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function expansionRule(symbol: string, primary: string): ExpansionRule {
  const rule: ExpansionRule = { symbol, expansion: ` ${primary} ` };
  if (WORD_SYMBOL.test(symbol)) {
    rule.matcher = new RegExp(`${NOT_WORD_BEFORE}${escapeRegex(symbol)}${NOT_WORD_AFTER}`, 'gu');
  }
  return rule;
}

/**
 * Build the matcher index for a table. Deterministic: the same table always
 * yields the same index.
 */
export function buildRosettaIndex(table: RosettaTable, options: IndexOptions = {}): MatcherIndex {
  const warnings: string[] = [];
  const report = (message: string): void => {
    if (options.strict) {
      throw new RosettaTableError(message);
    }
    warnings.push(message);
  };

  // Stable sort keeps table order among entries of equal length
  const orderedEntries = [...table.entries].sort((a, b) => longestPattern(b) - longestPattern(a));

  // Pattern → symbol follows matcher order, so lookups agree with substitution
  const patternToSymbol = new Map<string, string>();
  const compiled: CompiledEntry[] = [];

  for (const entry of orderedEntries) {
    const patterns: CompiledPattern[] = [];
    for (const pattern of entry.patterns) {
      const key = normalizePattern(pattern);
      const owner = patternToSymbol.get(key);
      if (owner !== undefined) {
        report(`Pattern "${pattern}" of ${entry.symbol} is unreachable: already mapped to ${owner}`);
        continue;
      }
      patternToSymbol.set(key, entry.symbol);
      patterns.push(compilePattern(entry, pattern));
    }
    compiled.push(Object.freeze({ entry, patterns: Object.freeze(patterns) }));
  }

  // Symbol → primary pattern: first table occurrence wins
  const symbolToPrimaryPattern = new Map<string, string>();
  const symbolCategory = new Map<string, string>();
  for (const entry of table.entries) {
    const existing = symbolToPrimaryPattern.get(entry.symbol);
    if (existing !== undefined) {
      report(
        `Symbol ${entry.symbol} is declared for both ${symbolCategory.get(entry.symbol)} and ${entry.category}; ` +
        `it expands to "${existing}"`
      );
      continue;
    }
    symbolToPrimaryPattern.set(entry.symbol, entry.patterns[0]);
    symbolCategory.set(entry.symbol, entry.category);
  }

  const expansions = [...symbolToPrimaryPattern.entries()]
    .map(([symbol, primary]) => expansionRule(symbol, primary))
    .sort((a, b) => symbolLength(b.symbol) - symbolLength(a.symbol));

  const onWarning = options.onWarning ?? ((message: string) => logger.warn(message));
  for (const warning of warnings) {
    onWarning(warning);
  }

  return Object.freeze({
    patternToSymbol,
    symbolToPrimaryPattern,
    orderedEntries: Object.freeze(orderedEntries),
    compiled: Object.freeze(compiled),
    expansions: Object.freeze(expansions),
    warnings: Object.freeze(warnings),
  });
}
