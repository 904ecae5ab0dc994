/**
 * Rosetta engine - binds a table to the forward and reverse matchers
 *
 * The default engine is built from the bundled table on first use and shared
 * read-only afterwards. Alternate tables get their own engine through
 * createRosetta().
 */

import type { Category, ConversionOutcome, RosettaTable } from '../types.js';
import { loadRosettaTable } from './table.js';
import { buildRosettaIndex, normalizePattern, type IndexOptions, type MatcherIndex } from './indexes.js';
import { matchProse } from './forward.js';
import { expandToProse } from './reverse.js';

export interface Rosetta {
  readonly table: RosettaTable;
  readonly index: MatcherIndex;
  forwardMatch(text: string): ConversionOutcome;
  reverseExpand(symbolic: string): string;
  proseToSymbol(pattern: string): string | undefined;
  symbolToProse(symbol: string): string | undefined;
  symbolsByCategory(category: Category): string[];
  mappingCount(): number;
  allCategories(): Category[];
}

export interface RosettaOptions extends IndexOptions {
  /** Table file to load when no table is given */
  tablePath?: string;
}

export function createRosetta(table: RosettaTable, options: IndexOptions = {}): Rosetta {
  const index = buildRosettaIndex(table, options);

  return Object.freeze({
    table,
    index,
    forwardMatch: (text: string) => matchProse(index, text),
    reverseExpand: (symbolic: string) => expandToProse(index, symbolic),
    proseToSymbol: (pattern: string) => index.patternToSymbol.get(normalizePattern(pattern)),
    symbolToProse: (symbol: string) => index.symbolToPrimaryPattern.get(symbol),
    symbolsByCategory: (category: Category) =>
      table.entries.filter(e => e.category === category).map(e => e.symbol),
    mappingCount: () => table.entries.reduce((sum, e) => sum + e.patterns.length, 0),
    allCategories: () => [...new Set(table.entries.map(e => e.category))].sort(),
  });
}

// Process-wide default, assigned once after a complete build
let defaultRosetta: Rosetta | null = null;

/**
 * Build and install the default engine. Only the first call builds; later
 * calls with options are rejected so the shared table never changes.
 */
export function initRosetta(options: RosettaOptions = {}): Rosetta {
  if (defaultRosetta) {
    throw new Error('Rosetta engine is already initialized');
  }
  const { tablePath, ...indexOptions } = options;
  defaultRosetta = createRosetta(loadRosettaTable(tablePath), indexOptions);
  return defaultRosetta;
}

export function getRosetta(): Rosetta {
  return defaultRosetta ?? initRosetta();
}

// Convenience wrappers over the default engine

export function forwardMatch(text: string): ConversionOutcome {
  return getRosetta().forwardMatch(text);
}

export function reverseExpand(symbolic: string): string {
  return getRosetta().reverseExpand(symbolic);
}

export function proseToSymbol(pattern: string): string | undefined {
  return getRosetta().proseToSymbol(pattern);
}

export function symbolToProse(symbol: string): string | undefined {
  return getRosetta().symbolToProse(symbol);
}

export function symbolsByCategory(category: Category): string[] {
  return getRosetta().symbolsByCategory(category);
}

export function mappingCount(): number {
  return getRosetta().mappingCount();
}

export function allCategories(): Category[] {
  return getRosetta().allCategories();
}
