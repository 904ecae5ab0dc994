/**
 * glyph_lookup - Query the mapping table
 */

import type { Category, LookupInput, MappingEntry } from '../types.js';
import { CATEGORIES } from '../types.js';
import { getRosetta } from '../rosetta/index.js';
import { toArgs, optionalString, optionalEnum } from './args.js';

export interface LookupResult {
  success: boolean;
  message: string;
  symbol?: string;
  prose?: string;
  entries?: MappingEntry[];
  categories?: Category[];
  mappingCount?: number;
}

export function parseLookupInput(raw: unknown): LookupInput {
  const args = toArgs(raw);
  return {
    pattern: optionalString(args, 'pattern'),
    symbol: optionalString(args, 'symbol'),
    category: optionalEnum(args, 'category', CATEGORIES),
  };
}

export function lookup(input: LookupInput): LookupResult {
  const rosetta = getRosetta();

  if (input.pattern !== undefined) {
    const symbol = rosetta.proseToSymbol(input.pattern);
    return {
      success: symbol !== undefined,
      message: symbol !== undefined
        ? `"${input.pattern}" maps to ${symbol}`
        : `No mapping for "${input.pattern}"`,
      symbol,
    };
  }

  if (input.symbol !== undefined) {
    const symbol = input.symbol;
    const prose = rosetta.symbolToProse(symbol);
    return {
      success: prose !== undefined,
      message: prose !== undefined
        ? `${symbol} expands to "${prose}"`
        : `Symbol ${symbol} is not in the table`,
      prose,
      entries: rosetta.table.entries.filter(e => e.symbol === symbol),
    };
  }

  if (input.category !== undefined) {
    const category = input.category;
    const entries = rosetta.table.entries.filter(e => e.category === category);
    return {
      success: true,
      message: `${entries.length} symbols in ${category}`,
      entries,
    };
  }

  return {
    success: true,
    message: `Table ${rosetta.table.version}: ${rosetta.table.entries.length} symbols, ${rosetta.mappingCount()} patterns`,
    categories: rosetta.allCategories(),
    mappingCount: rosetta.mappingCount(),
  };
}

/**
 * Tool definition for MCP
 */
export const lookupToolDef = {
  name: 'glyph_lookup',
  description: 'Look up the symbol for a phrase, the prose for a symbol, or every symbol in a category. With no arguments, lists the categories.',
  inputSchema: {
    type: 'object',
    properties: {
      pattern: {
        type: 'string',
        description: 'A phrase such as "for all". Matched case-insensitively.',
      },
      symbol: {
        type: 'string',
        description: 'A symbol such as ∀.',
      },
      category: {
        type: 'string',
        enum: [...CATEGORIES],
        description: 'List all entries in this category.',
      },
    },
  },
};
