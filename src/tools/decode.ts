/**
 * glyph_decode - Convert symbolic notation back to prose
 */

import type { DecodeInput } from '../types.js';
import { toProse } from '../document/index.js';
import { toArgs, requireString } from './args.js';

export interface DecodeResult {
  success: boolean;
  prose: string;
  // Symbol characters with no table entry, passed through verbatim
  unregistered: string[];
}

export function parseDecodeInput(raw: unknown): DecodeInput {
  return { text: requireString(toArgs(raw), 'text') };
}

// Non-ASCII characters that are not letters, marks, digits, punctuation or spaces
const GLYPH = /^[^\x00-\x7f\p{L}\p{M}\p{N}\p{P}\p{Z}]$/u;

export function findUnregisteredGlyphs(prose: string): string[] {
  const glyphs = new Set<string>();
  for (const char of prose) {
    if (GLYPH.test(char)) {
      glyphs.add(char);
    }
  }
  return [...glyphs];
}

/**
 * Decode symbolic text
 */
export function decode(input: DecodeInput): DecodeResult {
  const prose = toProse(input.text);

  return {
    success: true,
    prose,
    unregistered: findUnregisteredGlyphs(prose),
  };
}

/**
 * Tool definition for MCP
 */
export const decodeToolDef = {
  name: 'glyph_decode',
  description: 'Expand symbolic notation back into readable prose. Symbols without a table entry are passed through unchanged and listed.',
  inputSchema: {
    type: 'object',
    properties: {
      text: {
        type: 'string',
        description: 'Symbolic text: a bare body such as "∀x∈S" or a whole generated document.',
      },
    },
    required: ['text'],
  },
};
