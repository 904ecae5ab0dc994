/**
 * glyph_similarity - Token-set similarity between two texts
 */

import type { SimilarityInput } from '../types.js';
import { similarity, tokenSet } from '../rosetta/index.js';
import { toArgs, requireString } from './args.js';

export interface SimilarityResult {
  success: boolean;
  similarity: number;
  shared: string[];
  onlyInA: string[];
  onlyInB: string[];
}

export function parseSimilarityInput(raw: unknown): SimilarityInput {
  const args = toArgs(raw);
  return {
    a: requireString(args, 'a'),
    b: requireString(args, 'b'),
  };
}

export function compare(input: SimilarityInput): SimilarityResult {
  const tokensA = tokenSet(input.a);
  const tokensB = tokenSet(input.b);

  return {
    success: true,
    similarity: similarity(input.a, input.b),
    shared: [...tokensA].filter(t => tokensB.has(t)).sort(),
    onlyInA: [...tokensA].filter(t => !tokensB.has(t)).sort(),
    onlyInB: [...tokensB].filter(t => !tokensA.has(t)).sort(),
  };
}

/**
 * Tool definition for MCP
 */
export const similarityToolDef = {
  name: 'glyph_similarity',
  description: 'Compare two texts by the Jaccard index of their word sets (0 = disjoint, 1 = same words). Useful for checking what a round-trip preserved.',
  inputSchema: {
    type: 'object',
    properties: {
      a: {
        type: 'string',
        description: 'First text.',
      },
      b: {
        type: 'string',
        description: 'Second text.',
      },
    },
    required: ['a', 'b'],
  },
};
