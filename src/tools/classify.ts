/**
 * glyph_classify - Pick a conversion tier for prose
 */

import type { ClassifyInput, ConversionTier } from '../types.js';
import { detectTierSignals, tierFromSignals, type TierSignals } from '../rosetta/index.js';
import { toArgs, requireString } from './args.js';

export interface ClassifyResult {
  success: boolean;
  tier: ConversionTier;
  signals: TierSignals;
}

export function parseClassifyInput(raw: unknown): ClassifyInput {
  return { text: requireString(toArgs(raw), 'text') };
}

export function classify(input: ClassifyInput): ClassifyResult {
  const signals = detectTierSignals(input.text);
  return {
    success: true,
    tier: tierFromSignals(signals),
    signals,
  };
}

/**
 * Tool definition for MCP
 */
export const classifyToolDef = {
  name: 'glyph_classify',
  description: 'Classify prose into a conversion tier (minimal, standard or full) and report which vocabulary detectors fired.',
  inputSchema: {
    type: 'object',
    properties: {
      text: {
        type: 'string',
        description: 'The prose to classify.',
      },
    },
    required: ['text'],
  },
};
