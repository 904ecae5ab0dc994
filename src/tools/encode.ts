/**
 * glyph_encode - Convert prose to symbolic notation
 */

import type { EncodeInput, TokenStats, ConversionTier } from '../types.js';
import { TIERS } from '../types.js';
import { convert } from '../document/index.js';
import { getConfig } from '../config/index.js';
import { toArgs, requireString, optionalEnum, optionalNumber } from './args.js';

export interface EncodeResult {
  success: boolean;
  output: string;
  tier: ConversionTier;
  confidence: number;
  belowThreshold: boolean;
  unmapped: string[];
  tokens: TokenStats;
  warning?: string;
}

export function parseEncodeInput(raw: unknown): EncodeInput {
  const args = toArgs(raw);
  return {
    text: requireString(args, 'text'),
    tier: optionalEnum(args, 'tier', ['auto', ...TIERS]),
    confidenceThreshold: optionalNumber(args, 'confidenceThreshold'),
  };
}

/**
 * Encode prose
 */
export function encode(input: EncodeInput): EncodeResult {
  const config = getConfig();

  // Resolve 'auto' to classification inside convert()
  const preference = input.tier ?? config.default_tier;
  const tier = preference === 'auto' ? undefined : preference;

  const result = convert(input.text, {
    tier,
    confidenceThreshold: input.confidenceThreshold ?? config.confidence_threshold,
  });

  const warning = result.belowThreshold
    ? `Low confidence (${result.confidence.toFixed(2)}); ${result.unmapped.length} words had no mapping.`
    : undefined;

  return {
    success: true,
    output: result.output,
    tier: result.tier,
    confidence: result.confidence,
    belowThreshold: result.belowThreshold,
    unmapped: result.unmapped,
    tokens: result.tokens,
    warning,
  };
}

/**
 * Tool definition for MCP
 */
export const encodeToolDef = {
  name: 'glyph_encode',
  description: 'Convert natural-language prose into compact symbolic notation. Short prose is substituted directly; richer prose is wrapped in a document with header, types, rules and evidence blocks.',
  inputSchema: {
    type: 'object',
    properties: {
      text: {
        type: 'string',
        description: 'The prose to convert.',
      },
      tier: {
        type: 'string',
        enum: ['auto', 'minimal', 'standard', 'full'],
        description: 'Amount of document scaffolding. auto picks a tier from the vocabulary of the text. Default: configured default_tier',
      },
      confidenceThreshold: {
        type: 'number',
        minimum: 0,
        maximum: 1,
        description: 'Flag conversions whose confidence falls below this value. Default: configured confidence_threshold',
      },
    },
    required: ['text'],
  },
};
