/**
 * Converter - tiered prose → document conversion
 *
 * Minimal: bare symbol substitution.
 * Standard: + header, meta and evidence blocks.
 * Full: + inferred types, rules and errors.
 */

import type { ConversionResult, ConversionTier } from '../types.js';
import { classifyTier, getRosetta, type Rosetta } from '../rosetta/index.js';
import { extractDomain, inferErrors, inferRules, inferTypes } from './inference.js';
import { formatDate, renderFull, renderStandard } from './template.js';

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.8;

export interface ConvertOptions {
  /** Force a tier instead of classifying the prose */
  tier?: ConversionTier;
  confidenceThreshold?: number;
  /** Clock for the document date */
  now?: () => Date;
  rosetta?: Rosetta;
}

export function tokenRatio(inputLength: number, outputLength: number): number {
  if (inputLength === 0) {
    return 0;
  }
  return Math.round((outputLength / inputLength) * 100) / 100;
}

function renderDocument(prose: string, body: string, tier: ConversionTier, date: string): string {
  switch (tier) {
    case 'minimal':
      return body;
    case 'standard':
      return renderStandard({ domain: extractDomain(prose), date, body });
    case 'full':
      return renderFull({
        domain: extractDomain(prose),
        date,
        body,
        types: inferTypes(prose),
        rules: inferRules(prose),
        errors: inferErrors(prose),
      });
  }
}

/**
 * Convert prose to a symbolic document
 */
export function convert(prose: string, options: ConvertOptions = {}): ConversionResult {
  const rosetta = options.rosetta ?? getRosetta();
  const tier = options.tier ?? classifyTier(prose);
  const threshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
  const date = formatDate((options.now ?? (() => new Date()))());

  const outcome = rosetta.forwardMatch(prose);
  const output = renderDocument(prose, outcome.symbolicText, tier, date);

  return {
    output,
    confidence: outcome.confidence,
    unmapped: [...outcome.unmappedWords],
    tier,
    tokens: {
      input: prose.length,
      output: output.length,
      ratio: tokenRatio(prose.length, output.length),
    },
    belowThreshold: outcome.confidence < threshold,
  };
}

/**
 * Convert symbolic text (a bare body or a whole document) back to prose
 */
export function toProse(symbolic: string, rosetta: Rosetta = getRosetta()): string {
  return rosetta.reverseExpand(symbolic);
}
