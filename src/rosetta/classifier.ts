/**
 * Tier Classifier
 *
 * Picks how much document scaffolding a piece of prose needs. Works on the raw
 * prose only; it never looks at matcher output.
 */

import type { ConversionTier } from '../types.js';
import { wordMatcher } from './boundary.js';

export type TierDetector = 'types' | 'rules' | 'proof' | 'logic' | 'api' | 'contract' | 'intent';

export const TIER_VOCABULARY: Record<TierDetector, readonly string[]> = {
  types: ['type', 'class', 'struct', 'interface', 'schema', 'model', 'entity'],
  rules: ['must', 'should', 'always', 'never', 'require', 'ensure', 'guarantee', 'constraint', 'rule'],
  proof: ['prove', 'verify', 'validate', 'certify', 'demonstrate', 'qed', 'proven'],
  logic: ['for all', 'there exists', 'if and only if', 'implies', 'therefore'],
  api: ['api', 'endpoint', 'route', 'controller', 'handler', 'service'],
  contract: ['delta', 'invariant', 'precondition', 'postcondition', 'requires', 'ensures'],
  intent: ['intent', 'goal', 'purpose', 'objective', 'fitness', 'risk', 'utility'],
};

const DETECTORS: Record<TierDetector, RegExp> = {
  types: wordMatcher(TIER_VOCABULARY.types),
  rules: wordMatcher(TIER_VOCABULARY.rules),
  proof: wordMatcher(TIER_VOCABULARY.proof),
  logic: wordMatcher(TIER_VOCABULARY.logic),
  api: wordMatcher(TIER_VOCABULARY.api),
  contract: wordMatcher(TIER_VOCABULARY.contract),
  intent: wordMatcher(TIER_VOCABULARY.intent),
};

// Word count above which prose is never Minimal
export const LONG_PROSE_WORDS = 20;

export interface TierSignals {
  types: boolean;
  rules: boolean;
  proof: boolean;
  logic: boolean;
  api: boolean;
  contract: boolean;
  intent: boolean;
  wordCount: number;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(word => word.length > 0).length;
}

export function detects(detector: TierDetector, text: string): boolean {
  return DETECTORS[detector].test(text);
}

/**
 * Evaluate every detector, for auditing a classification
 */
export function detectTierSignals(text: string): TierSignals {
  return {
    types: detects('types', text),
    rules: detects('rules', text),
    proof: detects('proof', text),
    logic: detects('logic', text),
    api: detects('api', text),
    contract: detects('contract', text),
    intent: detects('intent', text),
    wordCount: countWords(text),
  };
}

export function tierFromSignals(signals: TierSignals): ConversionTier {
  if (signals.proof || signals.contract || signals.intent || (signals.types && signals.rules)) {
    return 'full';
  }

  if (signals.types || signals.rules || signals.logic || signals.api || signals.wordCount > LONG_PROSE_WORDS) {
    return 'standard';
  }

  return 'minimal';
}

export function classifyTier(text: string): ConversionTier {
  return tierFromSignals(detectTierSignals(text));
}
