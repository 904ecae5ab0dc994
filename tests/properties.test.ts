/**
 * Property Tests over generated input
 */

import { describe, it, expect } from 'vitest';
import { getRosetta, forwardMatch, reverseExpand } from '../src/rosetta/engine.js';
import { classifyTier } from '../src/rosetta/classifier.js';
import { convert, toProse } from '../src/document/converter.js';
import type { ConversionTier } from '../src/types.js';

const now = () => new Date('2024-01-15T12:00:00Z');

const CASES = 300;
const FULL_TIER_BLOCKS = ['⟦Ω:Meta⟧', '⟦Σ:Types⟧', '⟦Γ:Rules⟧', '⟦Ε⟧'];

// xorshift32, so every run sees the same inputs
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    state >>>= 0;
    return state;
  };
}

function pick<T>(next: () => number, items: readonly T[]): T {
  return items[next() % items.length];
}

const FILLER = [
  'user', 'order', 'value', 'stock', 'item', 'name', 'count', 'the', 'a', 'with',
  'service', 'must', 'type', 'prove', 'goal', 'invariant', 'list', 'record',
  'quickly', 'never', 'returns', 'api', 'if', 'then', 'Total', 'café',
];

const entries = getRosetta().table.entries;
const proseVocabulary = [...entries.flatMap(entry => entry.patterns), ...FILLER];
const symbolicParts = [...entries.map(entry => entry.symbol), 'x', 'y', 'S', 'f', '(', ')', ' ', 'userId', '.', ':'];

function generateProse(count: number, seed: number): string[] {
  const next = seededRandom(seed);
  return Array.from({ length: count }, () => {
    const words = (next() % 10) + 3;
    return Array.from({ length: words }, () => pick(next, proseVocabulary)).join(' ');
  });
}

function generateSymbolic(count: number, seed: number): string[] {
  const next = seededRandom(seed);
  return Array.from({ length: count }, () => {
    const parts = (next() % 8) + 2;
    return Array.from({ length: parts }, () => pick(next, symbolicParts)).join('');
  });
}

describe('Properties', () => {
  const proseInputs = generateProse(CASES, 20240115);
  const symbolicInputs = generateSymbolic(CASES, 7);

  it('should keep confidence within bounds', () => {
    for (const prose of proseInputs) {
      const { confidence } = forwardMatch(prose);
      expect(confidence).toBeGreaterThanOrEqual(0);
      expect(confidence).toBeLessThanOrEqual(1);
    }
  });

  it('should match deterministically', () => {
    for (const prose of proseInputs) {
      expect(forwardMatch(prose)).toEqual(forwardMatch(prose));
    }
  });

  it('should not change expanded prose on a second expansion', () => {
    for (const prose of proseInputs) {
      const once = reverseExpand(forwardMatch(prose).symbolicText);
      expect(reverseExpand(once)).toBe(once);
    }
  });

  it('should not change expanded symbol strings on a second expansion', () => {
    for (const symbolic of symbolicInputs) {
      const once = reverseExpand(symbolic);
      expect(reverseExpand(once)).toBe(once);
    }
  });

  it('should produce output and the required blocks for full documents', () => {
    const tiers = new Set<ConversionTier>();
    for (const prose of proseInputs) {
      const result = convert(prose, { now });
      tiers.add(result.tier);

      expect(result.output.length).toBeGreaterThan(0);
      if (result.tier === 'full') {
        for (const block of FULL_TIER_BLOCKS) {
          expect(result.output).toContain(block);
        }
      }
    }
    expect([...tiers].sort()).toEqual(['full', 'minimal', 'standard']);
  });

  it('should include every block whenever the full tier is forced', () => {
    for (const prose of proseInputs) {
      const { output } = convert(prose, { tier: 'full', now });
      for (const block of FULL_TIER_BLOCKS) {
        expect(output).toContain(block);
      }
    }
  });

  it('should keep the tier across a round trip', () => {
    const cases: Array<[string, ConversionTier]> = [
      ['Define x as 5', 'minimal'],
      ['The user must authenticate to access the API', 'standard'],
      ['Define a type User and prove all users are valid', 'full'],
    ];
    for (const [prose, tier] of cases) {
      expect(classifyTier(prose)).toBe(tier);
      expect(classifyTier(toProse(convert(prose, { now }).output))).toBe(tier);
    }
  });
});
