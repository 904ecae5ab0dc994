/**
 * Forward Matcher Tests
 */

import { describe, it, expect } from 'vitest';
import { forwardMatch } from '../src/rosetta/engine.js';
import {
  cleanupOperators,
  rewriteAssignments,
  findUnmappedWords,
  computeConfidence,
} from '../src/rosetta/forward.js';

describe('Forward Matcher', () => {
  describe('forwardMatch', () => {
    it('should convert quantifiers and membership', () => {
      const outcome = forwardMatch('for all x in S');

      expect(outcome.symbolicText).toBe('∀ x∈S');
      expect(outcome.mappedCharacterCount).toBe(9);
      expect(outcome.unmappedWords).toEqual([]);
      expect(outcome.confidence).toBeCloseTo(9 / 14);
    });

    it('should prefer the longest pattern', () => {
      const outcome = forwardMatch('for all x');

      expect(outcome.symbolicText).toBe('∀ x');
      expect(outcome.symbolicText).not.toContain('all');
    });

    it('should rewrite definitions', () => {
      expect(forwardMatch('Define x as 5').symbolicText).toBe('x≜5');
      expect(forwardMatch('let count = 0').symbolicText).toBe('count≜0');
    });

    it('should report identifiers left in assignments as unmapped', () => {
      const outcome = forwardMatch('const total = 10');

      expect(outcome.symbolicText).toBe('total≜10');
      expect(outcome.unmappedWords).toEqual(['total']);
      expect(outcome.confidence).toBe(0);
    });

    it('should match operator patterns without word boundaries', () => {
      expect(forwardMatch('x >= 5 and y <= 3').symbolicText).toBe('x ≥ 5∧y ≤ 3');
      expect(forwardMatch('a => b').symbolicText).toBe('a λ b');
    });

    it('should not match patterns inside longer words', () => {
      const outcome = forwardMatch('android orbit');

      expect(outcome.symbolicText).toBe('android orbit');
      expect(outcome.unmappedWords).toEqual(['android', 'orbit']);
    });

    it('should give shared patterns to the first matcher', () => {
      expect(forwardMatch('either a or b').symbolicText).toBe('∨a∨b');
      expect(forwardMatch('x minus y').symbolicText).toBe('x − y');
      expect(forwardMatch('f yields g').symbolicText).toBe('f ⊢ g');
    });

    it('should match case-insensitively', () => {
      const outcome = forwardMatch('AND Or nOt');

      expect(outcome.symbolicText).toBe('∧∨¬');
      expect(outcome.confidence).toBe(0.8);
    });

    it('should prefer negated membership over negation', () => {
      expect(forwardMatch('x is not in S').symbolicText).toBe('x is ∉ S');
    });

    it('should leave prose without vocabulary unchanged', () => {
      const outcome = forwardMatch('hello world');

      expect(outcome.symbolicText).toBe('hello world');
      expect(outcome.confidence).toBe(0);
      expect(outcome.unmappedWords).toEqual(['hello', 'world']);
    });

    it('should treat empty input as fully mapped', () => {
      const outcome = forwardMatch('');

      expect(outcome.symbolicText).toBe('');
      expect(outcome.confidence).toBe(1);
      expect(outcome.unmappedWords).toEqual([]);
    });

    it('should keep confidence within bounds', () => {
      const inputs = [
        'for all x in S',
        'x',
        'and and and and',
        'Every user has a name',
        '   ',
        '∀∃∄',
        'a'.repeat(5000),
        'or '.repeat(500),
      ];
      for (const input of inputs) {
        const { confidence } = forwardMatch(input);
        expect(confidence).toBeGreaterThanOrEqual(0);
        expect(confidence).toBeLessThanOrEqual(1);
      }
    });

    it('should be deterministic', () => {
      const input = 'there is no such element and every x is unique';
      expect(forwardMatch(input)).toEqual(forwardMatch(input));
    });

    it('should return a frozen outcome', () => {
      const outcome = forwardMatch('for all x');
      expect(Object.isFrozen(outcome)).toBe(true);
      expect(Object.isFrozen(outcome.unmappedWords)).toBe(true);
    });
  });

  describe('cleanupOperators', () => {
    it('should drop spaces around tight operators', () => {
      expect(cleanupOperators('x ≜ 5 ∧ y  →  z')).toBe('x≜5∧y→z');
    });

    it('should keep spaces around other symbols', () => {
      expect(cleanupOperators('∀ x ≥ 5')).toBe('∀ x ≥ 5');
    });
  });

  describe('rewriteAssignments', () => {
    it('should rewrite const, define and let', () => {
      expect(rewriteAssignments('const a = 1')).toBe('a≜1');
      expect(rewriteAssignments('DEFINE b AS 2')).toBe('b≜2');
      expect(rewriteAssignments('let c=3')).toBe('c≜3');
    });

    it('should not rewrite keywords inside other words', () => {
      expect(rewriteAssignments('outlet x = 3')).toBe('outlet x = 3');
    });
  });

  describe('findUnmappedWords', () => {
    it('should list sorted unique words of three or more letters', () => {
      expect(findUnmappedWords('The cat and the Dog ran to a cat')).toEqual(['and', 'cat', 'dog', 'ran']);
    });

    it('should ignore words inside symbol runs', () => {
      expect(findUnmappedWords('∀ x∈S')).toEqual([]);
    });
  });

  describe('computeConfidence', () => {
    it('should clamp to one', () => {
      expect(computeConfidence(10, 20)).toBe(1);
      expect(computeConfidence(10, 5)).toBe(0.5);
      expect(computeConfidence(0, 0)).toBe(1);
    });
  });
});
