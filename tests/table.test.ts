/**
 * Rosetta Table Tests
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import {
  defineRosettaTable,
  parseRosettaTable,
  loadRosettaTable,
  RosettaTableError,
} from '../src/rosetta/table.js';
import { CATEGORIES } from '../src/types.js';

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe('Rosetta Table', () => {
  describe('loadRosettaTable', () => {
    it('should load the bundled table', () => {
      const table = loadRosettaTable();

      expect(table.version).toBe('5.1');
      expect(table.entries).toHaveLength(85);
      expect(table.entries[0]).toEqual({
        symbol: '∀',
        patterns: ['for all', 'for every', 'every', 'all', 'each', 'any'],
        category: 'quantifier',
      });
    });

    it('should only use known categories', () => {
      const table = loadRosettaTable();
      for (const entry of table.entries) {
        expect(CATEGORIES).toContain(entry.category);
      }
    });

    it('should freeze the table and its entries', () => {
      const table = loadRosettaTable();

      expect(Object.isFrozen(table)).toBe(true);
      expect(Object.isFrozen(table.entries)).toBe(true);
      expect(Object.isFrozen(table.entries[0].patterns)).toBe(true);
    });

    it('should load a table from another path', () => {
      const table = loadRosettaTable(fixture('small-table.json'));

      expect(table.version).toBe('test-1');
      expect(table.entries.map(e => e.symbol)).toEqual(['∀', '∧', '⊤']);
    });

    it('should reject a missing file', () => {
      expect(() => loadRosettaTable(fixture('no-such-table.json'))).toThrow(RosettaTableError);
    });

    it('should reject a file that is not JSON', () => {
      expect(() => loadRosettaTable(fixture('not-json.txt'))).toThrow(/is not valid JSON/);
    });
  });

  describe('defineRosettaTable', () => {
    it('should default the version to custom', () => {
      const table = defineRosettaTable([{ symbol: '∧', patterns: ['and'], category: 'logic' }]);
      expect(table.version).toBe('custom');
    });

    it('should reject an entry with no patterns', () => {
      expect(() => defineRosettaTable([{ symbol: '∧', patterns: [], category: 'logic' }]))
        .toThrow('Entry 0 (∧) has no patterns');
    });

    it('should reject a blank pattern', () => {
      expect(() => defineRosettaTable([
        { symbol: '∧', patterns: ['and'], category: 'logic' },
        { symbol: '∨', patterns: ['or', '  '], category: 'logic' },
      ])).toThrow('Entry 1 (∨) has a blank pattern');
    });

    it('should reject an empty symbol', () => {
      expect(() => defineRosettaTable([{ symbol: '', patterns: ['and'], category: 'logic' }]))
        .toThrow('Entry 0 has an empty symbol');
    });

    it('should reject an unknown category', () => {
      expect(() => defineRosettaTable([{ symbol: '∧', patterns: ['and'], category: 'boolean' }]))
        .toThrow('Entry 0 (∧) has unknown category: boolean');
    });

    it('should reject entries that are not objects', () => {
      expect(() => defineRosettaTable(['∧'])).toThrow('Entry 0 is not an object');
    });
  });

  describe('parseRosettaTable', () => {
    it('should require an entries array', () => {
      expect(() => parseRosettaTable({ version: '1' })).toThrow(RosettaTableError);
      expect(() => parseRosettaTable([])).toThrow(RosettaTableError);
    });

    it('should mark a table without version as unknown', () => {
      const table = parseRosettaTable({ entries: [{ symbol: '∧', patterns: ['and'], category: 'logic' }] });
      expect(table.version).toBe('unknown');
    });
  });
});
