/**
 * MCP Tool Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { clearConfigCache, getConfig, updateConfig } from '../src/config/index.js';
import {
  toolDefs,
  callTool,
  encode,
  decode,
  classify,
  compare,
  drift,
  lookup,
  stats,
  config,
  findUnregisteredGlyphs,
} from '../src/tools/index.js';

describe('MCP Tools', () => {
  let home: string;
  let savedEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    savedEnv = { ...process.env };
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('GLYPHSTONE_')) delete process.env[key];
    }
    home = mkdtempSync(join(tmpdir(), 'glyphstone-tools-'));
    process.env.GLYPHSTONE_HOME = home;
    clearConfigCache();
  });

  afterEach(() => {
    process.env = savedEnv;
    clearConfigCache();
    rmSync(home, { recursive: true, force: true });
  });

  it('should define every tool', () => {
    expect(toolDefs.map(t => t.name)).toEqual([
      'glyph_encode',
      'glyph_decode',
      'glyph_classify',
      'glyph_similarity',
      'glyph_drift',
      'glyph_lookup',
      'glyph_stats',
      'glyph_config',
    ]);
  });

  describe('callTool', () => {
    it('should return undefined for unknown tools', () => {
      expect(callTool('glyph_translate', {})).toBeUndefined();
    });

    it('should reject malformed arguments', () => {
      expect(() => callTool('glyph_encode', {})).toThrow('"text" must be a string');
      expect(() => callTool('glyph_encode', { text: 'x', tier: 'huge' }))
        .toThrow('"tier" must be one of: auto, minimal, standard, full');
      expect(() => callTool('glyph_drift', { text: 'x', rounds: 'ten' })).toThrow('"rounds" must be a number');
      expect(() => callTool('glyph_lookup', { category: 'colour' })).toThrow(/"category" must be one of/);
      expect(() => callTool('glyph_similarity', ['a', 'b'])).toThrow('Tool arguments must be an object');
    });

    it('should dispatch by name', () => {
      expect(callTool('glyph_classify', { text: 'the goal is speed' })).toMatchObject({ tier: 'full' });
    });
  });

  describe('glyph_encode', () => {
    it('should classify and convert', () => {
      const result = encode({ text: 'Define x as 5' });

      expect(result).toEqual({
        success: true,
        output: 'x≜5',
        tier: 'minimal',
        confidence: 0,
        belowThreshold: true,
        unmapped: [],
        tokens: { input: 13, output: 3, ratio: 0.23 },
        warning: 'Low confidence (0.00); 0 words had no mapping.',
      });
    });

    it('should honour a requested tier and threshold', () => {
      const result = encode({ text: 'x and y', tier: 'minimal', confidenceThreshold: 0.4 });

      expect(result.output).toBe('x∧y');
      expect(result.belowThreshold).toBe(false);
      expect(result.warning).toBeUndefined();
    });

    it('should use the configured default tier', () => {
      updateConfig({ default_tier: 'standard' });
      expect(encode({ text: 'x and y' }).tier).toBe('standard');
    });
  });

  describe('glyph_decode', () => {
    it('should expand and list unregistered glyphs', () => {
      expect(decode({ text: '∀x∈S ☃' })).toEqual({
        success: true,
        prose: 'for all x in S ☃',
        unregistered: ['☃'],
      });
    });

    it('should not flag accented prose', () => {
      expect(decode({ text: 'café ⊤' })).toEqual({
        success: true,
        prose: 'café true',
        unregistered: [],
      });
    });
  });

  describe('findUnregisteredGlyphs', () => {
    it('should list distinct symbol characters', () => {
      expect(findUnregisteredGlyphs('a ☃ b ☃ ✓')).toEqual(['☃', '✓']);
      expect(findUnregisteredGlyphs('plain')).toEqual([]);
    });

    it('should skip letters, digits and punctuation outside ASCII', () => {
      expect(findUnregisteredGlyphs('naïve café, «quoted» Straße ½ ٣')).toEqual([]);
      expect(findUnregisteredGlyphs('cafe\u0301')).toEqual([]);
    });
  });

  describe('glyph_classify', () => {
    it('should return the tier with its signals', () => {
      const result = classify({ text: 'Define x as 5' });

      expect(result.tier).toBe('minimal');
      expect(result.signals.wordCount).toBe(4);
    });
  });

  describe('glyph_similarity', () => {
    it('should split shared and distinct words', () => {
      expect(compare({ a: 'a b c', b: 'b c d' })).toEqual({
        success: true,
        similarity: 0.5,
        shared: ['b', 'c'],
        onlyInA: ['a'],
        onlyInB: ['d'],
      });
    });
  });

  describe('glyph_drift', () => {
    it('should summarise the rounds', () => {
      const result = drift({ text: 'for all x in S', rounds: 2, mode: 'minimal' });

      expect(result).toEqual({
        success: true,
        mode: 'minimal',
        rounds: [
          { round: 1, similarityToOriginal: 1, similarityToPrevious: 0 },
          { round: 2, similarityToOriginal: 1, similarityToPrevious: 1 },
        ],
        totalDrift: 0,
        finalSimilarity: 1,
        stableRounds: 1,
        finalProse: 'for all x in S',
      });
    });
  });

  describe('glyph_lookup', () => {
    it('should find the symbol for a phrase', () => {
      expect(lookup({ pattern: 'There Exists' })).toEqual({
        success: true,
        message: '"There Exists" maps to ∃',
        symbol: '∃',
      });
    });

    it('should report unknown phrases', () => {
      expect(lookup({ pattern: 'zebra' })).toEqual({
        success: false,
        message: 'No mapping for "zebra"',
        symbol: undefined,
      });
    });

    it('should find the prose and entries for a symbol', () => {
      const result = lookup({ symbol: 'μ' });

      expect(result.prose).toBe('least fixpoint');
      expect(result.entries?.map(e => e.category)).toEqual(['function', 'intent']);
    });

    it('should list a category', () => {
      const result = lookup({ category: 'tier' });

      expect(result.message).toBe('5 symbols in tier');
      expect(result.entries?.map(e => e.symbol)).toEqual(['◊⁺⁺', '◊⁺', '◊', '◊⁻', '⊘']);
    });

    it('should summarise the table without arguments', () => {
      const result = lookup({});

      expect(result.message).toBe('Table 5.1: 85 symbols, 342 patterns');
      expect(result.mappingCount).toBe(342);
      expect(result.categories).toHaveLength(14);
    });
  });

  describe('glyph_stats', () => {
    it('should report table statistics and settings', () => {
      const result = stats();

      expect(result.stats.table).toMatchObject({ version: '5.1', symbols: 85, patterns: 342 });
      expect(result.stats.table.byCategory.quantifier).toBe(4);
      expect(result.stats.table.warnings).toHaveLength(5);
      expect(result.stats.config).toEqual({ defaultTier: 'auto', confidenceThreshold: 0.8, logLevel: 'warn' });
      expect(Object.keys(result.stats)).toEqual(['table', 'config']);
    });
  });

  describe('glyph_config', () => {
    it('should show the configuration', () => {
      const result = config({ show: true });

      expect(result.message).toBe('Current configuration:');
      expect(result.config).toMatchObject({ default_tier: 'auto', table_path: '(bundled)' });
      expect(result.warnings).toBeUndefined();
    });

    it('should update settings', () => {
      const result = config({ default_tier: 'full', log_level: 'info' });

      expect(result.success).toBe(true);
      expect(result.message).toBe('Updated default_tier=full, log_level=info.');
      expect(getConfig().default_tier).toBe('full');
      expect(getConfig().log_level).toBe('info');
    });

    it('should reject an out-of-range threshold', () => {
      expect(config({ confidence_threshold: 2 })).toEqual({
        success: false,
        message: 'confidence_threshold must be between 0 and 1.',
      });
    });

    it('should warn about a zero threshold', () => {
      expect(config({ confidence_threshold: 0 }).warnings).toEqual([
        'Confidence threshold is 0; low-confidence conversions will never be flagged.',
      ]);
    });

    it('should describe the options without arguments', () => {
      expect(config({}).message).toContain('default_tier: auto, minimal, standard or full');
    });
  });
});
