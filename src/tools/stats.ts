/**
 * glyph_stats - Table statistics
 */

import type { Category } from '../types.js';
import { getRosetta } from '../rosetta/index.js';
import { getConfig } from '../config/index.js';

export interface StatsResult {
  success: boolean;
  stats: {
    table: {
      version: string;
      symbols: number;
      patterns: number;
      byCategory: Partial<Record<Category, number>>;
      warnings: string[];
    };
    config: {
      defaultTier: string;
      confidenceThreshold: number;
      logLevel: string;
    };
  };
}

/**
 * Get table statistics
 */
export function stats(): StatsResult {
  const config = getConfig();
  const rosetta = getRosetta();

  const byCategory: Partial<Record<Category, number>> = {};
  for (const entry of rosetta.table.entries) {
    byCategory[entry.category] = (byCategory[entry.category] ?? 0) + 1;
  }

  return {
    success: true,
    stats: {
      table: {
        version: rosetta.table.version,
        symbols: rosetta.table.entries.length,
        patterns: rosetta.mappingCount(),
        byCategory,
        warnings: [...rosetta.index.warnings],
      },
      config: {
        defaultTier: config.default_tier,
        confidenceThreshold: config.confidence_threshold,
        logLevel: config.log_level,
      },
    },
  };
}

/**
 * Tool definition for MCP
 */
export const statsToolDef = {
  name: 'glyph_stats',
  description: 'Get statistics about the mapping table (symbols, patterns, categories, warnings) and the active settings.',
  inputSchema: {
    type: 'object',
    properties: {},
  },
};
