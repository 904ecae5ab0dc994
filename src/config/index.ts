/**
 * Configuration Management
 *
 * Settings are stored in ~/.glyphstone/config.json (or $GLYPHSTONE_HOME)
 * and can be overridden with GLYPHSTONE_* environment variables.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { setLogLevel } from '../logger.js';
import { TIERS } from '../types.js';
import type { GlyphConfig, LogLevel, TierPreference } from '../types.js';
import { DEFAULT_CONFIG } from '../types.js';

const TIER_PREFERENCES: readonly string[] = ['auto', ...TIERS];
const LOG_LEVELS: readonly string[] = ['silent', 'warn', 'info'];

// In-memory config cache
let currentConfig: GlyphConfig | null = null;

/**
 * Data directory: $GLYPHSTONE_HOME or ~/.glyphstone
 */
export function getGlyphDir(): string {
  return process.env.GLYPHSTONE_HOME || join(homedir(), '.glyphstone');
}

function ensureGlyphDir(): void {
  const dir = getGlyphDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

export function getConfigPath(): string {
  return join(getGlyphDir(), 'config.json');
}

function isTierPreference(value: unknown): value is TierPreference {
  return typeof value === 'string' && TIER_PREFERENCES.includes(value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.includes(value);
}

function isThreshold(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 && value <= 1;
}

/**
 * Keep only well-formed known keys from a parsed config file
 */
export function sanitizeConfig(raw: unknown): Partial<GlyphConfig> {
  if (typeof raw !== 'object' || raw === null) {
    return {};
  }

  const result: Partial<GlyphConfig> = {};
  const entries = new Map(Object.entries(raw));

  const tier = entries.get('default_tier');
  if (isTierPreference(tier)) result.default_tier = tier;

  const threshold = entries.get('confidence_threshold');
  if (isThreshold(threshold)) result.confidence_threshold = threshold;

  const strict = entries.get('strict_table');
  if (typeof strict === 'boolean') result.strict_table = strict;

  const logLevel = entries.get('log_level');
  if (isLogLevel(logLevel)) result.log_level = logLevel;

  const tablePath = entries.get('table_path');
  if (typeof tablePath === 'string' && tablePath.length > 0) result.table_path = tablePath;

  return result;
}

/**
 * Environment overrides (GLYPHSTONE_DEFAULT_TIER, ...)
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<GlyphConfig> {
  const result: Partial<GlyphConfig> = {};

  if (isTierPreference(env.GLYPHSTONE_DEFAULT_TIER)) {
    result.default_tier = env.GLYPHSTONE_DEFAULT_TIER;
  }

  if (env.GLYPHSTONE_CONFIDENCE_THRESHOLD !== undefined) {
    const threshold = Number(env.GLYPHSTONE_CONFIDENCE_THRESHOLD);
    if (isThreshold(threshold)) result.confidence_threshold = threshold;
  }

  if (env.GLYPHSTONE_STRICT_TABLE !== undefined) {
    result.strict_table = env.GLYPHSTONE_STRICT_TABLE === 'true';
  }

  if (isLogLevel(env.GLYPHSTONE_LOG_LEVEL)) {
    result.log_level = env.GLYPHSTONE_LOG_LEVEL;
  }

  if (env.GLYPHSTONE_TABLE_PATH) {
    result.table_path = env.GLYPHSTONE_TABLE_PATH;
  }

  return result;
}

/**
 * Load configuration from disk or environment
 */
export function loadConfig(): GlyphConfig {
  if (currentConfig) {
    return currentConfig;
  }

  let config: GlyphConfig = { ...DEFAULT_CONFIG };

  const configPath = getConfigPath();
  if (existsSync(configPath)) {
    try {
      const fileContent = readFileSync(configPath, 'utf-8');
      config = { ...config, ...sanitizeConfig(JSON.parse(fileContent)) };
    } catch (error) {
      console.error('Failed to load config file:', error);
    }
  }

  config = { ...config, ...configFromEnv() };

  currentConfig = config;
  setLogLevel(config.log_level);

  return config;
}

/**
 * Save configuration to disk
 */
export function saveConfig(config: GlyphConfig): void {
  ensureGlyphDir();
  writeFileSync(getConfigPath(), JSON.stringify(config, null, 2), 'utf-8');
  currentConfig = config;
  setLogLevel(config.log_level);
}

/**
 * Update specific config values
 */
export function updateConfig(updates: Partial<GlyphConfig>): GlyphConfig {
  const config = loadConfig();
  const newConfig = { ...config, ...updates };
  saveConfig(newConfig);
  return newConfig;
}

/**
 * Get current config (cached)
 */
export function getConfig(): GlyphConfig {
  return loadConfig();
}

/**
 * Get config for display
 */
export function getConfigForDisplay(): Record<string, unknown> {
  const config = loadConfig();
  return {
    default_tier: config.default_tier,
    confidence_threshold: config.confidence_threshold,
    strict_table: config.strict_table,
    log_level: config.log_level,
    table_path: config.table_path ?? '(bundled)',
    config_path: getConfigPath(),
  };
}

/**
 * Reset config to defaults
 */
export function resetConfig(): GlyphConfig {
  currentConfig = null;
  const config = { ...DEFAULT_CONFIG };
  saveConfig(config);
  return config;
}

/**
 * Drop the cached config so the next load rereads disk and environment
 */
export function clearConfigCache(): void {
  currentConfig = null;
}

/**
 * Validate config and return any issues
 */
export function validateConfig(): { valid: boolean; issues: string[] } {
  const config = loadConfig();
  const issues: string[] = [];

  if (config.table_path && !existsSync(config.table_path)) {
    issues.push(`Table file not found: ${config.table_path}`);
  }

  if (config.confidence_threshold === 0) {
    issues.push('Confidence threshold is 0; low-confidence conversions will never be flagged.');
  }

  return {
    valid: issues.length === 0,
    issues,
  };
}
