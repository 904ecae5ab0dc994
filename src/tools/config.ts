/**
 * glyph_config - Configure conversion settings
 */

import type { ConfigInput, GlyphConfig } from '../types.js';
import { TIERS } from '../types.js';
import { getConfigForDisplay, updateConfig, validateConfig } from '../config/index.js';
import { toArgs, optionalBoolean, optionalEnum, optionalNumber } from './args.js';

export interface ConfigResult {
  success: boolean;
  config?: Record<string, unknown>;
  message: string;
  warnings?: string[];
}

export function parseConfigInput(raw: unknown): ConfigInput {
  const args = toArgs(raw);
  return {
    default_tier: optionalEnum(args, 'default_tier', ['auto', ...TIERS]),
    confidence_threshold: optionalNumber(args, 'confidence_threshold'),
    log_level: optionalEnum(args, 'log_level', ['silent', 'warn', 'info']),
    show: optionalBoolean(args, 'show'),
  };
}

/**
 * Configure conversion settings
 */
export function config(input: ConfigInput): ConfigResult {
  // Show current config
  if (input.show) {
    const validation = validateConfig();

    return {
      success: true,
      config: getConfigForDisplay(),
      message: 'Current configuration:',
      warnings: validation.issues.length > 0 ? validation.issues : undefined,
    };
  }

  const updates: Partial<GlyphConfig> = {};
  const changed: string[] = [];

  if (input.default_tier !== undefined) {
    updates.default_tier = input.default_tier;
    changed.push(`default_tier=${input.default_tier}`);
  }

  if (input.confidence_threshold !== undefined) {
    if (input.confidence_threshold < 0 || input.confidence_threshold > 1) {
      return {
        success: false,
        message: 'confidence_threshold must be between 0 and 1.',
      };
    }
    updates.confidence_threshold = input.confidence_threshold;
    changed.push(`confidence_threshold=${input.confidence_threshold}`);
  }

  if (input.log_level !== undefined) {
    updates.log_level = input.log_level;
    changed.push(`log_level=${input.log_level}`);
  }

  if (changed.length > 0) {
    updateConfig(updates);
    const validation = validateConfig();

    return {
      success: true,
      config: getConfigForDisplay(),
      message: `Updated ${changed.join(', ')}.`,
      warnings: validation.issues.length > 0 ? validation.issues : undefined,
    };
  }

  // No action specified - show help
  return {
    success: true,
    config: getConfigForDisplay(),
    message: `Conversion settings. Use parameters to update:
- default_tier: auto, minimal, standard or full
- confidence_threshold: flag conversions below this confidence (0-1)
- log_level: silent, warn or info (stderr diagnostics)
- show: Display current configuration`,
  };
}

/**
 * Tool definition for MCP
 */
export const configToolDef = {
  name: 'glyph_config',
  description: 'Show or change conversion settings: default tier, confidence threshold and log level.',
  inputSchema: {
    type: 'object',
    properties: {
      default_tier: {
        type: 'string',
        enum: ['auto', 'minimal', 'standard', 'full'],
        description: 'Tier used when a request does not name one.',
      },
      confidence_threshold: {
        type: 'number',
        minimum: 0,
        maximum: 1,
        description: 'Conversions below this confidence are flagged.',
      },
      log_level: {
        type: 'string',
        enum: ['silent', 'warn', 'info'],
        description: 'Diagnostics written to stderr.',
      },
      show: {
        type: 'boolean',
        description: 'Display current configuration settings.',
      },
    },
  },
};
