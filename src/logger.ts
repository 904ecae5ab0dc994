/**
 * Stderr logging
 *
 * stdout carries the MCP protocol, so everything goes to stderr.
 */

import type { LogLevel } from './types.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  warn: 1,
  info: 2,
};

let currentLevel: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[currentLevel] >= LEVEL_ORDER[level];
}

export const logger = {
  info(message: string, ...details: unknown[]): void {
    if (enabled('info')) console.error(`[glyphstone] ${message}`, ...details);
  },
  warn(message: string, ...details: unknown[]): void {
    if (enabled('warn')) console.error(`[glyphstone] warning: ${message}`, ...details);
  },
  // Errors are always reported
  error(message: string, ...details: unknown[]): void {
    console.error(`[glyphstone] ${message}`, ...details);
  },
};
