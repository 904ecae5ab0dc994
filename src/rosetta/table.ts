/**
 * Rosetta Table - symbol ↔ prose pattern dictionary
 *
 * The default table lives in data/rosetta.json. Tables are validated and
 * frozen on construction; nothing mutates them afterwards.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { CATEGORIES } from '../types.js';
import type { Category, MappingEntry, RosettaTable } from '../types.js';

export const DEFAULT_TABLE_PATH = fileURLToPath(new URL('../../data/rosetta.json', import.meta.url));

/**
 * Raised when a table is structurally unusable. Fatal at startup.
 */
export class RosettaTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RosettaTableError';
  }
}

function isCategory(value: unknown): value is Category {
  return typeof value === 'string' && (CATEGORIES as readonly string[]).includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate one raw entry, reporting its position on failure
 */
function parseEntry(raw: unknown, position: number): MappingEntry {
  if (!isRecord(raw)) {
    throw new RosettaTableError(`Entry ${position} is not an object`);
  }

  const { symbol, patterns, category } = raw;

  if (typeof symbol !== 'string' || symbol.trim() === '') {
    throw new RosettaTableError(`Entry ${position} has an empty symbol`);
  }
  if (!Array.isArray(patterns) || patterns.length === 0) {
    throw new RosettaTableError(`Entry ${position} (${symbol}) has no patterns`);
  }

  const parsedPatterns: string[] = [];
  for (const pattern of patterns) {
    if (typeof pattern !== 'string' || pattern.trim() === '') {
      throw new RosettaTableError(`Entry ${position} (${symbol}) has a blank pattern`);
    }
    parsedPatterns.push(pattern);
  }

  if (!isCategory(category)) {
    throw new RosettaTableError(`Entry ${position} (${symbol}) has unknown category: ${String(category)}`);
  }

  return Object.freeze({
    symbol,
    patterns: Object.freeze(parsedPatterns),
    category,
  });
}

/**
 * Build a frozen table from in-memory entries
 */
export function defineRosettaTable(entries: readonly unknown[], version: string = 'custom'): RosettaTable {
  return Object.freeze({
    version,
    entries: Object.freeze(entries.map((entry, i) => parseEntry(entry, i))),
  });
}

/**
 * Validate a parsed JSON document of the form { version, entries }
 */
export function parseRosettaTable(raw: unknown): RosettaTable {
  if (!isRecord(raw) || !Array.isArray(raw.entries)) {
    throw new RosettaTableError('Table must be an object with an "entries" array');
  }
  const version = typeof raw.version === 'string' ? raw.version : 'unknown';
  return defineRosettaTable(raw.entries, version);
}

/**
 * Load a table from disk (the bundled table by default)
 */
export function loadRosettaTable(path: string = DEFAULT_TABLE_PATH): RosettaTable {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new RosettaTableError(`Cannot read table at ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new RosettaTableError(`Table at ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseRosettaTable(raw);
}
