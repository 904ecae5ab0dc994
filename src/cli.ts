#!/usr/bin/env node
/**
 * Glyphstone CLI
 *
 * Command-line interface for converting between prose and symbolic notation.
 */

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

import { loadConfig, updateConfig, resetConfig, getConfigForDisplay, validateConfig } from './config/index.js';
import { initRosetta } from './rosetta/index.js';
import { TIERS } from './types.js';
import type { GlyphConfig } from './types.js';
import {
  encode,
  decode,
  classify,
  compare,
  drift,
  lookup,
  stats,
  parseEncodeInput,
  parseDriftInput,
  parseLookupInput,
  parseConfigInput,
} from './tools/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Package info
function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

const version = readVersion();

// Colors for terminal output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

function log(message: string, color: keyof typeof colors = 'reset'): void {
  console.log(`${colors[color]}${message}${colors.reset}`);
}

function success(message: string): void {
  log(`✓ ${message}`, 'green');
}

function info(message: string): void {
  log(`ℹ ${message}`, 'blue');
}

function warn(message: string): void {
  log(`⚠ ${message}`, 'yellow');
}

function error(message: string): void {
  log(`✗ ${message}`, 'red');
}

/**
 * Show help message
 */
function showHelp(): void {
  console.log(`
${colors.bright}Glyphstone${colors.reset} v${version}
Bidirectional prose ↔ symbol conversion

${colors.cyan}Usage:${colors.reset}
  glyphstone <command> [options] [text]

  Commands that take text read standard input when no text is given.

${colors.cyan}Commands:${colors.reset}
  encode            Convert prose to symbolic notation
  decode            Expand symbolic notation to prose
  classify          Show the tier chosen for prose
  similarity <a> <b>  Compare two texts
  drift             Measure meaning loss over repeated round-trips
  lookup            Query the mapping table
  stats             Show table statistics
  config            Manage configuration
  version           Show version
  help              Show this help

${colors.cyan}Encode Options:${colors.reset}
  --tier <tier>     auto, ${TIERS.join(', ')}
  --threshold <n>   Flag results below this confidence

${colors.cyan}Drift Options:${colors.reset}
  --rounds <n>      Number of round-trips (default 10)
  --mode <mode>     document or minimal

${colors.cyan}Lookup Options:${colors.reset}
  --pattern <text>  Symbol for a phrase
  --symbol <sym>    Prose for a symbol
  --category <cat>  Symbols in a category

${colors.cyan}Config Options:${colors.reset}
  --show                 Show current configuration
  --tier <tier>          Set default tier
  --threshold <n>        Set confidence threshold
  --log-level <level>    silent, warn or info
  --reset                Restore defaults

${colors.cyan}Examples:${colors.reset}
  glyphstone encode "for all x in S, x maps to y"
  glyphstone decode "∀x∈S:x→y"
  echo "Define x as 5" | glyphstone encode --tier minimal
  glyphstone drift --rounds 5 "The user must authenticate to access the API"
  glyphstone lookup --pattern "there exists"
`);
}

interface ParsedArgs {
  flags: Map<string, string | true>;
  positional: string[];
}

/**
 * Split "--name value" pairs from positional words
 */
function parseArgs(args: string[], booleanFlags: readonly string[] = []): ParsedArgs {
  const flags = new Map<string, string | true>();
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const name = arg.slice(2);
      const next = args[i + 1];
      if (booleanFlags.includes(name) || next === undefined) {
        flags.set(name, true);
      } else {
        flags.set(name, next);
        i++;
      }
    } else {
      positional.push(arg);
    }
  }

  return { flags, positional };
}

function flagString(parsed: ParsedArgs, name: string): string | undefined {
  const value = parsed.flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

function flagNumber(parsed: ParsedArgs, name: string): number | undefined {
  const value = flagString(parsed, name);
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n)) {
    throw new Error(`--${name} must be a number`);
  }
  return n;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * Text from positional arguments, or stdin when piped
 */
async function inputText(parsed: ParsedArgs): Promise<string> {
  if (parsed.positional.length > 0) {
    return parsed.positional.join(' ');
  }
  if (process.stdin.isTTY) {
    throw new Error('No text given. Pass it as an argument or pipe it on stdin.');
  }
  return (await readStdin()).trim();
}

async function encodeCommand(args: string[]): Promise<void> {
  const parsed = parseArgs(args);
  const input = parseEncodeInput({
    text: await inputText(parsed),
    tier: flagString(parsed, 'tier'),
    confidenceThreshold: flagNumber(parsed, 'threshold'),
  });

  const result = encode(input);
  console.log(result.output);
  info(`tier=${result.tier} confidence=${result.confidence.toFixed(2)} ratio=${result.tokens.ratio}`);
  if (result.unmapped.length > 0) {
    info(`unmapped: ${result.unmapped.join(', ')}`);
  }
  if (result.warning) {
    warn(result.warning);
  }
}

async function decodeCommand(args: string[]): Promise<void> {
  const text = await inputText(parseArgs(args));
  const result = decode({ text });
  console.log(result.prose);
  if (result.unregistered.length > 0) {
    warn(`No mapping for: ${result.unregistered.join(' ')}`);
  }
}

async function classifyCommand(args: string[]): Promise<void> {
  const text = await inputText(parseArgs(args));
  const result = classify({ text });
  log(result.tier, 'bright');
  for (const [signal, value] of Object.entries(result.signals)) {
    log(`  ${signal}: ${value}`);
  }
}

function similarityCommand(args: string[]): void {
  const [a, b] = args;
  if (a === undefined || b === undefined) {
    throw new Error('similarity needs two texts');
  }
  const result = compare({ a, b });
  log(result.similarity.toFixed(3), 'bright');
  info(`shared: ${result.shared.join(' ') || '(none)'}`);
  if (result.onlyInA.length > 0) info(`only in first: ${result.onlyInA.join(' ')}`);
  if (result.onlyInB.length > 0) info(`only in second: ${result.onlyInB.join(' ')}`);
}

async function driftCommand(args: string[]): Promise<void> {
  const parsed = parseArgs(args);
  const input = parseDriftInput({
    text: await inputText(parsed),
    rounds: flagNumber(parsed, 'rounds'),
    mode: flagString(parsed, 'mode'),
  });

  const result = drift(input);
  log(`\nDrift (${result.mode}, ${result.rounds.length} rounds)\n`, 'bright');
  for (const round of result.rounds) {
    log(`  #${round.round}  original=${round.similarityToOriginal.toFixed(3)}  previous=${round.similarityToPrevious.toFixed(3)}`);
  }
  log('');
  info(`final similarity: ${result.finalSimilarity.toFixed(3)}`);
  info(`total drift: ${result.totalDrift.toFixed(3)}`);
  info(`stable rounds: ${result.stableRounds}`);
}

function lookupCommand(args: string[]): void {
  const parsed = parseArgs(args);
  const result = lookup(parseLookupInput({
    pattern: flagString(parsed, 'pattern'),
    symbol: flagString(parsed, 'symbol'),
    category: flagString(parsed, 'category'),
  }));

  if (!result.success) {
    warn(result.message);
    process.exitCode = 1;
    return;
  }

  success(result.message);
  for (const entry of result.entries ?? []) {
    log(`  ${entry.symbol}  ${entry.patterns.join(', ')}  [${entry.category}]`);
  }
  if (result.categories) {
    log(`  ${result.categories.join(', ')}`);
  }
}

function statsCommand(): void {
  const result = stats().stats;

  log('\n📊 Glyphstone Statistics\n', 'bright');
  log(`Table ${result.table.version}`, 'cyan');
  log(`  Symbols: ${result.table.symbols}`);
  log(`  Patterns: ${result.table.patterns}`);
  for (const [category, count] of Object.entries(result.table.byCategory)) {
    log(`    ${category}: ${count}`);
  }
  for (const message of result.table.warnings) {
    warn(message);
  }

  log('');
  log('Settings', 'cyan');
  log(`  Default tier: ${result.config.defaultTier}`);
  log(`  Confidence threshold: ${result.config.confidenceThreshold}`);
  log(`  Log level: ${result.config.logLevel}`);
  log('');
}

function showConfig(): void {
  const display = getConfigForDisplay();
  log('\n⚙️  Configuration\n', 'bright');
  for (const [key, value] of Object.entries(display)) {
    log(`  ${key}: ${String(value)}`);
  }
  log('');

  const validation = validateConfig();
  for (const issue of validation.issues) {
    warn(issue);
  }
}

function configCommand(args: string[]): void {
  const parsed = parseArgs(args, ['show', 'reset']);

  if (parsed.flags.has('reset')) {
    resetConfig();
    success('Configuration reset to defaults');
    return;
  }

  const input = parseConfigInput({
    default_tier: flagString(parsed, 'tier'),
    confidence_threshold: flagNumber(parsed, 'threshold'),
    log_level: flagString(parsed, 'log-level'),
  });

  const updates: Partial<GlyphConfig> = {};
  if (input.default_tier !== undefined) updates.default_tier = input.default_tier;
  if (input.confidence_threshold !== undefined) updates.confidence_threshold = input.confidence_threshold;
  if (input.log_level !== undefined) updates.log_level = input.log_level;

  if (Object.keys(updates).length > 0) {
    if (input.confidence_threshold !== undefined && (input.confidence_threshold < 0 || input.confidence_threshold > 1)) {
      throw new Error('--threshold must be between 0 and 1');
    }
    updateConfig(updates);
    success('Configuration updated');
  }

  showConfig();
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];
  const rest = args.slice(1);

  const needsTable = ['encode', 'decode', 'classify', 'drift', 'lookup', 'stats'];
  if (command !== undefined && needsTable.includes(command)) {
    const config = loadConfig();
    initRosetta({ tablePath: config.table_path, strict: config.strict_table });
  }

  switch (command) {
    case 'encode':
      await encodeCommand(rest);
      break;
    case 'decode':
      await decodeCommand(rest);
      break;
    case 'classify':
      await classifyCommand(rest);
      break;
    case 'similarity':
      similarityCommand(rest);
      break;
    case 'drift':
      await driftCommand(rest);
      break;
    case 'lookup':
      lookupCommand(rest);
      break;
    case 'stats':
      statsCommand();
      break;
    case 'config':
      configCommand(rest);
      break;
    case 'version':
    case '-v':
    case '--version':
      console.log(`glyphstone v${version}`);
      break;
    case 'help':
    case '-h':
    case '--help':
    case undefined:
      showHelp();
      break;
    default:
      error(`Unknown command: ${command}`);
      showHelp();
      process.exit(1);
  }
}

main().catch(err => {
  error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
