// Rosetta table types
export const CATEGORIES = [
  'quantifier',
  'logic',
  'comparison',
  'definition',
  'function',
  'set',
  'contractor',
  'intent',
  'type',
  'truth',
  'special',
  'math',
  'block',
  'tier',
] as const;

export type Category = (typeof CATEGORIES)[number];

export interface MappingEntry {
  readonly symbol: string;
  readonly patterns: readonly string[];
  readonly category: Category;
}

export interface RosettaTable {
  readonly version: string;
  readonly entries: readonly MappingEntry[];
}

// Conversion tiers, ordered by scaffolding weight
export const TIERS = ['minimal', 'standard', 'full'] as const;
export type ConversionTier = (typeof TIERS)[number];

export interface ConversionOutcome {
  readonly symbolicText: string;
  readonly mappedCharacterCount: number;
  readonly unmappedWords: readonly string[];
  readonly confidence: number;  // 0..1
}

export interface TokenStats {
  input: number;
  output: number;
  ratio: number;
}

export interface ConversionResult {
  output: string;
  confidence: number;
  unmapped: string[];
  tier: ConversionTier;
  tokens: TokenStats;
  belowThreshold: boolean;   // confidence < configured threshold
}

// Configuration
export type TierPreference = ConversionTier | 'auto';
export type LogLevel = 'silent' | 'warn' | 'info';

export interface GlyphConfig {
  default_tier: TierPreference;
  confidence_threshold: number;
  strict_table: boolean;
  log_level: LogLevel;
  table_path?: string;
}

export const DEFAULT_CONFIG: GlyphConfig = {
  default_tier: 'auto',
  confidence_threshold: 0.8,
  strict_table: false,
  log_level: 'warn',
};

// MCP Tool inputs
export interface EncodeInput {
  text: string;
  tier?: TierPreference;
  confidenceThreshold?: number;
}

export interface DecodeInput {
  text: string;
}

export interface ClassifyInput {
  text: string;
}

export interface SimilarityInput {
  a: string;
  b: string;
}

export interface DriftInput {
  text: string;
  rounds?: number;
  mode?: 'document' | 'minimal';
}

export interface LookupInput {
  pattern?: string;
  symbol?: string;
  category?: Category;
}

export interface ConfigInput {
  default_tier?: TierPreference;
  confidence_threshold?: number;
  log_level?: LogLevel;
  show?: boolean;
}
