/**
 * MCP Tools Module
 */

import { encode, encodeToolDef, parseEncodeInput } from './encode.js';
import { decode, decodeToolDef, parseDecodeInput } from './decode.js';
import { classify, classifyToolDef, parseClassifyInput } from './classify.js';
import { compare, similarityToolDef, parseSimilarityInput } from './similarity.js';
import { drift, driftToolDef, parseDriftInput } from './drift.js';
import { lookup, lookupToolDef, parseLookupInput } from './lookup.js';
import { stats, statsToolDef } from './stats.js';
import { config, configToolDef, parseConfigInput } from './config.js';

export { encode, encodeToolDef, parseEncodeInput, type EncodeResult } from './encode.js';
export { decode, decodeToolDef, parseDecodeInput, findUnregisteredGlyphs, type DecodeResult } from './decode.js';
export { classify, classifyToolDef, parseClassifyInput, type ClassifyResult } from './classify.js';
export { compare, similarityToolDef, parseSimilarityInput, type SimilarityResult } from './similarity.js';
export { drift, driftToolDef, parseDriftInput, type DriftResult } from './drift.js';
export { lookup, lookupToolDef, parseLookupInput, type LookupResult } from './lookup.js';
export { stats, statsToolDef, type StatsResult } from './stats.js';
export { config, configToolDef, parseConfigInput, type ConfigResult } from './config.js';

export const toolDefs = [
  encodeToolDef,
  decodeToolDef,
  classifyToolDef,
  similarityToolDef,
  driftToolDef,
  lookupToolDef,
  statsToolDef,
  configToolDef,
];

/**
 * Run a tool by name. Returns undefined for unknown tools; argument errors throw.
 */
export function callTool(name: string, args: unknown): object | undefined {
  switch (name) {
    case 'glyph_encode':
      return encode(parseEncodeInput(args));
    case 'glyph_decode':
      return decode(parseDecodeInput(args));
    case 'glyph_classify':
      return classify(parseClassifyInput(args));
    case 'glyph_similarity':
      return compare(parseSimilarityInput(args));
    case 'glyph_drift':
      return drift(parseDriftInput(args));
    case 'glyph_lookup':
      return lookup(parseLookupInput(args));
    case 'glyph_stats':
      return stats();
    case 'glyph_config':
      return config(parseConfigInput(args));
    default:
      return undefined;
  }
}
