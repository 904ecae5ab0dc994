/**
 * glyph_drift - Measure meaning loss over repeated round-trips
 */

import type { DriftInput } from '../types.js';
import { measureDrift, DEFAULT_DRIFT_ROUNDS, MAX_DRIFT_ROUNDS, type DriftMode } from '../document/index.js';
import { toArgs, requireString, optionalNumber, optionalEnum } from './args.js';

export interface DriftResult {
  success: boolean;
  mode: DriftMode;
  rounds: Array<{ round: number; similarityToOriginal: number; similarityToPrevious: number }>;
  totalDrift: number;
  finalSimilarity: number;
  stableRounds: number;
  finalProse: string;
}

export function parseDriftInput(raw: unknown): DriftInput {
  const args = toArgs(raw);
  return {
    text: requireString(args, 'text'),
    rounds: optionalNumber(args, 'rounds'),
    mode: optionalEnum(args, 'mode', ['document', 'minimal']),
  };
}

export function drift(input: DriftInput): DriftResult {
  const report = measureDrift(input.text, { rounds: input.rounds, mode: input.mode });
  const last = report.rounds[report.rounds.length - 1];

  return {
    success: true,
    mode: report.mode,
    rounds: report.rounds.map(r => ({
      round: r.round,
      similarityToOriginal: r.similarityToOriginal,
      similarityToPrevious: r.similarityToPrevious,
    })),
    totalDrift: report.totalDrift,
    finalSimilarity: report.finalSimilarity,
    stableRounds: report.stableRounds,
    finalProse: last.prose,
  };
}

/**
 * Tool definition for MCP
 */
export const driftToolDef = {
  name: 'glyph_drift',
  description: 'Run repeated prose → symbols → prose cycles and report how much meaning survives each round.',
  inputSchema: {
    type: 'object',
    properties: {
      text: {
        type: 'string',
        description: 'The prose to cycle.',
      },
      rounds: {
        type: 'number',
        minimum: 1,
        maximum: MAX_DRIFT_ROUNDS,
        description: `Number of round-trips. Default: ${DEFAULT_DRIFT_ROUNDS}`,
      },
      mode: {
        type: 'string',
        enum: ['document', 'minimal'],
        description: 'document: convert with automatic tiers; minimal: bare symbol substitution. Default: document',
      },
    },
    required: ['text'],
  },
};
