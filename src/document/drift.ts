/**
 * Drift analysis - repeated prose → symbols → prose cycles
 */

import { getRosetta, similarity, type Rosetta } from '../rosetta/index.js';
import { convert, toProse } from './converter.js';

export type DriftMode = 'document' | 'minimal';

export interface DriftOptions {
  rounds?: number;
  /** document: auto-tier documents; minimal: bare symbol substitution */
  mode?: DriftMode;
  now?: () => Date;
  rosetta?: Rosetta;
}

export interface DriftRound {
  round: number;
  symbolic: string;
  prose: string;
  similarityToOriginal: number;
  similarityToPrevious: number;
}

export interface DriftReport {
  original: string;
  mode: DriftMode;
  rounds: DriftRound[];
  /** 1 - similarity(first round prose, last round prose) */
  totalDrift: number;
  finalSimilarity: number;
  /** Rounds whose prose is > 0.95 similar to the round before */
  stableRounds: number;
}

export const DEFAULT_DRIFT_ROUNDS = 10;
export const MAX_DRIFT_ROUNDS = 50;
const STABLE_THRESHOLD = 0.95;

export function measureDrift(text: string, options: DriftOptions = {}): DriftReport {
  const rosetta = options.rosetta ?? getRosetta();
  const mode = options.mode ?? 'document';
  const requested = options.rounds !== undefined && Number.isFinite(options.rounds)
    ? options.rounds
    : DEFAULT_DRIFT_ROUNDS;
  const count = Math.min(MAX_DRIFT_ROUNDS, Math.max(1, Math.floor(requested)));

  const rounds: DriftRound[] = [];
  let current = text;
  let previous = '';

  for (let round = 1; round <= count; round++) {
    const symbolic = mode === 'minimal'
      ? rosetta.forwardMatch(current).symbolicText
      : convert(current, { rosetta, now: options.now }).output;
    const prose = toProse(symbolic, rosetta);

    rounds.push({
      round,
      symbolic,
      prose,
      similarityToOriginal: similarity(text, prose),
      similarityToPrevious: similarity(previous, prose),
    });

    previous = prose;
    current = prose;
  }

  const first = rounds[0];
  const last = rounds[rounds.length - 1];

  return {
    original: text,
    mode,
    rounds,
    totalDrift: 1 - similarity(first.prose, last.prose),
    finalSimilarity: last.similarityToOriginal,
    stableRounds: rounds.filter(r => r.similarityToPrevious > STABLE_THRESHOLD).length,
  };
}
