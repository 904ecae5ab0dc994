/**
 * Rosetta Module
 *
 * Bidirectional prose ↔ symbol mapping: pattern table, forward matcher,
 * reverse expander, tier classifier and similarity estimator.
 */

export * from './table.js';
export * from './indexes.js';
export * from './forward.js';
export * from './reverse.js';
export * from './classifier.js';
export * from './similarity.js';
export * from './engine.js';
