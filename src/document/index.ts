/**
 * Document Module
 */

export * from './inference.js';
export * from './template.js';
export * from './converter.js';
export * from './drift.js';
