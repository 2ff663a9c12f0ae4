/**
 * Relative Date Module
 *
 * Exports parsing, resolution, lexicon and calendar utility functions
 */

export * from './types.js';
export * from './errors.js';
export * from './expressions.js';
export * from './normalizer.js';
export * from './utils.js';
export * from './config.js';
export * from './lexicon/schema.js';
export * from './lexicon/loader.js';
export * from './lexicon/registry.js';
export * from './matcher.js';
export * from './resolver.js';
export * from './parser.js';
export * from './extract.js';
