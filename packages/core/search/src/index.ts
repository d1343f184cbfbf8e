/**
 * Search Layer - Main exports
 */

export * from './sequence-matcher.js';
export * from './fuzzy-match.js';
export * from './search-engine.js';
