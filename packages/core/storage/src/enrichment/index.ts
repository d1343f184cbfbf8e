/**
 * Metadata enrichment - Main exports
 */

export * from './metadata-enricher.js';
