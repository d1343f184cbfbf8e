/**
 * Storage Layer - Main exports
 */

export * from './models.js';
export * from './errors.js';
export * from './config.js';
export * from './enrichment/index.js';
export * from './lifecycle/index.js';
export * from './resource-uri.js';
export * from './snapshot.js';
export * from './schema-document.js';
export * from './format.js';
export * from './schema-text-parser.js';
export * from './artifact-store.js';
