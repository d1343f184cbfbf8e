/**
 * Lifecycle - Main exports
 */

export * from './expiry.js';
export * from './mutation-lock.js';
