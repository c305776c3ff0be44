/**
 * Tool discovery and invocation
 */

export * from './adapter.js';
export * from './registry.js';
