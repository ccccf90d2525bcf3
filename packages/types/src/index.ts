/**
 * @aequi/types - Shared type definitions for the Aequi executor
 *
 * This is the leaf package in the dependency tree.
 * Every other @aequi/* package depends on this one.
 */

export * from './common.js';
export * from './execution.js';
export * from './events.js';
