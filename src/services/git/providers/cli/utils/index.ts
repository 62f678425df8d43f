/**
 * @fileoverview CLI provider utilities barrel export
 * @module services/git/providers/cli/utils
 */

export * from './command-builder.js';
export * from './error-mapper.js';
export * from './git-executor.js';
export * from './runtime-adapter.js';
