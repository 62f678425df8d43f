/**
 * @fileoverview Barrel file for the repository cloning service.
 * @module src/services/clone
 */
export * from './credentials.js';
export * from './GitCloner.js';
export * from './lfs.js';
export * from './Repository.js';
export * from './storage-exclusion.js';
export * from './types.js';
