/**
 * @fileoverview Barrel file for the security utilities.
 * @module src/utils/security
 */
export * from './idGenerator.js';
export * from './sanitization.js';
