/**
 * @fileoverview Barrel file for the session services.
 * @module src/services/session
 */
export * from './server-manifest.js';
