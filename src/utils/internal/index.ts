/**
 * @fileoverview Barrel file for internal utility modules: error handling,
 * logging and request context management.
 * @module src/utils/internal
 */

export * from './error-handler/index.js';
export * from './logger.js';
export * from './requestContext.js';
