/**
 * @fileoverview Barrel file for the error handling utilities.
 * @module src/utils/internal/error-handler
 */
export * from './errorHandler.js';
export * from './helpers.js';
