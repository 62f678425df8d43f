export * from './fetchWithTimeout.js';
