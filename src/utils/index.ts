// Re-export all utilities from their categorized subdirectories
export * from './internal/index.js';
export * from './network/index.js';
export * from './security/index.js';
