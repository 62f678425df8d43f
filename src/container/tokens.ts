/**
 * @fileoverview Defines all dependency injection tokens for the application.
 * This file centralizes the Symbols used for registering and resolving dependencies
 * in the container, breaking circular reference issues.
 * @module src/container/tokens
 */

// Use tokens for non-class dependencies.
export const AppConfig = Symbol('AppConfig');
export const ClonerConfig = Symbol('ClonerConfig');
export const Logger = Symbol('Logger');
export const ClonerDependencies = Symbol('GitClonerDependencies');
export const GitClonerToken = Symbol('GitCloner');
