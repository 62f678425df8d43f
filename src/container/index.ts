/**
 * @fileoverview Centralized dependency injection container setup.
 * This file provides a `composeContainer` function to act as the Composition
 * Root for the application. It also serves as a barrel file for exporting
 * the configured container and all DI tokens.
 * @module src/container
 */
import 'reflect-metadata';
import { container } from 'tsyringe';

import { registerCoreServices } from '@/container/registrations/core.js';

let isContainerComposed = false;

/**
 * Composes the DI container by registering all services.
 * This function is designed to be called once at application startup.
 */
export function composeContainer(env: NodeJS.ProcessEnv = process.env): void {
  if (isContainerComposed) {
    return;
  }

  registerCoreServices(env);

  isContainerComposed = true;
}

// --- Export DI tokens and the container instance ---
export * from '@/container/tokens.js';
export default container;
