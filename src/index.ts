/**
 * hookrelay
 *
 * Maps HTTP paths to local programs: each request runs its program with the
 * request body on stdin, optionally gated by an `x-hub-signature` HMAC.
 */

// Core components
export * from './core';

// Listener resolution
export * from './adapters';

// NestJS module, controller and configuration
export * from './modules';

// Configuration DTOs, Swagger decorators and testing utilities
export * from './_shared';
