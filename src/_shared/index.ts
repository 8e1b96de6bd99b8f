/**
 * hookrelay shared resources
 */

// Configuration DTOs
export * from './dto';

// Swagger decorators
export * from './swagger';

// Testing utilities
export * from './testing/mock-hook-request.factory';
