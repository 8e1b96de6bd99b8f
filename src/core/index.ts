/**
 * hookrelay core: routing, signature checks and hook process handling,
 * independent of the HTTP framework
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';

// Errors
export * from './errors';

// Interfaces and contracts
export * from './interfaces';

// Hook table
export * from './registry';

// x-hub-signature handling
export * from './signature';

// Child processes
export * from './process';

// Dispatch pipeline
export * from './pipeline';
