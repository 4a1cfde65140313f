/**
 * @devcell/core
 *
 * Orchestration engine for the devcell development container.
 * Host access goes through adapters; nothing here writes to the terminal
 * except the validation report.
 */

// Types
export * from './types';

// Errors
export * from './errors';

// Adapters
export * from './adapters';

// Services
export * from './services';

// Containers
export * from './containers';

// Managers
export * from './managers';

// Utilities
export * from './utils';
