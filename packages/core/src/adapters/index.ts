/**
 * Adapter interfaces
 *
 * These interfaces abstract host-specific operations, allowing
 * core logic to be tested without touching the real machine.
 */

// System operations (OS identity, commands, filesystem)
export type {
  SystemAdapter,
  OsType,
  FileStat,
  ExecOptions,
  ExecResult,
} from './SystemAdapter';

// Node.js implementation of SystemAdapter
export { NodeSystemAdapter } from './NodeSystemAdapter';

// Environment variables
export { ProcessEnvironment, StaticEnvironment } from './EnvironmentAdapter';
export type { EnvironmentSource } from './EnvironmentAdapter';

// Termination signals
export { ProcessSignalSource } from './SignalAdapter';
export type { SignalSource, TerminationHandler } from './SignalAdapter';
