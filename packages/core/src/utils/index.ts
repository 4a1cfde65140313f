/**
 * Core utilities
 */

export { StateMachine, InvalidTransitionError } from './StateMachine';
export type { StateMachineConfig, TransitionConfig } from './StateMachine';

export { CleanupScope } from './CleanupScope';
export type { CleanupAction } from './CleanupScope';

export { print, printError, capturePrintOutput } from './print';
