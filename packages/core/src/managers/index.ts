/**
 * Core managers
 */

// ContainerLifecycle
export {
  CONTAINER_HOME,
  CONTAINER_HOSTNAME,
  CONTAINER_NAME,
  ContainerLifecycle,
  IMAGE_TAG,
  buildArgs,
  installHint,
  publishSpec,
  startHint,
} from './ContainerLifecycle';
export type { ContainerLifecycleOptions } from './ContainerLifecycle';

// CommandDispatcher
export { COMMAND_NAMES, CommandDispatcher, formatFatal } from './CommandDispatcher';
export type {
  CommandDispatcherDeps,
  CommandName,
  DispatchOptions,
  DispatcherState,
  Step,
  ValidationCheck,
  ValidationReport,
} from './CommandDispatcher';
