/**
 * Container runtime access
 */

export type { BuildSpec, ContainerRuntime, RunSpec } from './ContainerRuntime';
export { CliContainerRuntime, RUNTIME_TIMEOUTS } from './CliContainerRuntime';
