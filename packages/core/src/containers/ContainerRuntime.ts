/**
 * ContainerRuntime - Contract with an OCI runtime CLI
 *
 * The lifecycle orchestrator only talks to the runtime through this
 * interface, so it can be driven by a fake in tests.
 */

import type { ContainerRuntimeName } from '../types/schemas';

/**
 * Image build request
 */
export interface BuildSpec {
  tag: string;
  containerfile: string;
  /** Build context directory */
  context: string;
  buildArgs: Record<string, string>;
  timeoutMs: number;
}

/**
 * Interactive container run request
 */
export interface RunSpec {
  name: string;
  image: string;
  /** Options placed between `run` and the image */
  options: string[];
  /** Command and arguments run inside the container */
  command: string[];
}

export interface ContainerRuntime {
  readonly name: ContainerRuntimeName;

  /**
   * Whether the runtime binary is on PATH.
   */
  isInstalled(): Promise<boolean>;

  /**
   * Whether the runtime answers `info` (daemon or machine running).
   */
  isAvailable(): Promise<boolean>;

  /**
   * Build an image, streaming output to the terminal.
   * @returns Runtime exit code
   */
  build(spec: BuildSpec): Promise<number>;

  /**
   * Run a container attached to the terminal.
   * @returns Container exit code
   */
  run(spec: RunSpec): Promise<number>;

  /**
   * Stop a running container.
   * @returns Whether the runtime reported success
   */
  stop(name: string): Promise<boolean>;

  /**
   * Remove a container.
   * @returns Whether the runtime reported success
   */
  remove(name: string): Promise<boolean>;

  /**
   * Remove an image.
   * @returns Whether the runtime reported success
   */
  removeImage(tag: string): Promise<boolean>;

  imageExists(tag: string): Promise<boolean>;

  /**
   * Names of running containers whose name is exactly `name`.
   */
  listRunning(name: string): Promise<string[]>;
}
