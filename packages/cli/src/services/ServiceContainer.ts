/**
 * ServiceContainer - Composition root for the CLI
 *
 * Wires the core services to the Node host: process environment, signals,
 * the podman/docker CLI, a log file and a console log stream on stderr.
 * Tests replace the host pieces through `overrides`.
 */

import {
  CliContainerRuntime,
  CommandDispatcher,
  ConfigResolver,
  CredentialProvisioner,
  NodeSystemAdapter,
  PortConflictResolver,
  ProcessEnvironment,
  ProcessSignalSource,
  createLogger,
  type ContainerRuntime,
  type ContainerRuntimeName,
  type EnvironmentSource,
  type ILogger,
  type SignalSource,
  type SystemAdapter,
} from '@devcell/core';
import { createConsoleStream } from '../logging.js';

export const BASE_DIR_NAME = '.devcell';

export type RuntimeFactory = (name: ContainerRuntimeName, system: SystemAdapter, logger: ILogger) => ContainerRuntime;

/**
 * Host pieces a test can swap out
 */
export interface ServiceOverrides {
  system?: SystemAdapter;
  env?: EnvironmentSource;
  signals?: SignalSource;
  createRuntime?: RuntimeFactory;
  /** Console log destination, defaults to stderr */
  writeConsole?: (line: string) => void;
  /** Log file path; null disables the file */
  logFile?: string | null;
  colour?: boolean;
}

export interface ServiceContainerOptions {
  projectDir: string;
  /** Configuration file, defaults to `<projectDir>/.devcell.env` */
  configFile?: string;
  debug?: boolean;
  overrides?: ServiceOverrides;
}

/**
 * Default log file: `$XDG_STATE_HOME/devcell/devcell.log`
 */
export function defaultLogFile(system: SystemAdapter, env: EnvironmentSource): string {
  const stateHome = env.get('XDG_STATE_HOME') ?? system.joinPath(system.getHomeDirectory(), '.local', 'state');
  return system.joinPath(stateHome, 'devcell', 'devcell.log');
}

export class ServiceContainer {
  readonly system: SystemAdapter;
  readonly env: EnvironmentSource;
  readonly logger: ILogger;
  readonly baseDir: string;
  readonly configResolver: ConfigResolver;
  readonly provisioner: CredentialProvisioner;
  readonly dispatcher: CommandDispatcher;

  private _disposed = false;

  constructor(options: ServiceContainerOptions) {
    const overrides = options.overrides ?? {};

    // 1. Host adapters
    this.system = overrides.system ?? new NodeSystemAdapter();
    this.env = overrides.env ?? new ProcessEnvironment();
    const signals = overrides.signals ?? new ProcessSignalSource();

    // 2. Logging
    const logFile = overrides.logFile === undefined ? defaultLogFile(this.system, this.env) : overrides.logFile;
    this.logger = createLogger({
      level: options.debug ? 'debug' : 'info',
      logFile: logFile ?? undefined,
      streams: [
        createConsoleStream({
          write: overrides.writeConsole ?? ((line) => process.stderr.write(line)),
          colour: overrides.colour ?? process.stderr.isTTY === true,
        }),
      ],
    });

    // 3. Services
    this.baseDir = this.system.joinPath(this.system.getHomeDirectory(), BASE_DIR_NAME);
    this.configResolver = new ConfigResolver(
      this.system,
      this.env,
      new PortConflictResolver(this.system, this.logger),
      this.logger,
      { projectDir: options.projectDir, configFile: options.configFile }
    );
    this.provisioner = new CredentialProvisioner(this.system, this.logger);

    const createRuntime: RuntimeFactory =
      overrides.createRuntime ?? ((name, system, logger) => new CliContainerRuntime(name, system, logger));

    // 4. Dispatcher
    this.dispatcher = new CommandDispatcher({
      system: this.system,
      env: this.env,
      signals,
      logger: this.logger,
      configResolver: this.configResolver,
      provisioner: this.provisioner,
      createRuntime: (name) => createRuntime(name, this.system, this.logger),
      baseDir: this.baseDir,
      projectDir: options.projectDir,
    });

    this.logger.debug({ projectDir: options.projectDir, baseDir: this.baseDir, logFile }, 'Services ready');
  }

  get isDisposed(): boolean {
    return this._disposed;
  }

  dispose(): void {
    if (this._disposed) {
      return;
    }
    this._disposed = true;
    this.logger.flush();
  }
}

// ============================================================================
// Global Container Instance
// ============================================================================

let containerInstance: ServiceContainer | null = null;

/**
 * Initialize the global service container, replacing any previous one.
 */
export function initializeContainer(options: ServiceContainerOptions): ServiceContainer {
  containerInstance?.dispose();
  containerInstance = new ServiceContainer(options);
  return containerInstance;
}

/**
 * Get the global service container.
 * @throws Error if not initialized
 */
export function getContainer(): ServiceContainer {
  if (!containerInstance) {
    throw new Error('ServiceContainer not initialized. Call initializeContainer() first.');
  }
  return containerInstance;
}

export function isContainerInitialized(): boolean {
  return containerInstance !== null;
}

export function disposeContainer(): void {
  containerInstance?.dispose();
  containerInstance = null;
}
