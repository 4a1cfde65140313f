/**
 * ContainerLifecycle - Build, run and tear down the development container
 *
 * Translates the resolved configuration and staged bundle into runtime
 * arguments. All runtime access goes through the ContainerRuntime interface.
 */

import type { SystemAdapter } from '../adapters/SystemAdapter';
import type { EnvironmentSource } from '../adapters/EnvironmentAdapter';
import type { ContainerRuntime } from '../containers/ContainerRuntime';
import type { ILogger } from '../services/Logger';
import type { CredentialBundle } from '../types/credentials';
import { CONTAINER_PORTS, DevcellConfig, PORT_NAMES } from '../types/config';
import { PlatformKind, assertNever } from '../types/platform';
import type { ContainerRuntimeName } from '../types/schemas';
import { BuildError, CommandTimeoutError, RunError, RuntimeUnavailable, errorMessage } from '../errors';

export const CONTAINER_NAME = 'devcell';
export const IMAGE_TAG = 'devcell:latest';
export const CONTAINER_HOSTNAME = 'devcell';
export const CONTAINER_HOME = '/home/developer';

const DOCKER_SOCKET = '/var/run/docker.sock';

/**
 * Bundle directories mounted into the container. Credentials are read-only.
 */
const MOUNTS: ReadonlyArray<{ dir: keyof CredentialBundle['paths']; target: string; readOnly: boolean }> = [
  { dir: 'workspace', target: '/workspace', readOnly: false },
  { dir: 'config', target: '/config', readOnly: false },
  { dir: 'cache', target: '/cache', readOnly: false },
  { dir: 'certs', target: '/certs', readOnly: true },
  { dir: 'ssh', target: `${CONTAINER_HOME}/.ssh`, readOnly: true },
  { dir: 'aws', target: `${CONTAINER_HOME}/.aws`, readOnly: true },
  { dir: 'logs', target: '/logs', readOnly: false },
];

/**
 * Values forwarded into the container when set
 */
function passthroughEnv(config: DevcellConfig): Array<[string, string | undefined]> {
  return [
    ['HTTP_PROXY', config.proxy.httpProxy],
    ['HTTPS_PROXY', config.proxy.httpsProxy],
    ['NO_PROXY', config.proxy.noProxy],
    ['AWS_PROFILE', config.aws.profile],
    ['AWS_REGION', config.aws.region],
    ['AWS_BEDROCK_REGION', config.aws.bedrockRegion],
    ['AWS_BEDROCK_MODEL_ID', config.aws.bedrockModelId],
    ['GITHUB_TOKEN', config.git.githubToken],
    ['GITHUB_ENTERPRISE_URL', config.git.githubEnterpriseUrl],
    ['GIT_USER_NAME', config.git.userName],
    ['GIT_USER_EMAIL', config.git.userEmail],
    ['NPM_REGISTRY', config.registries.npmRegistry],
    ['PIP_INDEX_URL', config.registries.pipIndexUrl],
    ['MAVEN_REPOSITORY_URL', config.registries.mavenRepositoryUrl],
  ];
}

/**
 * Build arguments: proxy settings and package registries
 */
export function buildArgs(config: DevcellConfig): Record<string, string> {
  const entries: Array<[string, string | undefined]> = [
    ['HTTP_PROXY', config.proxy.httpProxy],
    ['HTTPS_PROXY', config.proxy.httpsProxy],
    ['NO_PROXY', config.proxy.noProxy],
    ['NPM_REGISTRY', config.registries.npmRegistry],
    ['PIP_INDEX_URL', config.registries.pipIndexUrl],
    ['MAVEN_REPOSITORY_URL', config.registries.mavenRepositoryUrl],
  ];
  const args: Record<string, string> = {};
  for (const [key, value] of entries) {
    if (value) {
      args[key] = value;
    }
  }
  return args;
}

/**
 * `--publish` value; IPv6 literals are bracketed.
 */
export function publishSpec(bindAddress: string, hostPort: number, containerPort: number): string {
  const host = bindAddress.includes(':') ? `[${bindAddress}]` : bindAddress;
  return `${host}:${hostPort}:${containerPort}`;
}

/**
 * Install instructions for a missing runtime
 */
export function installHint(runtime: ContainerRuntimeName, platform: PlatformKind): string {
  switch (platform) {
    case 'macos':
      return runtime === 'podman'
        ? 'brew install podman && podman machine init && podman machine start'
        : 'Install Docker Desktop from https://docs.docker.com/desktop/';
    case 'wsl':
    case 'ubuntu':
      return runtime === 'podman' ? 'sudo apt-get install -y podman' : 'sudo apt-get install -y docker.io';
    case 'generic-linux':
    case 'cloud-workspace':
      return `Install ${runtime} with your distribution's package manager`;
    case 'unsupported':
      return 'wsl --install';
    default:
      return assertNever(platform);
  }
}

/**
 * How to bring an installed runtime back up
 */
export function startHint(runtime: ContainerRuntimeName, platform: PlatformKind): string {
  if (runtime === 'podman') {
    return platform === 'macos' ? 'podman machine start' : 'systemctl --user start podman.socket';
  }
  return platform === 'macos' ? 'Start Docker Desktop' : 'sudo systemctl start docker';
}

export interface ContainerLifecycleOptions {
  /** Build context directory */
  projectDir: string;
  containerName?: string;
  imageTag?: string;
}

export class ContainerLifecycle {
  readonly containerName: string;
  readonly imageTag: string;
  private readonly logger: ILogger;

  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly system: SystemAdapter,
    private readonly env: EnvironmentSource,
    logger: ILogger,
    private readonly options: ContainerLifecycleOptions
  ) {
    this.containerName = options.containerName ?? CONTAINER_NAME;
    this.imageTag = options.imageTag ?? IMAGE_TAG;
    this.logger = logger.child({ component: 'ContainerLifecycle' });
  }

  /**
   * Confirm the runtime is installed and responding.
   * @throws RuntimeUnavailable with an install or start hint
   */
  async ensureRuntime(platform: PlatformKind): Promise<void> {
    const name = this.runtime.name;
    if (!(await this.runtime.isInstalled())) {
      throw new RuntimeUnavailable(name, 'is not installed', installHint(name, platform));
    }

    let available: boolean;
    try {
      available = await this.runtime.isAvailable();
    } catch (error) {
      this.logger.debug({ err: errorMessage(error) }, 'Runtime probe failed');
      available = false;
    }
    if (!available) {
      throw new RuntimeUnavailable(name, 'is installed but not responding', startHint(name, platform));
    }

    this.logger.debug({ runtime: name }, 'Container runtime ready');
  }

  /**
   * Build the image from the configured Containerfile.
   * @throws BuildError
   */
  async build(config: DevcellConfig): Promise<void> {
    const containerfile = config.build.containerfile;
    if (!this.system.exists(containerfile)) {
      throw new BuildError(this.imageTag, `Containerfile not found: ${containerfile}`);
    }

    this.logger.info({ image: this.imageTag, containerfile }, 'Building container image');

    let exitCode: number;
    try {
      exitCode = await this.runtime.build({
        tag: this.imageTag,
        containerfile,
        context: this.options.projectDir,
        buildArgs: buildArgs(config),
        timeoutMs: config.build.timeoutSeconds * 1000,
      });
    } catch (error) {
      if (error instanceof CommandTimeoutError) {
        throw new BuildError(this.imageTag, `timed out after ${config.build.timeoutSeconds}s`);
      }
      throw new BuildError(this.imageTag, errorMessage(error));
    }

    if (exitCode !== 0) {
      throw new BuildError(this.imageTag, `${this.runtime.name} build exited with code ${exitCode}`, exitCode);
    }

    this.logger.info({ image: this.imageTag }, 'Container image built');
  }

  /**
   * Build unless the image exists and no rebuild was requested.
   * @returns Whether a build ran
   */
  async buildIfNeeded(config: DevcellConfig, rebuild: boolean): Promise<boolean> {
    if (!rebuild && (await this.runtime.imageExists(this.imageTag))) {
      this.logger.debug({ image: this.imageTag }, 'Image present, skipping build');
      return false;
    }
    await this.build(config);
    return true;
  }

  /**
   * Arguments between `run` and the image name.
   */
  runOptions(config: DevcellConfig, bundle: CredentialBundle, platform: PlatformKind): string[] {
    const { uid, gid } = this.system.getUserIds();
    const args: string[] = [
      '--name', this.containerName,
      '--rm',
      '--interactive',
      '--tty',
      '--hostname', CONTAINER_HOSTNAME,
      '--env', `TERM=${this.env.get('TERM') ?? 'xterm-256color'}`,
      '--env', `PLATFORM=${platform}`,
    ];

    for (const mount of MOUNTS) {
      const mode = mount.readOnly ? 'ro,Z' : 'Z';
      args.push('--volume', `${bundle.paths[mount.dir]}:${mount.target}:${mode}`);
    }

    for (const name of PORT_NAMES) {
      args.push('--publish', publishSpec(config.bindAddress, config.ports[name], CONTAINER_PORTS[name]));
    }

    for (const [key, value] of passthroughEnv(config)) {
      if (value) {
        args.push('--env', `${key}=${value}`);
      }
    }

    if (config.resources.memoryLimit) {
      args.push('--memory', config.resources.memoryLimit);
    }
    if (config.resources.cpuLimit) {
      args.push('--cpus', config.resources.cpuLimit);
    }

    switch (platform) {
      case 'wsl':
        args.push('--env', `WSL_DISTRO_NAME=${this.env.get('WSL_DISTRO_NAME') ?? 'Ubuntu'}`);
        args.push('--add-host', 'host.docker.internal:host-gateway');
        break;
      case 'macos':
        if (this.system.exists(DOCKER_SOCKET)) {
          args.push('--volume', `${DOCKER_SOCKET}:${DOCKER_SOCKET}:Z`);
        }
        break;
      case 'ubuntu':
      case 'generic-linux':
      case 'cloud-workspace':
      case 'unsupported':
        break;
      default:
        assertNever(platform);
    }

    args.push(
      '--security-opt', 'seccomp=unconfined',
      '--cap-add', 'SYS_PTRACE',
      '--env', `SANDBOX_USER_ID=${uid}`,
      '--env', `SANDBOX_GROUP_ID=${gid}`
    );

    return args;
  }

  /**
   * Run the container attached to the terminal.
   * @returns Container exit code
   * @throws RunError when the runtime cannot be started
   */
  async run(
    config: DevcellConfig,
    bundle: CredentialBundle,
    platform: PlatformKind,
    command: string[] = []
  ): Promise<number> {
    if (await this.isRunning()) {
      this.logger.warn(
        { container: this.containerName },
        `A container named ${this.containerName} is already running; the runtime may refuse to start another`
      );
    }

    const host = config.bindAddress === '0.0.0.0' ? 'localhost' : config.bindAddress;
    this.logger.info(`HTTP server: http://${host}:${config.ports.http}`);
    this.logger.info(`Jupyter Lab: http://${host}:${config.ports.notebook}`);
    this.logger.info(`Code server: http://${host}:${config.ports.codeEditor}`);
    this.logger.info(`Debug port: ${config.ports.debug}`);
    this.logger.info(`Workspace: ${bundle.paths.workspace}`);

    try {
      return await this.runtime.run({
        name: this.containerName,
        image: this.imageTag,
        options: this.runOptions(config, bundle, platform),
        command,
      });
    } catch (error) {
      throw new RunError(this.containerName, 1, `Failed to start container: ${errorMessage(error)}`);
    }
  }

  async isRunning(): Promise<boolean> {
    const running = await this.runtime.listRunning(this.containerName);
    return running.length > 0;
  }

  /**
   * Stop the container when it is running.
   * @returns Whether a stop was issued
   */
  async stop(): Promise<boolean> {
    if (!(await this.isRunning())) {
      return false;
    }
    this.logger.info({ container: this.containerName }, 'Stopping container');
    if (!(await this.runtime.stop(this.containerName))) {
      this.logger.warn({ container: this.containerName }, 'Container did not stop cleanly, forcing removal');
      await this.runtime.remove(this.containerName);
    }
    return true;
  }

  /**
   * Stop the container and optionally remove the image.
   */
  async remove(alsoImage: boolean): Promise<void> {
    await this.stop();
    if (!alsoImage) {
      return;
    }
    this.logger.info({ image: this.imageTag }, 'Removing container image');
    if (!(await this.runtime.removeImage(this.imageTag))) {
      this.logger.warn({ image: this.imageTag }, 'Image could not be removed');
    }
  }
}
