/**
 * CliContainerRuntime - podman/docker through their command line
 *
 * Both CLIs accept the same arguments for everything used here. Every call
 * except the interactive run has a bounded timeout.
 */

import type { SystemAdapter } from '../adapters/SystemAdapter';
import type { ILogger } from '../services/Logger';
import type { ContainerRuntimeName } from '../types/schemas';
import { BuildSpec, ContainerRuntime, RunSpec } from './ContainerRuntime';

/**
 * Timeouts for non-interactive runtime calls
 */
export const RUNTIME_TIMEOUTS = {
  query: 30_000,
  stop: 60_000,
} as const;

export class CliContainerRuntime implements ContainerRuntime {
  private readonly logger: ILogger;

  constructor(
    readonly name: ContainerRuntimeName,
    private readonly system: SystemAdapter,
    logger: ILogger
  ) {
    this.logger = logger.child({ component: 'CliContainerRuntime', runtime: name });
  }

  async isInstalled(): Promise<boolean> {
    return this.system.commandExists(this.name);
  }

  async isAvailable(): Promise<boolean> {
    const result = await this.system.exec(this.name, ['info'], { timeoutMs: RUNTIME_TIMEOUTS.query });
    if (result.exitCode !== 0) {
      this.logger.debug({ stderr: result.stderr.trim() }, 'Runtime info failed');
    }
    return result.exitCode === 0;
  }

  async build(spec: BuildSpec): Promise<number> {
    const args = ['build', '-t', spec.tag, '-f', spec.containerfile];
    for (const [key, value] of Object.entries(spec.buildArgs)) {
      args.push('--build-arg', `${key}=${value}`);
    }
    args.push(spec.context);

    this.logger.debug({ args }, 'Building image');
    return this.system.execInteractive(this.name, args, { timeoutMs: spec.timeoutMs });
  }

  async run(spec: RunSpec): Promise<number> {
    const args = ['run', ...spec.options, spec.image, ...spec.command];
    this.logger.debug({ args }, 'Running container');
    return this.system.execInteractive(this.name, args);
  }

  async stop(name: string): Promise<boolean> {
    return this.succeeds(['stop', name], RUNTIME_TIMEOUTS.stop);
  }

  async remove(name: string): Promise<boolean> {
    return this.succeeds(['rm', '-f', name], RUNTIME_TIMEOUTS.stop);
  }

  async removeImage(tag: string): Promise<boolean> {
    return this.succeeds(['rmi', tag], RUNTIME_TIMEOUTS.query);
  }

  async imageExists(tag: string): Promise<boolean> {
    const result = await this.system.exec(this.name, ['image', 'inspect', tag], {
      timeoutMs: RUNTIME_TIMEOUTS.query,
    });
    return result.exitCode === 0;
  }

  async listRunning(name: string): Promise<string[]> {
    const result = await this.system.exec(
      this.name,
      ['ps', '--filter', `name=^${name}$`, '--format', '{{.Names}}'],
      { timeoutMs: RUNTIME_TIMEOUTS.query }
    );
    if (result.exitCode !== 0) {
      return [];
    }
    return result.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line === name);
  }

  private async succeeds(args: string[], timeoutMs: number): Promise<boolean> {
    const result = await this.system.exec(this.name, args, { timeoutMs });
    if (result.exitCode !== 0) {
      this.logger.debug({ args, exitCode: result.exitCode, stderr: result.stderr.trim() }, 'Runtime command failed');
    }
    return result.exitCode === 0;
  }
}
