/**
 * CommandDispatcher - Top-level command sequencing
 *
 * Each command is one linear sequence of steps inside a cleanup scope. The
 * scope is registered for termination signals once the container runtime is
 * known and always runs before `dispatch` returns.
 *
 * Fatal errors are logged as a single line naming the failed step and the
 * command exits 1. A container's own exit code is returned unchanged.
 */

import type { SystemAdapter } from '../adapters/SystemAdapter';
import type { EnvironmentSource } from '../adapters/EnvironmentAdapter';
import type { SignalSource } from '../adapters/SignalAdapter';
import type { ContainerRuntime } from '../containers/ContainerRuntime';
import type { ILogger } from '../services/Logger';
import type { IConfigResolver, ResolvedConfig } from '../services/ConfigResolver';
import type { ICredentialProvisioner } from '../services/CredentialProvisioner';
import { assertSupportedPlatform, detectPlatform, readHostSignals } from '../services/PlatformDetector';
import type { PlatformKind } from '../types/platform';
import type { ContainerRuntimeName } from '../types/schemas';
import type { CredentialBundle } from '../types/credentials';
import type { DevcellWarning } from '../types/warnings';
import { ConfigurationError, RunError, ValidationFailedError, errorMessage, isDevcellError } from '../errors';
import { StateMachine } from '../utils/StateMachine';
import { CleanupScope } from '../utils/CleanupScope';
import { print } from '../utils/print';
import { ContainerLifecycle } from './ContainerLifecycle';

export type CommandName = 'start' | 'shell' | 'build' | 'clean' | 'config' | 'validate';

export const COMMAND_NAMES: readonly CommandName[] = ['start', 'shell', 'build', 'clean', 'config', 'validate'];

export type DispatcherState = 'idle' | CommandName;

type DispatcherEvent = CommandName | 'finish';

/**
 * Step names used in fatal error lines
 */
export type Step =
  | 'template'
  | 'detect'
  | 'config'
  | 'runtime'
  | 'provision'
  | 'validate'
  | 'build'
  | 'run'
  | 'clean';

export interface DispatchOptions {
  /** Rebuild the image even when it exists */
  rebuild?: boolean;
  /** `clean` also removes the image */
  cleanImages?: boolean;
  /** Extra arguments passed to the container (start) */
  args?: string[];
}

export interface ValidationCheck {
  name: string;
  passed: boolean;
  detail: string;
}

export interface ValidationReport {
  checks: ValidationCheck[];
  issues: string[];
}

export interface CommandDispatcherDeps {
  system: SystemAdapter;
  env: EnvironmentSource;
  signals: SignalSource;
  logger: ILogger;
  configResolver: IConfigResolver;
  provisioner: ICredentialProvisioner;
  createRuntime: (name: ContainerRuntimeName) => ContainerRuntime;
  /** Staging base directory */
  baseDir: string;
  /** Project directory (build context, extra certificates) */
  projectDir: string;
}

/**
 * Format a fatal error as `[step] message (hint: ...)`.
 */
export function formatFatal(step: Step, error: unknown): string {
  const hint = isDevcellError(error) && error.hint ? ` (hint: ${error.hint})` : '';
  return `[${step}] ${errorMessage(error)}${hint}`;
}

export class CommandDispatcher {
  private readonly logger: ILogger;
  private readonly machine: StateMachine<DispatcherState, DispatcherEvent>;
  private step: Step = 'detect';

  constructor(private readonly deps: CommandDispatcherDeps) {
    this.logger = deps.logger.child({ component: 'CommandDispatcher' });
    this.machine = new StateMachine<DispatcherState, DispatcherEvent>({
      initial: 'idle',
      transitions: {
        start: { from: 'idle', to: 'start' },
        shell: { from: 'idle', to: 'shell' },
        build: { from: 'idle', to: 'build' },
        clean: { from: 'idle', to: 'clean' },
        config: { from: 'idle', to: 'config' },
        validate: { from: 'idle', to: 'validate' },
        finish: { from: COMMAND_NAMES, to: 'idle' },
      },
      onTransition: (from, to) => this.logger.debug({ from, to }, 'Dispatcher state changed'),
    });
  }

  get state(): DispatcherState {
    return this.machine.state;
  }

  /**
   * Run one command.
   * @returns Process exit code
   */
  async dispatch(command: CommandName, options: DispatchOptions = {}): Promise<number> {
    this.machine.transition(command);
    const cleanup = new CleanupScope(this.logger);
    const unregisters: Array<() => void> = [];

    const onRuntimeKnown = (lifecycle: ContainerLifecycle): void => {
      cleanup.add('stop-container', () => lifecycle.stop());
      unregisters.push(
        this.deps.signals.onTerminate(async (signal) => {
          this.logger.warn({ signal }, `Received ${signal}, cleaning up`);
          await cleanup.run();
        })
      );
    };

    try {
      return await this.execute(command, options, onRuntimeKnown);
    } catch (error) {
      if (error instanceof RunError) {
        this.logger.error({ step: this.step, code: error.code }, formatFatal(this.step, error));
        return error.exitCode === 0 ? 1 : error.exitCode;
      }
      this.logger.error(
        { step: this.step, code: isDevcellError(error) ? error.code : undefined },
        formatFatal(this.step, error)
      );
      return 1;
    } finally {
      await cleanup.run();
      for (const unregister of unregisters) {
        unregister();
      }
      this.machine.transition('finish');
    }
  }

  private async execute(
    command: CommandName,
    options: DispatchOptions,
    onRuntimeKnown: (lifecycle: ContainerLifecycle) => void
  ): Promise<number> {
    switch (command) {
      case 'config':
        return this.runConfig();
      case 'validate':
        return this.runValidate();
      case 'build':
        return this.runBuild(onRuntimeKnown);
      case 'clean':
        return this.runClean(options);
      case 'shell':
      case 'start':
        return this.runSession(command, options, onRuntimeKnown);
    }
  }

  private enter(step: Step): void {
    this.step = step;
    this.logger.debug({ step }, 'Entering step');
  }

  private runConfig(): number {
    this.enter('template');
    const path = this.deps.configResolver.writeTemplate();
    print(`Configuration template written to ${path}`);
    return 0;
  }

  private detect(): PlatformKind {
    this.enter('detect');
    const detection = detectPlatform(readHostSignals(this.deps.system, this.deps.env));
    this.logWarnings(detection.warnings);
    assertSupportedPlatform(detection);
    this.logger.info({ platform: detection.kind }, `Platform: ${detection.label}`);
    return detection.kind;
  }

  private async resolveConfig(platform: PlatformKind): Promise<ResolvedConfig> {
    this.enter('config');
    return this.deps.configResolver.resolve(platform);
  }

  private async prepareRuntime(
    platform: PlatformKind,
    runtime: ContainerRuntimeName,
    onRuntimeKnown: (lifecycle: ContainerLifecycle) => void
  ): Promise<ContainerLifecycle> {
    this.enter('runtime');
    const lifecycle = this.createLifecycle(runtime);
    await lifecycle.ensureRuntime(platform);
    onRuntimeKnown(lifecycle);
    return lifecycle;
  }

  private createLifecycle(runtime: ContainerRuntimeName): ContainerLifecycle {
    return new ContainerLifecycle(
      this.deps.createRuntime(runtime),
      this.deps.system,
      this.deps.env,
      this.deps.logger,
      { projectDir: this.deps.projectDir }
    );
  }

  private async runValidate(): Promise<number> {
    const platform = this.detect();
    this.enter('validate');

    let resolved: ResolvedConfig | null = null;
    let configIssues: string[] = [];
    try {
      resolved = await this.deps.configResolver.resolve(platform);
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      configIssues = error.issues;
    }

    const report = await this.checklist(resolved, configIssues);
    this.printReport(report);
    return report.issues.length > 0 ? 1 : 0;
  }

  private async runBuild(onRuntimeKnown: (lifecycle: ContainerLifecycle) => void): Promise<number> {
    const platform = this.detect();
    const { config } = await this.resolveConfig(platform);
    const lifecycle = await this.prepareRuntime(platform, config.containerRuntime, onRuntimeKnown);

    this.enter('provision');
    const bundle = await this.deps.provisioner.provision(platform, this.deps.baseDir, {
      kinds: ['certs'],
      config,
      projectDir: this.deps.projectDir,
    });
    this.logger.debug({ materials: bundle.materials }, 'Certificates staged');

    this.enter('build');
    await lifecycle.build(config);
    return 0;
  }

  private async runClean(options: DispatchOptions): Promise<number> {
    this.enter('runtime');
    const { runtime } = await this.deps.configResolver.resolveRuntimeSelector();
    const lifecycle = this.createLifecycle(runtime);

    this.enter('clean');
    try {
      await lifecycle.remove(options.cleanImages ?? false);
    } catch (error) {
      this.logger.warn({ err: errorMessage(error) }, 'Cleanup could not reach the container runtime');
    }
    print('Cleanup complete');
    return 0;
  }

  private async runSession(
    command: 'shell' | 'start',
    options: DispatchOptions,
    onRuntimeKnown: (lifecycle: ContainerLifecycle) => void
  ): Promise<number> {
    const platform = this.detect();
    const resolved = await this.resolveConfig(platform);
    const { config } = resolved;
    const lifecycle = await this.prepareRuntime(platform, config.containerRuntime, onRuntimeKnown);

    this.enter('provision');
    const bundle = await this.deps.provisioner.provision(platform, this.deps.baseDir, {
      config,
      projectDir: this.deps.projectDir,
    });

    this.enter('validate');
    const report = await this.checklist(resolved, [], bundle);
    if (report.issues.length > 0) {
      if (command === 'start') {
        this.printReport(report);
        throw new ValidationFailedError(report.issues);
      }
      for (const issue of report.issues) {
        this.logger.warn(`Validation: ${issue}`);
      }
    }

    this.enter('build');
    await lifecycle.buildIfNeeded(config, options.rebuild ?? false);

    this.enter('run');
    const containerCommand = command === 'shell' ? ['/bin/bash'] : (options.args ?? []);
    const exitCode = await lifecycle.run(config, bundle, platform, containerCommand);
    if (exitCode !== 0) {
      this.logger.info({ exitCode }, `Container exited with code ${exitCode}`);
    }
    return exitCode;
  }

  /**
   * Environment checklist. Never touches container state.
   */
  private async checklist(
    resolved: ResolvedConfig | null,
    configIssues: string[],
    bundle?: CredentialBundle
  ): Promise<ValidationReport> {
    const checks: ValidationCheck[] = [];

    checks.push({
      name: 'Configuration',
      passed: configIssues.length === 0,
      detail: configIssues.length === 0 ? 'valid' : configIssues.join('; '),
    });

    let runtime: ContainerRuntimeName | null = resolved?.config.containerRuntime ?? null;
    if (!runtime) {
      try {
        runtime = (await this.deps.configResolver.resolveRuntimeSelector()).runtime;
      } catch (error) {
        this.logger.debug({ err: errorMessage(error) }, 'Runtime selector unavailable');
      }
    }
    if (runtime) {
      const installed = await this.deps.system.commandExists(runtime);
      checks.push({
        name: 'Container runtime',
        passed: installed,
        detail: installed ? `${runtime} found` : `Container runtime '${runtime}' not found on PATH`,
      });
    }

    const baseDirExists = this.deps.system.exists(this.deps.baseDir);
    checks.push({
      name: 'Base directory',
      passed: baseDirExists,
      detail: baseDirExists ? this.deps.baseDir : `Base directory not found: ${this.deps.baseDir}`,
    });

    const placeholder = this.deps.provisioner.hasPlaceholderCredentials(bundle ?? this.deps.baseDir);
    checks.push({
      name: 'AWS credentials',
      passed: !placeholder,
      detail: placeholder
        ? 'AWS credentials not configured - still contains placeholder values'
        : 'no placeholder values',
    });

    if (resolved) {
      const unresolved = resolved.ports.assignments.filter((assignment) => assignment.unresolved);
      checks.push({
        name: 'Ports',
        passed: unresolved.length === 0,
        detail:
          unresolved.length === 0
            ? Object.values(resolved.config.ports).join(', ')
            : unresolved
                .map((a) => `Port ${a.desired} (${a.name}) is in use and ${a.resolved} is also taken`)
                .join('; '),
      });
    }

    const issues = checks.filter((check) => !check.passed).map((check) => check.detail);
    return { checks, issues };
  }

  private printReport(report: ValidationReport): void {
    for (const check of report.checks) {
      print(`${check.passed ? '[ok]  ' : '[FAIL]'} ${check.name}: ${check.detail}`);
    }
    print(
      report.issues.length === 0
        ? 'Environment validation passed'
        : `Environment validation found ${report.issues.length} issue(s)`
    );
  }

  private logWarnings(warnings: DevcellWarning[]): void {
    for (const item of warnings) {
      this.logger.warn({ kind: item.kind }, item.message);
    }
  }
}
