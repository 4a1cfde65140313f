/**
 * CredentialProvisioner - Stages host certificates, SSH and AWS material
 *
 * Everything is copied into a per-user tree under the base directory which
 * the container mounts read-only. Each material kind has an ordered list of
 * named discovery strategies:
 * - certs: additive, every applicable strategy runs
 * - ssh, aws: the first strategy that succeeds wins
 *
 * File modes are normalised after every run, so re-running is safe.
 */

import type { SystemAdapter } from '../adapters/SystemAdapter';
import type { ILogger } from './Logger';
import type { DevcellConfig } from '../types/config';
import { DEFAULT_AWS_REGION } from '../types/config';
import type { PlatformKind } from '../types/platform';
import { Result, err, ok, isOk } from '../types/result';
import { DevcellWarning, warning } from '../types/warnings';
import {
  AWS_PLACEHOLDER_ACCESS_KEY,
  AWS_PLACEHOLDER_SECRET_KEY,
  BundleDirectory,
  BundlePaths,
  CredentialBundle,
  MATERIAL_KINDS,
  MaterialKind,
  MaterialReport,
  StrategyAttempt,
} from '../types/credentials';
import { errorMessage } from '../errors';

export const DIRECTORY_MODE = 0o755;
export const SECRET_FILE_MODE = 0o600;
export const PUBLIC_FILE_MODE = 0o644;

const SYSTEM_CA_DIR = '/etc/ssl/certs';
const LOCAL_CA_DIR = '/usr/local/share/ca-certificates';
const WINDOWS_CERT_STORE = '/mnt/c/ProgramData/Microsoft/Windows/SystemCertificates';
const WINDOWS_USERS_DIR = '/mnt/c/Users';
const WINDOWS_USER_CERT_STORE = 'AppData/Roaming/Microsoft/SystemCertificates';
const WINDOWS_SHARED_PROFILES = /Public|Default|All Users/;

/**
 * Name of the link to the base directory created in the Windows user profile on WSL
 */
export const WINDOWS_LINK_NAME = 'devcell';
const KEYCHAIN_TIMEOUT_MS = 30_000;

/**
 * macOS keychains exported as PEM, keyed by staged file name
 */
const MACOS_KEYCHAINS: ReadonlyArray<{ keychain: string; file: string }> = [
  { keychain: '/System/Library/Keychains/SystemRootCertificates.keychain', file: 'macos-system-certs.pem' },
  { keychain: '/Library/Keychains/System.keychain', file: 'macos-user-certs.pem' },
];

const SANDBOX_SSH_CONFIG = `# devcell SSH config
Host *
    StrictHostKeyChecking no
    UserKnownHostsFile /dev/null
    LogLevel QUIET

Host github.com
    HostName github.com
    User git
    IdentitiesOnly yes

Host *.amazonaws.com
    StrictHostKeyChecking yes
`;

const PLACEHOLDER_AWS_CREDENTIALS = `[default]
aws_access_key_id = ${AWS_PLACEHOLDER_ACCESS_KEY}
aws_secret_access_key = ${AWS_PLACEHOLDER_SECRET_KEY}
# aws_session_token = YOUR_SESSION_TOKEN_HERE
`;

const PLACEHOLDER_AWS_CONFIG = `[default]
region = ${DEFAULT_AWS_REGION}
output = json
`;

/**
 * Whether a staged file holds secret material (mode 0600).
 */
export function isSecretFile(kind: MaterialKind, relativePath: string): boolean {
  const name = relativePath.split('/').pop() ?? relativePath;
  switch (kind) {
    case 'ssh':
      return !(
        name.endsWith('.pub') ||
        name === 'config' ||
        name.startsWith('known_hosts') ||
        name === 'authorized_keys'
      );
    case 'aws':
      return name.startsWith('credentials');
    case 'certs':
      return false;
  }
}

interface StrategyContext {
  platform: PlatformKind;
  paths: BundlePaths;
  home: string;
  projectDir: string;
  config?: DevcellConfig;
}

/**
 * A named way of finding one kind of material.
 * @returns Staged paths relative to the material directory
 */
interface DiscoveryStrategy {
  name: string;
  platforms?: readonly PlatformKind[];
  discover(ctx: StrategyContext): Promise<Result<string[]>>;
}

export interface ProvisionOptions {
  /** Material kinds to stage; defaults to all */
  kinds?: readonly MaterialKind[];
  /** Resolved configuration, used for environment-supplied credentials */
  config?: DevcellConfig;
  /** Project directory holding optional extra certificates under certs/ */
  projectDir: string;
}

/**
 * Credential provisioner interface
 */
export interface ICredentialProvisioner {
  layout(baseDir: string): BundlePaths;
  provision(platform: PlatformKind, baseDir: string, options: ProvisionOptions): Promise<CredentialBundle>;
  hasPlaceholderCredentials(source: CredentialBundle | string): boolean;
}

export class CredentialProvisioner implements ICredentialProvisioner {
  private readonly logger: ILogger;
  private readonly strategies: Record<MaterialKind, DiscoveryStrategy[]>;

  constructor(
    private readonly system: SystemAdapter,
    logger: ILogger
  ) {
    this.logger = logger.child({ component: 'CredentialProvisioner' });
    this.strategies = {
      certs: [
        {
          name: 'system-ca-bundle',
          platforms: ['wsl', 'ubuntu', 'generic-linux', 'cloud-workspace'],
          discover: (ctx) => this.copyMatching(SYSTEM_CA_DIR, ctx.paths.certs, /\.(pem|crt)$/),
        },
        {
          name: 'local-ca-certificates',
          platforms: ['ubuntu', 'generic-linux', 'cloud-workspace'],
          discover: (ctx) => this.copyMatching(LOCAL_CA_DIR, ctx.paths.certs, /\.crt$/),
        },
        {
          name: 'windows-cert-store',
          platforms: ['wsl'],
          discover: (ctx) =>
            this.copyTree(WINDOWS_CERT_STORE, this.system.joinPath(ctx.paths.certs, 'windows'), /\.crt$/, 'windows'),
        },
        {
          name: 'windows-user-cert-store',
          platforms: ['wsl'],
          discover: (ctx) => this.copyUserCertStores(ctx.paths.certs),
        },
        {
          name: 'macos-keychain',
          platforms: ['macos'],
          discover: (ctx) => this.exportKeychains(ctx.paths.certs),
        },
        {
          name: 'project-certs',
          discover: (ctx) =>
            this.copyMatching(this.system.joinPath(ctx.projectDir, 'certs'), ctx.paths.certs, /./),
        },
      ],
      ssh: [
        {
          name: 'host-ssh-dir',
          discover: (ctx) => this.copyTree(this.system.joinPath(ctx.home, '.ssh'), ctx.paths.ssh),
        },
        {
          name: 'sandbox-ssh-config',
          discover: async (ctx) => {
            const target = this.system.joinPath(ctx.paths.ssh, 'config');
            if (!this.system.exists(target)) {
              this.system.writeFile(target, SANDBOX_SSH_CONFIG);
            }
            return ok(['config']);
          },
        },
      ],
      aws: [
        {
          name: 'host-aws-dir',
          discover: (ctx) => this.copyTree(this.system.joinPath(ctx.home, '.aws'), ctx.paths.aws),
        },
        {
          name: 'environment-credentials',
          discover: async (ctx) => this.writeEnvironmentCredentials(ctx),
        },
        {
          name: 'staged-credentials',
          discover: async (ctx) => {
            const credentials = this.system.joinPath(ctx.paths.aws, 'credentials');
            if (!this.system.exists(credentials)) {
              return err('nothing staged yet');
            }
            if (this.containsPlaceholder(credentials)) {
              return err('staged credentials are the placeholder template');
            }
            return ok(this.listTree(ctx.paths.aws));
          },
        },
        {
          name: 'placeholder-template',
          discover: async (ctx) => {
            this.system.writeFile(this.system.joinPath(ctx.paths.aws, 'credentials'), PLACEHOLDER_AWS_CREDENTIALS);
            this.system.writeFile(this.system.joinPath(ctx.paths.aws, 'config'), PLACEHOLDER_AWS_CONFIG);
            return ok(['config', 'credentials']);
          },
        },
      ],
    };
  }

  /**
   * Create the bundle directories (mode 0755).
   */
  layout(baseDir: string): BundlePaths {
    const dir = (name: BundleDirectory): string => {
      const path = this.system.joinPath(baseDir, name);
      this.system.mkdir(path);
      this.system.chmod(path, DIRECTORY_MODE);
      return path;
    };
    return {
      workspace: dir('workspace'),
      config: dir('config'),
      cache: dir('cache'),
      certs: dir('certs'),
      ssh: dir('ssh'),
      aws: dir('aws'),
      logs: dir('logs'),
      backups: dir('backups'),
    };
  }

  async provision(platform: PlatformKind, baseDir: string, options: ProvisionOptions): Promise<CredentialBundle> {
    const paths = this.layout(baseDir);
    const ctx: StrategyContext = {
      platform,
      paths,
      home: this.system.getHomeDirectory(),
      projectDir: options.projectDir,
      config: options.config,
    };

    const bundle: CredentialBundle = { baseDir, paths, materials: {}, warnings: [] };
    const windowsLink = platform === 'wsl' ? this.linkIntoWindowsProfile(baseDir) : null;
    if (windowsLink) {
      bundle.windowsLink = windowsLink;
    }

    for (const kind of options.kinds ?? MATERIAL_KINDS) {
      const report = await this.provisionKind(kind, ctx);
      bundle.materials[kind] = report;
      const fallback = this.fallbackWarning(report);
      if (fallback) {
        this.logger.warn({ kind, attempts: report.attempts }, fallback.message);
        bundle.warnings.push(fallback);
      }
      this.applyPermissions(kind, paths[kind]);
    }

    return bundle;
  }

  /**
   * Whether the staged AWS credentials are still the template values.
   */
  hasPlaceholderCredentials(source: CredentialBundle | string): boolean {
    const awsDir = typeof source === 'string' ? this.system.joinPath(source, 'aws') : source.paths.aws;
    const credentials = this.system.joinPath(awsDir, 'credentials');
    return this.system.exists(credentials) && this.containsPlaceholder(credentials);
  }

  private async provisionKind(kind: MaterialKind, ctx: StrategyContext): Promise<MaterialReport> {
    const report: MaterialReport = { kind, attempts: [], resolvedBy: null, files: [] };
    const additive = kind === 'certs';

    for (const strategy of this.strategies[kind]) {
      if (strategy.platforms && !strategy.platforms.includes(ctx.platform)) {
        continue;
      }

      let result: Result<string[]>;
      try {
        result = await strategy.discover(ctx);
      } catch (error) {
        result = err(errorMessage(error));
      }

      const attempt: StrategyAttempt = isOk(result)
        ? { strategy: strategy.name, succeeded: true, detail: `${result.data.length} file(s) staged` }
        : { strategy: strategy.name, succeeded: false, detail: result.error };
      report.attempts.push(attempt);
      this.logger.debug({ kind, ...attempt }, 'Discovery strategy finished');

      if (isOk(result)) {
        report.resolvedBy ??= strategy.name;
        report.files.push(...result.data.filter((file) => !report.files.includes(file)));
        if (!additive) {
          break;
        }
      }
    }

    return report;
  }

  private fallbackWarning(report: MaterialReport): DevcellWarning | null {
    switch (report.kind) {
      case 'certs':
        return report.resolvedBy
          ? null
          : warning('credential-provision', 'No CA certificates found; HTTPS inside the container may fail');
      case 'ssh':
        return report.resolvedBy === 'sandbox-ssh-config'
          ? warning('credential-provision', 'No SSH directory found; staged a minimal SSH config without keys')
          : null;
      case 'aws':
        return report.resolvedBy === 'placeholder-template'
          ? warning(
              'credential-provision',
              'No AWS credentials found; edit the staged credentials file before using AWS services'
            )
          : null;
    }
  }

  private containsPlaceholder(file: string): boolean {
    const content = this.system.readFile(file);
    return content.includes(AWS_PLACEHOLDER_ACCESS_KEY) || content.includes(AWS_PLACEHOLDER_SECRET_KEY);
  }

  private writeEnvironmentCredentials(ctx: StrategyContext): Result<string[]> {
    const aws = ctx.config?.aws;
    if (!aws?.accessKeyId || !aws.secretAccessKey) {
      return err('AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY are not both set');
    }

    const lines = [
      '[default]',
      `aws_access_key_id = ${aws.accessKeyId}`,
      `aws_secret_access_key = ${aws.secretAccessKey}`,
    ];
    if (aws.sessionToken) {
      lines.push(`aws_session_token = ${aws.sessionToken}`);
    }
    this.system.writeFile(this.system.joinPath(ctx.paths.aws, 'credentials'), `${lines.join('\n')}\n`);
    this.system.writeFile(
      this.system.joinPath(ctx.paths.aws, 'config'),
      `[default]\nregion = ${aws.region}\noutput = json\n`
    );
    return ok(['config', 'credentials']);
  }

  /**
   * Windows profiles visible from WSL, shared profiles excluded.
   */
  private windowsProfiles(): string[] {
    if (!this.isDirectory(WINDOWS_USERS_DIR)) {
      return [];
    }
    return this.system
      .readDir(WINDOWS_USERS_DIR)
      .filter(
        (name) =>
          !WINDOWS_SHARED_PROFILES.test(name) && this.isDirectory(this.system.joinPath(WINDOWS_USERS_DIR, name))
      );
  }

  private async copyUserCertStores(certsDir: string): Promise<Result<string[]>> {
    const profiles = this.windowsProfiles();
    if (profiles.length === 0) {
      return err(`no Windows user profiles under ${WINDOWS_USERS_DIR}`);
    }

    const staged: string[] = [];
    for (const user of profiles) {
      const result = await this.copyTree(
        this.system.joinPath(WINDOWS_USERS_DIR, user, WINDOWS_USER_CERT_STORE),
        this.system.joinPath(certsDir, 'windows-users', user),
        /\.crt$/,
        `windows-users/${user}`
      );
      if (isOk(result)) {
        staged.push(...result.data);
      }
    }

    return staged.length > 0 ? ok(staged) : err('no certificates in Windows user stores');
  }

  /**
   * Link the base directory into the first Windows user profile.
   * Never fails the run; an existing entry at the link path is left alone.
   * @returns The link created, or null
   */
  private linkIntoWindowsProfile(baseDir: string): string | null {
    const [user] = this.windowsProfiles();
    if (!user) {
      this.logger.debug('No Windows user profile found, skipping convenience link');
      return null;
    }

    const link = this.system.joinPath(WINDOWS_USERS_DIR, user, WINDOWS_LINK_NAME);
    if (this.system.exists(link)) {
      this.logger.debug({ link }, 'Windows convenience link already present');
      return null;
    }

    try {
      this.system.symlink(baseDir, link);
    } catch (error) {
      this.logger.debug({ link, err: errorMessage(error) }, 'Could not create Windows convenience link');
      return null;
    }
    this.logger.info({ link }, 'Created Windows convenience link');
    return link;
  }

  private async exportKeychains(certsDir: string): Promise<Result<string[]>> {
    const staged: string[] = [];
    const failures: string[] = [];

    for (const { keychain, file } of MACOS_KEYCHAINS) {
      const result = await this.system.exec('security', ['find-certificate', '-a', '-p', keychain], {
        timeoutMs: KEYCHAIN_TIMEOUT_MS,
      });
      if (result.exitCode === 0 && result.stdout.trim()) {
        this.system.writeFile(this.system.joinPath(certsDir, file), result.stdout);
        staged.push(file);
      } else {
        failures.push(`${keychain}: exit ${result.exitCode}`);
      }
    }

    return staged.length > 0 ? ok(staged) : err(failures.join('; '));
  }

  /**
   * Copy the files of one directory whose names match.
   */
  private async copyMatching(sourceDir: string, targetDir: string, pattern: RegExp): Promise<Result<string[]>> {
    if (!this.isDirectory(sourceDir)) {
      return err(`${sourceDir} not found`);
    }

    const copied: string[] = [];
    for (const name of this.system.readDir(sourceDir)) {
      const source = this.system.joinPath(sourceDir, name);
      if (pattern.test(name) && this.isFile(source)) {
        this.system.copyFile(source, this.system.joinPath(targetDir, name));
        copied.push(name);
      }
    }

    return copied.length > 0 ? ok(copied) : err(`no matching files in ${sourceDir}`);
  }

  /**
   * Recursively copy a directory, optionally only files whose names match.
   * @param prefix Prefix for the returned relative paths
   */
  private async copyTree(
    sourceDir: string,
    targetDir: string,
    pattern?: RegExp,
    prefix?: string
  ): Promise<Result<string[]>> {
    if (!this.isDirectory(sourceDir)) {
      return err(`${sourceDir} not found`);
    }

    const copied: string[] = [];
    const walk = (from: string, to: string, relative: string): void => {
      for (const name of this.system.readDir(from)) {
        const source = this.system.joinPath(from, name);
        const target = this.system.joinPath(to, name);
        const rel = relative ? `${relative}/${name}` : name;
        if (this.isDirectory(source)) {
          walk(source, target, rel);
        } else if (this.isFile(source) && (!pattern || pattern.test(name))) {
          this.system.copyFile(source, target);
          copied.push(rel);
        }
      }
    };
    walk(sourceDir, targetDir, prefix ?? '');

    return copied.length > 0 ? ok(copied) : err(`no files in ${sourceDir}`);
  }

  private listTree(dir: string, relative = ''): string[] {
    const files: string[] = [];
    for (const name of this.system.readDir(dir)) {
      const full = this.system.joinPath(dir, name);
      const rel = relative ? `${relative}/${name}` : name;
      if (this.isDirectory(full)) {
        files.push(...this.listTree(full, rel));
      } else {
        files.push(rel);
      }
    }
    return files;
  }

  /**
   * Set 0600 on secret material and 0644 on everything else.
   */
  private applyPermissions(kind: MaterialKind, dir: string): void {
    for (const rel of this.listTree(dir)) {
      const mode = isSecretFile(kind, rel) ? SECRET_FILE_MODE : PUBLIC_FILE_MODE;
      this.system.chmod(this.system.joinPath(dir, rel), mode);
    }
  }

  private isDirectory(path: string): boolean {
    return this.system.exists(path) && this.system.stat(path).isDirectory();
  }

  private isFile(path: string): boolean {
    return this.system.exists(path) && this.system.stat(path).isFile();
  }
}
