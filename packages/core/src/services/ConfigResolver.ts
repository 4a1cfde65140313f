/**
 * ConfigResolver - Builds the effective configuration
 *
 * Layers, lowest precedence first:
 * 1. Built-in defaults
 * 2. Configuration file (`.devcell.env` in the project directory)
 * 3. Process environment
 * 4. Platform defaults for keys still unset
 * 5. Port conflict pass
 *
 * Derived fields (runtime selector, regions, Containerfile path) are filled in
 * before validation so the result is always a complete DevcellConfig.
 */

import { fileURLToPath } from 'node:url';
import * as fs from 'node:fs';
import type { SystemAdapter } from '../adapters/SystemAdapter';
import type { EnvironmentSource } from '../adapters/EnvironmentAdapter';
import type { ILogger } from './Logger';
import type { PortConflictResolver, PortResolution } from './PortConflictResolver';
import { ConfigurationError, DetectionFailure } from '../errors';
import {
  BUILT_IN_DEFAULTS,
  CONFIG_KEYS,
  ConfigKey,
  DEFAULT_AWS_REGION,
  DevcellConfig,
  KNOWN_BEDROCK_REGIONS,
  PORT_KEYS,
  PORT_NAMES,
  RawConfig,
  isConfigKey,
} from '../types/config';
import { PlatformKind, assertNever } from '../types/platform';
import {
  ContainerRuntimeName,
  ContainerRuntimeNameSchema,
  DevcellConfigSchema,
} from '../types/schemas';
import { DevcellWarning, warning } from '../types/warnings';

export const CONFIG_FILE_NAME = '.devcell.env';
export const DEFAULT_CONTAINERFILE = 'Containerfile';

/**
 * Runtimes probed on PATH when none is configured, in order
 */
export const RUNTIME_CANDIDATES: readonly ContainerRuntimeName[] = ['podman', 'docker'];

const TEMPLATE_URL = new URL('../../templates/devcell.env.template', import.meta.url);

/**
 * Config key reported for each schema path
 */
const FIELD_KEYS: Record<string, ConfigKey> = {
  containerRuntime: 'CONTAINER_RUNTIME',
  bindAddress: 'BIND_ADDRESS',
  socketPath: 'SOCKET_PATH',
  'ports.http': 'HTTP_PORT',
  'ports.notebook': 'JUPYTER_PORT',
  'ports.codeEditor': 'CODE_SERVER_PORT',
  'ports.debug': 'DEBUG_PORT',
  'registries.npmRegistry': 'NPM_REGISTRY',
  'registries.pipIndexUrl': 'PIP_INDEX_URL',
  'registries.mavenRepositoryUrl': 'MAVEN_REPOSITORY_URL',
  'git.githubEnterpriseUrl': 'GITHUB_ENTERPRISE_URL',
  'resources.memoryLimit': 'MEMORY_LIMIT',
  'resources.cpuLimit': 'CPU_LIMIT',
  'build.timeoutSeconds': 'BUILD_TIMEOUT_SECONDS',
};

export interface PlatformDefaults {
  bindAddress: string;
  socketPath: string;
}

/**
 * Bind address and runtime socket for a platform.
 * @throws DetectionFailure for unsupported platforms
 */
export function platformDefaults(platform: PlatformKind, uid: number): PlatformDefaults {
  const podmanSocket = `/run/user/${uid}/podman/podman.sock`;
  switch (platform) {
    case 'wsl':
      return { bindAddress: '0.0.0.0', socketPath: podmanSocket };
    case 'macos':
      return { bindAddress: '0.0.0.0', socketPath: '/var/run/docker.sock' };
    case 'ubuntu':
    case 'generic-linux':
    case 'cloud-workspace':
      return { bindAddress: '127.0.0.1', socketPath: podmanSocket };
    case 'unsupported':
      throw new DetectionFailure(platform, 'No defaults exist for an unsupported platform', 'wsl --install');
    default:
      return assertNever(platform);
  }
}

export interface ParsedConfigFile {
  values: RawConfig;
  warnings: DevcellWarning[];
}

/**
 * Strip matching quotes, or a trailing `# comment` from an unquoted value.
 * A comment may also follow the closing quote.
 */
function unquote(value: string): string {
  const quoted = /^(["'])(.*?)\1\s*(?:#.*)?$/.exec(value);
  if (quoted) {
    return quoted[2];
  }
  return value.replace(/\s+#.*$/, '');
}

/**
 * Parse `KEY=value` lines. Unknown keys are skipped; lines that are not
 * assignments produce a warning. Empty values count as unset.
 */
export function parseConfigFile(content: string, source = CONFIG_FILE_NAME): ParsedConfigFile {
  const values: RawConfig = {};
  const warnings: DevcellWarning[] = [];

  content.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) {
      return;
    }

    const match = line.replace(/^export\s+/, '').match(/^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/);
    if (!match) {
      warnings.push(warning('config-file', `Ignoring malformed line ${index + 1} in ${source}`));
      return;
    }

    const [, key, rawValue] = match;
    const value = unquote(rawValue.trim());
    if (isConfigKey(key) && value !== '') {
      values[key] = value;
    }
  });

  return { values, warnings };
}

/**
 * Read the bundled configuration template.
 */
export function readConfigTemplate(): string {
  return fs.readFileSync(fileURLToPath(TEMPLATE_URL), 'utf-8');
}

export interface ConfigResolverOptions {
  /** Project directory; relative paths resolve against it */
  projectDir: string;
  /** Configuration file path, defaults to `<projectDir>/.devcell.env` */
  configFile?: string;
}

export interface RuntimeSelection {
  runtime: ContainerRuntimeName;
  /** Runtime came from configuration rather than PATH detection */
  explicit: boolean;
  warnings: DevcellWarning[];
}

export interface ResolvedConfig {
  config: DevcellConfig;
  ports: PortResolution;
  warnings: DevcellWarning[];
  /** Configuration file that contributed values, or null */
  configFile: string | null;
}

/**
 * Config resolver interface
 */
export interface IConfigResolver {
  readonly configFile: string;
  resolve(platform: PlatformKind): Promise<ResolvedConfig>;
  resolveRuntimeSelector(): Promise<RuntimeSelection>;
  writeTemplate(path?: string): string;
}

export class ConfigResolver implements IConfigResolver {
  readonly configFile: string;
  private readonly logger: ILogger;

  constructor(
    private readonly system: SystemAdapter,
    private readonly env: EnvironmentSource,
    private readonly ports: PortConflictResolver,
    logger: ILogger,
    private readonly options: ConfigResolverOptions
  ) {
    this.logger = logger.child({ component: 'ConfigResolver' });
    this.configFile = options.configFile ?? system.joinPath(options.projectDir, CONFIG_FILE_NAME);
  }

  /**
   * Produce the validated configuration for a platform.
   * @throws ConfigurationError listing every invalid field
   * @throws DetectionFailure for unsupported platforms
   */
  async resolve(platform: PlatformKind): Promise<ResolvedConfig> {
    const defaults = platformDefaults(platform, this.system.getUserIds().uid);
    const { raw, configFile, warnings } = this.mergeLayers();

    raw.BIND_ADDRESS ??= defaults.bindAddress;
    raw.SOCKET_PATH ??= defaults.socketPath;

    const selection = await this.selectRuntime(raw);
    warnings.push(...selection.warnings);

    // An explicit model region also drives the general AWS region
    if (raw.AWS_BEDROCK_REGION) {
      raw.AWS_REGION = raw.AWS_BEDROCK_REGION;
    } else {
      raw.AWS_BEDROCK_REGION = raw.AWS_REGION ?? DEFAULT_AWS_REGION;
    }
    raw.AWS_REGION ??= DEFAULT_AWS_REGION;

    const parsed = DevcellConfigSchema.safeParse({
      containerRuntime: selection.runtime,
      bindAddress: raw.BIND_ADDRESS,
      socketPath: raw.SOCKET_PATH,
      ports: {
        http: raw.HTTP_PORT,
        notebook: raw.JUPYTER_PORT,
        codeEditor: raw.CODE_SERVER_PORT,
        debug: raw.DEBUG_PORT,
      },
      proxy: {
        httpProxy: raw.HTTP_PROXY,
        httpsProxy: raw.HTTPS_PROXY,
        noProxy: raw.NO_PROXY,
      },
      registries: {
        npmRegistry: raw.NPM_REGISTRY,
        pipIndexUrl: raw.PIP_INDEX_URL,
        mavenRepositoryUrl: raw.MAVEN_REPOSITORY_URL,
      },
      aws: {
        profile: raw.AWS_PROFILE,
        region: raw.AWS_REGION,
        bedrockRegion: raw.AWS_BEDROCK_REGION,
        bedrockModelId: raw.AWS_BEDROCK_MODEL_ID,
        accessKeyId: raw.AWS_ACCESS_KEY_ID,
        secretAccessKey: raw.AWS_SECRET_ACCESS_KEY,
        sessionToken: raw.AWS_SESSION_TOKEN,
      },
      git: {
        userName: raw.GIT_USER_NAME,
        userEmail: raw.GIT_USER_EMAIL,
        githubToken: raw.GITHUB_TOKEN,
        githubEnterpriseUrl: raw.GITHUB_ENTERPRISE_URL,
      },
      resources: {
        memoryLimit: raw.MEMORY_LIMIT,
        cpuLimit: raw.CPU_LIMIT,
      },
      build: {
        containerfile: this.resolveProjectPath(raw.CONTAINERFILE ?? DEFAULT_CONTAINERFILE),
        timeoutSeconds: raw.BUILD_TIMEOUT_SECONDS,
      },
    });

    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => {
        const path = issue.path.map(String).join('.');
        return `${FIELD_KEYS[path] ?? path}: ${issue.message}`;
      });
      throw new ConfigurationError(issues, configFile ?? undefined);
    }

    const config = parsed.data;

    if (!KNOWN_BEDROCK_REGIONS.includes(config.aws.bedrockRegion)) {
      const advisory = warning(
        'region',
        `Region ${config.aws.bedrockRegion} may not offer the model service (known regions: ${KNOWN_BEDROCK_REGIONS.join(', ')})`
      );
      this.logger.warn(advisory.message);
      warnings.push(advisory);
    }

    const ports = await this.ports.resolve(config.ports);
    warnings.push(...ports.warnings);
    for (const assignment of ports.assignments) {
      config.ports[assignment.name] = assignment.resolved;
    }
    this.assertDistinctPorts(config);

    this.logger.debug(
      { runtime: config.containerRuntime, bindAddress: config.bindAddress, ports: config.ports },
      'Configuration resolved'
    );

    return { config, ports, warnings, configFile };
  }

  /**
   * Determine the container runtime from file, environment and PATH only.
   * @throws ConfigurationError when the configured runtime is not recognised
   */
  async resolveRuntimeSelector(): Promise<RuntimeSelection> {
    const { raw } = this.mergeLayers();
    return this.selectRuntime(raw);
  }

  /**
   * Write the configuration template, replacing any existing file.
   * @returns The path written
   */
  writeTemplate(path: string = this.configFile): string {
    this.system.writeFile(path, readConfigTemplate());
    this.logger.info({ path }, 'Configuration template written');
    return path;
  }

  private mergeLayers(): { raw: RawConfig; configFile: string | null; warnings: DevcellWarning[] } {
    const warnings: DevcellWarning[] = [];
    let fileValues: RawConfig = {};
    let configFile: string | null = null;

    if (this.system.exists(this.configFile)) {
      const parsed = parseConfigFile(this.system.readFile(this.configFile), this.configFile);
      fileValues = parsed.values;
      configFile = this.configFile;
      for (const item of parsed.warnings) {
        this.logger.warn(item.message);
      }
      warnings.push(...parsed.warnings);
    } else {
      this.logger.debug({ path: this.configFile }, 'No configuration file');
    }

    const envValues: RawConfig = {};
    for (const key of CONFIG_KEYS) {
      const value = this.env.get(key);
      if (value !== undefined) {
        envValues[key] = value;
      }
    }

    return { raw: { ...BUILT_IN_DEFAULTS, ...fileValues, ...envValues }, configFile, warnings };
  }

  private async selectRuntime(raw: RawConfig): Promise<RuntimeSelection> {
    if (raw.CONTAINER_RUNTIME !== undefined) {
      const parsed = ContainerRuntimeNameSchema.safeParse(raw.CONTAINER_RUNTIME);
      if (!parsed.success) {
        throw new ConfigurationError(
          parsed.error.issues.map((issue) => `CONTAINER_RUNTIME: ${issue.message}`)
        );
      }
      return { runtime: parsed.data, explicit: true, warnings: [] };
    }

    for (const candidate of RUNTIME_CANDIDATES) {
      if (await this.system.commandExists(candidate)) {
        this.logger.debug({ runtime: candidate }, 'Container runtime detected');
        return { runtime: candidate, explicit: false, warnings: [] };
      }
    }

    const fallback = RUNTIME_CANDIDATES[0];
    const missing = warning(
      'runtime',
      `No container runtime found on PATH (tried ${RUNTIME_CANDIDATES.join(', ')}); assuming ${fallback}`
    );
    this.logger.warn(missing.message);
    return { runtime: fallback, explicit: false, warnings: [missing] };
  }

  private resolveProjectPath(path: string): string {
    return path.startsWith('/') ? path : this.system.joinPath(this.options.projectDir, path);
  }

  private assertDistinctPorts(config: DevcellConfig): void {
    const seen = new Map<number, ConfigKey>();
    const issues: string[] = [];
    for (const name of PORT_NAMES) {
      const port = config.ports[name];
      const previous = seen.get(port);
      if (previous) {
        issues.push(`${PORT_KEYS[name]}: port ${port} is already used by ${previous}`);
      } else {
        seen.set(port, PORT_KEYS[name]);
      }
    }
    if (issues.length > 0) {
      throw new ConfigurationError(issues);
    }
  }
}
