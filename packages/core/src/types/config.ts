/**
 * Configuration model
 *
 * Settings are addressed by the same upper-case keys in the configuration
 * file and the process environment. The resolver merges raw string layers and
 * validates them into a DevcellConfig.
 */

import type { ValidatedDevcellConfig } from './schemas';

export type DevcellConfig = ValidatedDevcellConfig;

export type PortName = keyof DevcellConfig['ports'];

export const PORT_NAMES: readonly PortName[] = ['http', 'notebook', 'codeEditor', 'debug'];

/**
 * Every recognised configuration key.
 */
export const CONFIG_KEYS = [
  'CONTAINER_RUNTIME',
  'HTTP_PORT',
  'JUPYTER_PORT',
  'CODE_SERVER_PORT',
  'DEBUG_PORT',
  'BIND_ADDRESS',
  'SOCKET_PATH',
  'HTTP_PROXY',
  'HTTPS_PROXY',
  'NO_PROXY',
  'NPM_REGISTRY',
  'PIP_INDEX_URL',
  'MAVEN_REPOSITORY_URL',
  'AWS_PROFILE',
  'AWS_REGION',
  'AWS_BEDROCK_REGION',
  'AWS_BEDROCK_MODEL_ID',
  'AWS_ACCESS_KEY_ID',
  'AWS_SECRET_ACCESS_KEY',
  'AWS_SESSION_TOKEN',
  'GIT_USER_NAME',
  'GIT_USER_EMAIL',
  'GITHUB_TOKEN',
  'GITHUB_ENTERPRISE_URL',
  'MEMORY_LIMIT',
  'CPU_LIMIT',
  'CONTAINERFILE',
  'BUILD_TIMEOUT_SECONDS',
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

/**
 * One layer of raw, unvalidated settings.
 */
export type RawConfig = Partial<Record<ConfigKey, string>>;

export function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

/**
 * Configuration key backing each logical port.
 */
export const PORT_KEYS: Record<PortName, ConfigKey> = {
  http: 'HTTP_PORT',
  notebook: 'JUPYTER_PORT',
  codeEditor: 'CODE_SERVER_PORT',
  debug: 'DEBUG_PORT',
};

/**
 * Port each service listens on inside the container.
 */
export const CONTAINER_PORTS: Record<PortName, number> = {
  http: 3000,
  notebook: 8888,
  codeEditor: 8080,
  debug: 5000,
};

/**
 * Built-in defaults (lowest precedence). Bind address and socket path are
 * intentionally absent: they come from platform defaults.
 */
export const BUILT_IN_DEFAULTS: RawConfig = {
  HTTP_PORT: '3000',
  JUPYTER_PORT: '8888',
  CODE_SERVER_PORT: '8080',
  DEBUG_PORT: '5000',
  AWS_BEDROCK_MODEL_ID: 'anthropic.claude-3-sonnet-20240229-v1:0',
  BUILD_TIMEOUT_SECONDS: '3600',
};

export const DEFAULT_AWS_REGION = 'us-east-1';

/**
 * Regions where the model service is known to be available.
 */
export const KNOWN_BEDROCK_REGIONS: readonly string[] = [
  'us-east-1',
  'us-west-2',
  'eu-west-1',
  'ap-southeast-1',
  'ap-northeast-1',
];
