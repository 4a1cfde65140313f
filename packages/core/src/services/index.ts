/**
 * Core services
 */

// Logger
export { createLogger } from './Logger';
export type { ILogger, LogLevel, LoggerOptions } from './Logger';

// PlatformDetector
export {
  CLOUD_WORKSPACE_MARKERS,
  assertSupportedPlatform,
  detectPlatform,
  parseOsRelease,
  readHostSignals,
} from './PlatformDetector';
export type { HostSignals, PlatformDetection } from './PlatformDetector';

// PortConflictResolver
export {
  LISTENER_PROBES,
  PORT_CONFLICT_OFFSET,
  PortConflictResolver,
  parseListeningPorts,
} from './PortConflictResolver';
export type { DesiredPorts, PortAssignment, PortResolution } from './PortConflictResolver';

// ConfigResolver
export {
  CONFIG_FILE_NAME,
  ConfigResolver,
  DEFAULT_CONTAINERFILE,
  RUNTIME_CANDIDATES,
  parseConfigFile,
  platformDefaults,
  readConfigTemplate,
} from './ConfigResolver';
export type {
  ConfigResolverOptions,
  IConfigResolver,
  ParsedConfigFile,
  PlatformDefaults,
  ResolvedConfig,
  RuntimeSelection,
} from './ConfigResolver';

// CredentialProvisioner
export {
  CredentialProvisioner,
  DIRECTORY_MODE,
  PUBLIC_FILE_MODE,
  SECRET_FILE_MODE,
  WINDOWS_LINK_NAME,
  isSecretFile,
} from './CredentialProvisioner';
export type { ICredentialProvisioner, ProvisionOptions } from './CredentialProvisioner';
