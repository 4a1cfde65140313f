/**
 * PlatformDetector - Classifies the host
 *
 * `detectPlatform` is a pure function of the collected host signals.
 * `readHostSignals` is the only place that gathers them.
 */

import type { SystemAdapter, OsType } from '../adapters/SystemAdapter';
import type { EnvironmentSource } from '../adapters/EnvironmentAdapter';
import { DetectionFailure } from '../errors';
import { PlatformKind, describePlatform } from '../types/platform';
import { DevcellWarning, warning } from '../types/warnings';

/**
 * Raw host signals used for classification
 */
export interface HostSignals {
  osType: OsType;
  /** Contents of /proc/version, or null when unavailable */
  procVersion: string | null;
  /** Contents of /etc/os-release, or null when unavailable */
  osRelease: string | null;
  env: Record<string, string>;
}

export interface PlatformDetection {
  kind: PlatformKind;
  label: string;
  warnings: DevcellWarning[];
}

/**
 * Environment variables set by managed cloud workspaces
 */
export const CLOUD_WORKSPACE_MARKERS: readonly string[] = [
  'AWS_EXECUTION_ENV',
  'AWS_BATCH_JOB_ID',
  'CODESPACES',
  'GITPOD_WORKSPACE_ID',
  'CLOUD_SHELL',
];

const PROC_VERSION_PATH = '/proc/version';
const OS_RELEASE_PATH = '/etc/os-release';

function readOptional(system: SystemAdapter, path: string): string | null {
  if (!system.exists(path)) {
    return null;
  }
  try {
    return system.readFile(path);
  } catch {
    return null;
  }
}

/**
 * Collect the signals detection depends on.
 */
export function readHostSignals(system: SystemAdapter, env: EnvironmentSource): HostSignals {
  const osType = system.getOsType();
  const isLinux = osType === 'linux';
  return {
    osType,
    procVersion: isLinux ? readOptional(system, PROC_VERSION_PATH) : null,
    osRelease: isLinux ? readOptional(system, OS_RELEASE_PATH) : null,
    env: env.toRecord(),
  };
}

/**
 * Parse KEY=value lines of an os-release file
 */
export function parseOsRelease(content: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const line of content.split('\n')) {
    const match = line.match(/^([A-Z_]+)=(.*)$/);
    if (match) {
      fields[match[1]] = match[2].replace(/^["']|["']$/g, '');
    }
  }
  return fields;
}

function isUbuntuLike(osRelease: string | null): boolean {
  if (!osRelease) {
    return false;
  }
  const fields = parseOsRelease(osRelease);
  const id = (fields.ID ?? '').toLowerCase();
  const idLike = (fields.ID_LIKE ?? '').toLowerCase().split(/\s+/);
  return id === 'ubuntu' || idLike.includes('ubuntu');
}

function classify(kind: PlatformKind, warnings: DevcellWarning[] = []): PlatformDetection {
  return { kind, label: describePlatform(kind), warnings };
}

/**
 * Classify the host. Native Windows is the only `unsupported` result; other
 * unknown hosts degrade to generic Linux with a warning.
 */
export function detectPlatform(signals: HostSignals): PlatformDetection {
  const { osType, procVersion, osRelease, env } = signals;

  if (osType === 'win32' || osType === 'cygwin') {
    return classify('unsupported');
  }

  if (osType === 'darwin') {
    return classify('macos');
  }

  if (osType === 'linux') {
    // Compatibility layer outranks every other Linux signal
    if ((procVersion ?? '').toLowerCase().includes('microsoft') || env.WSL_DISTRO_NAME) {
      return classify('wsl');
    }
    if (CLOUD_WORKSPACE_MARKERS.some((marker) => Boolean(env[marker]))) {
      return classify('cloud-workspace');
    }
    if (isUbuntuLike(osRelease)) {
      return classify('ubuntu');
    }
    return classify('generic-linux');
  }

  return classify('generic-linux', [
    warning('platform', `Unknown platform '${osType}', continuing with generic Linux defaults`),
  ]);
}

/**
 * Throw for platforms the environment cannot run on.
 */
export function assertSupportedPlatform(detection: PlatformDetection): void {
  if (detection.kind === 'unsupported') {
    throw new DetectionFailure(
      detection.kind,
      'Native Windows is not supported; run devcell from inside WSL2',
      'wsl --install'
    );
  }
}
