/**
 * Tests for PlatformDetector
 */

import { describe, it, expect } from 'vitest';
import {
  HostSignals,
  assertSupportedPlatform,
  detectPlatform,
  parseOsRelease,
  readHostSignals,
} from '../../services/PlatformDetector';
import { StaticEnvironment } from '../../adapters/EnvironmentAdapter';
import { DetectionFailure } from '../../errors';
import { MockSystemAdapter } from '../mocks/MockSystemAdapter';

const UBUNTU_OS_RELEASE = 'NAME="Ubuntu"\nID=ubuntu\nID_LIKE=debian\nVERSION_ID="22.04"\n';
const MINT_OS_RELEASE = 'NAME="Linux Mint"\nID=linuxmint\nID_LIKE="ubuntu debian"\n';
const FEDORA_OS_RELEASE = 'NAME="Fedora Linux"\nID=fedora\n';

function signals(overrides: Partial<HostSignals> = {}): HostSignals {
  return { osType: 'linux', procVersion: null, osRelease: null, env: {}, ...overrides };
}

describe('detectPlatform', () => {
  it('classifies native Windows as unsupported', () => {
    expect(detectPlatform(signals({ osType: 'win32' })).kind).toBe('unsupported');
    expect(detectPlatform(signals({ osType: 'cygwin' })).kind).toBe('unsupported');
  });

  it('classifies Darwin as macos', () => {
    const detection = detectPlatform(signals({ osType: 'darwin' }));
    expect(detection.kind).toBe('macos');
    expect(detection.label).toBe('macOS');
    expect(detection.warnings).toEqual([]);
  });

  it('detects WSL from the kernel version string', () => {
    const detection = detectPlatform(
      signals({ procVersion: 'Linux version 5.15.90.1-microsoft-standard-WSL2', osRelease: UBUNTU_OS_RELEASE })
    );
    expect(detection.kind).toBe('wsl');
  });

  it('detects WSL from the distro variable', () => {
    expect(detectPlatform(signals({ env: { WSL_DISTRO_NAME: 'Ubuntu' } })).kind).toBe('wsl');
  });

  it('ranks WSL above cloud workspace markers', () => {
    const detection = detectPlatform(
      signals({ procVersion: 'Linux version 5.15 Microsoft', env: { CODESPACES: 'true' } })
    );
    expect(detection.kind).toBe('wsl');
  });

  it('ranks cloud workspace markers above Ubuntu', () => {
    const detection = detectPlatform(signals({ osRelease: UBUNTU_OS_RELEASE, env: { GITPOD_WORKSPACE_ID: 'ws-1' } }));
    expect(detection.kind).toBe('cloud-workspace');
  });

  it.each(['AWS_EXECUTION_ENV', 'AWS_BATCH_JOB_ID', 'CODESPACES', 'GITPOD_WORKSPACE_ID', 'CLOUD_SHELL'])(
    'treats %s as a cloud workspace marker',
    (marker) => {
      expect(detectPlatform(signals({ env: { [marker]: '1' } })).kind).toBe('cloud-workspace');
    }
  );

  it('detects Ubuntu and derivatives from os-release', () => {
    expect(detectPlatform(signals({ osRelease: UBUNTU_OS_RELEASE })).kind).toBe('ubuntu');
    expect(detectPlatform(signals({ osRelease: MINT_OS_RELEASE })).kind).toBe('ubuntu');
  });

  it('falls back to generic Linux for other distributions', () => {
    const detection = detectPlatform(signals({ osRelease: FEDORA_OS_RELEASE }));
    expect(detection.kind).toBe('generic-linux');
    expect(detection.warnings).toEqual([]);
  });

  it('degrades unknown hosts to generic Linux with a warning', () => {
    const detection = detectPlatform(signals({ osType: 'freebsd' }));
    expect(detection.kind).toBe('generic-linux');
    expect(detection.warnings).toEqual([
      { kind: 'platform', message: "Unknown platform 'freebsd', continuing with generic Linux defaults" },
    ]);
  });

  it('is deterministic for the same signals', () => {
    const input = signals({ osRelease: UBUNTU_OS_RELEASE });
    expect(detectPlatform(input)).toEqual(detectPlatform(input));
  });
});

describe('parseOsRelease', () => {
  it('strips quotes from values', () => {
    expect(parseOsRelease(MINT_OS_RELEASE)).toEqual({
      NAME: 'Linux Mint',
      ID: 'linuxmint',
      ID_LIKE: 'ubuntu debian',
    });
  });
});

describe('readHostSignals', () => {
  it('reads kernel and os-release files on Linux', () => {
    const system = new MockSystemAdapter();
    system.addFile('/proc/version', 'Linux version 6.1.0');
    system.addFile('/etc/os-release', UBUNTU_OS_RELEASE);

    const result = readHostSignals(system, new StaticEnvironment({ HOME: '/home/test' }));

    expect(result).toEqual({
      osType: 'linux',
      procVersion: 'Linux version 6.1.0',
      osRelease: UBUNTU_OS_RELEASE,
      env: { HOME: '/home/test' },
    });
  });

  it('returns null for missing files', () => {
    const system = new MockSystemAdapter();
    const result = readHostSignals(system, new StaticEnvironment());
    expect(result.procVersion).toBeNull();
    expect(result.osRelease).toBeNull();
  });

  it('does not read Linux files on other hosts', () => {
    const system = new MockSystemAdapter();
    system.setOsType('darwin');
    system.addFile('/proc/version', 'should not be read');
    expect(readHostSignals(system, new StaticEnvironment()).procVersion).toBeNull();
  });
});

describe('assertSupportedPlatform', () => {
  it('throws a DetectionFailure with a remediation hint for unsupported hosts', () => {
    const detection = detectPlatform(signals({ osType: 'win32' }));
    expect(() => assertSupportedPlatform(detection)).toThrow(DetectionFailure);
    try {
      assertSupportedPlatform(detection);
    } catch (error) {
      expect(error).toBeInstanceOf(DetectionFailure);
      expect(error).toMatchObject({ code: 'DETECTION_FAILURE', hint: 'wsl --install' });
    }
  });

  it('accepts supported hosts', () => {
    expect(() => assertSupportedPlatform(detectPlatform(signals()))).not.toThrow();
  });
});
