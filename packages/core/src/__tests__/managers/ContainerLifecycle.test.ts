/**
 * Tests for ContainerLifecycle
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ContainerLifecycle,
  buildArgs,
  installHint,
  publishSpec,
  startHint,
} from '../../managers/ContainerLifecycle';
import { StaticEnvironment } from '../../adapters/EnvironmentAdapter';
import { BuildError, CommandTimeoutError, RunError, RuntimeUnavailable } from '../../errors';
import type { CredentialBundle } from '../../types/credentials';
import { MockSystemAdapter } from '../mocks/MockSystemAdapter';
import { MockContainerRuntime } from '../mocks/MockContainerRuntime';
import { createCapturingLogger } from '../mocks/testLogger';
import { createTestConfig } from '../mocks/testConfig';

const BASE = '/b';

function testBundle(): CredentialBundle {
  return {
    baseDir: BASE,
    paths: {
      workspace: `${BASE}/workspace`,
      config: `${BASE}/config`,
      cache: `${BASE}/cache`,
      certs: `${BASE}/certs`,
      ssh: `${BASE}/ssh`,
      aws: `${BASE}/aws`,
      logs: `${BASE}/logs`,
      backups: `${BASE}/backups`,
    },
    materials: {},
    warnings: [],
  };
}

/**
 * Values that follow each occurrence of a flag
 */
function valuesOf(args: string[], flag: string): string[] {
  return args.flatMap((arg, i) => (arg === flag && i + 1 < args.length ? [args[i + 1]] : []));
}

describe('publishSpec', () => {
  it('joins address and ports', () => {
    expect(publishSpec('127.0.0.1', 4000, 3000)).toBe('127.0.0.1:4000:3000');
  });

  it('brackets IPv6 literals', () => {
    expect(publishSpec('::1', 4000, 3000)).toBe('[::1]:4000:3000');
  });
});

describe('buildArgs', () => {
  it('includes only configured proxy and registry values', () => {
    const config = createTestConfig({
      proxy: { httpProxy: 'http://proxy:3128', noProxy: 'localhost' },
      registries: { pipIndexUrl: 'https://pypi.example.com/simple' },
    });

    expect(buildArgs(config)).toEqual({
      HTTP_PROXY: 'http://proxy:3128',
      NO_PROXY: 'localhost',
      PIP_INDEX_URL: 'https://pypi.example.com/simple',
    });
  });
});

describe('hints', () => {
  it('names the platform install command', () => {
    expect(installHint('podman', 'ubuntu')).toBe('sudo apt-get install -y podman');
    expect(installHint('podman', 'macos')).toBe('brew install podman && podman machine init && podman machine start');
  });

  it('names how to start the runtime', () => {
    expect(startHint('podman', 'macos')).toBe('podman machine start');
    expect(startHint('docker', 'ubuntu')).toBe('sudo systemctl start docker');
  });
});

describe('ContainerLifecycle', () => {
  let system: MockSystemAdapter;
  let runtime: MockContainerRuntime;
  let env: Record<string, string>;

  beforeEach(() => {
    system = new MockSystemAdapter();
    runtime = new MockContainerRuntime();
    env = {};
  });

  function createLifecycle(): ContainerLifecycle {
    return new ContainerLifecycle(runtime, system, new StaticEnvironment(env), createCapturingLogger().logger, {
      projectDir: '/project',
    });
  }

  describe('ensureRuntime', () => {
    it('fails with an install hint when the runtime is missing', async () => {
      runtime.installed = false;

      await expect(createLifecycle().ensureRuntime('ubuntu')).rejects.toMatchObject({
        message: "Container runtime 'podman' is not installed",
        hint: 'sudo apt-get install -y podman',
      });
    });

    it('fails with a start hint when the runtime does not respond', async () => {
      runtime.available = false;

      const error = await createLifecycle()
        .ensureRuntime('macos')
        .then(() => null, (e: unknown) => e);

      expect(error).toBeInstanceOf(RuntimeUnavailable);
      expect(error).toMatchObject({ hint: 'podman machine start' });
    });

    it('passes when the runtime responds', async () => {
      await expect(createLifecycle().ensureRuntime('ubuntu')).resolves.toBeUndefined();
    });
  });

  describe('build', () => {
    beforeEach(() => {
      system.addFile('/project/Containerfile', 'FROM ubuntu:22.04\n');
    });

    it('builds from the project directory with a timeout in milliseconds', async () => {
      await createLifecycle().build(createTestConfig({ proxy: { httpsProxy: 'http://proxy:3128' } }));

      expect(runtime.builds).toEqual([
        {
          tag: 'devcell:latest',
          containerfile: '/project/Containerfile',
          context: '/project',
          buildArgs: { HTTPS_PROXY: 'http://proxy:3128' },
          timeoutMs: 3_600_000,
        },
      ]);
    });

    it('fails before invoking the runtime when the Containerfile is missing', async () => {
      const config = createTestConfig({ build: { containerfile: '/project/Missing', timeoutSeconds: 60 } });

      await expect(createLifecycle().build(config)).rejects.toThrow(
        "Failed to build image 'devcell:latest': Containerfile not found: /project/Missing"
      );
      expect(runtime.builds).toEqual([]);
    });

    it('reports a non-zero build exit', async () => {
      runtime.buildExitCode = 2;

      await expect(createLifecycle().build(createTestConfig())).rejects.toThrow(
        "Failed to build image 'devcell:latest': podman build exited with code 2"
      );
    });

    it('reports a timeout in seconds', async () => {
      runtime.buildError = new CommandTimeoutError('podman build', 60_000);
      const config = createTestConfig({ build: { containerfile: '/project/Containerfile', timeoutSeconds: 60 } });

      const error = await createLifecycle()
        .build(config)
        .then(() => null, (e: unknown) => e);

      expect(error).toBeInstanceOf(BuildError);
      expect(error).toMatchObject({ message: "Failed to build image 'devcell:latest': timed out after 60s" });
    });

    it('skips the build when the image exists', async () => {
      runtime.images.add('devcell:latest');

      expect(await createLifecycle().buildIfNeeded(createTestConfig(), false)).toBe(false);
      expect(runtime.builds).toHaveLength(0);
    });

    it('rebuilds on request', async () => {
      runtime.images.add('devcell:latest');

      expect(await createLifecycle().buildIfNeeded(createTestConfig(), true)).toBe(true);
      expect(runtime.builds).toHaveLength(1);
    });
  });

  describe('runOptions', () => {
    it('assembles options for a Linux host', () => {
      const args = createLifecycle().runOptions(createTestConfig(), testBundle(), 'ubuntu');

      expect(args).toEqual([
        '--name', 'devcell',
        '--rm',
        '--interactive',
        '--tty',
        '--hostname', 'devcell',
        '--env', 'TERM=xterm-256color',
        '--env', 'PLATFORM=ubuntu',
        '--volume', '/b/workspace:/workspace:Z',
        '--volume', '/b/config:/config:Z',
        '--volume', '/b/cache:/cache:Z',
        '--volume', '/b/certs:/certs:ro,Z',
        '--volume', '/b/ssh:/home/developer/.ssh:ro,Z',
        '--volume', '/b/aws:/home/developer/.aws:ro,Z',
        '--volume', '/b/logs:/logs:Z',
        '--publish', '127.0.0.1:3000:3000',
        '--publish', '127.0.0.1:8888:8888',
        '--publish', '127.0.0.1:8080:8080',
        '--publish', '127.0.0.1:5000:5000',
        '--env', 'AWS_REGION=us-east-1',
        '--env', 'AWS_BEDROCK_REGION=us-east-1',
        '--env', 'AWS_BEDROCK_MODEL_ID=anthropic.claude-3-sonnet-20240229-v1:0',
        '--security-opt', 'seccomp=unconfined',
        '--cap-add', 'SYS_PTRACE',
        '--env', 'SANDBOX_USER_ID=1000',
        '--env', 'SANDBOX_GROUP_ID=1000',
      ]);
    });

    it('maps resolved host ports onto fixed container ports', () => {
      const config = createTestConfig({
        bindAddress: '::1',
        ports: { http: 4000, notebook: 8888, codeEditor: 9080, debug: 5000 },
      });

      const args = createLifecycle().runOptions(config, testBundle(), 'ubuntu');

      expect(valuesOf(args, '--publish')).toEqual([
        '[::1]:4000:3000',
        '[::1]:8888:8888',
        '[::1]:9080:8080',
        '[::1]:5000:5000',
      ]);
    });

    it('adds WSL host integration', () => {
      env = { WSL_DISTRO_NAME: 'Ubuntu-22.04', TERM: 'screen' };

      const args = createLifecycle().runOptions(createTestConfig(), testBundle(), 'wsl');

      expect(valuesOf(args, '--env')).toContain('WSL_DISTRO_NAME=Ubuntu-22.04');
      expect(valuesOf(args, '--env')).toContain('TERM=screen');
      expect(valuesOf(args, '--add-host')).toEqual(['host.docker.internal:host-gateway']);
    });

    it('mounts the Docker socket on macOS when it exists', () => {
      system.addFile('/var/run/docker.sock', '');

      const args = createLifecycle().runOptions(createTestConfig(), testBundle(), 'macos');

      expect(valuesOf(args, '--volume')).toContain('/var/run/docker.sock:/var/run/docker.sock:Z');
    });

    it('forwards resource limits and optional settings', () => {
      const config = createTestConfig({
        resources: { memoryLimit: '4g', cpuLimit: '2' },
        git: { userName: 'Test User', githubToken: 'test-token' },
      });

      const args = createLifecycle().runOptions(config, testBundle(), 'ubuntu');

      expect(valuesOf(args, '--memory')).toEqual(['4g']);
      expect(valuesOf(args, '--cpus')).toEqual(['2']);
      expect(valuesOf(args, '--env')).toEqual(
        expect.arrayContaining(['GITHUB_TOKEN=test-token', 'GIT_USER_NAME=Test User'])
      );
    });
  });

  describe('run', () => {
    it('runs the image with the given command and returns its exit code', async () => {
      runtime.runExitCode = 3;

      const code = await createLifecycle().run(createTestConfig(), testBundle(), 'ubuntu', ['/bin/bash']);

      expect(code).toBe(3);
      expect(runtime.runs[0]).toMatchObject({ name: 'devcell', image: 'devcell:latest', command: ['/bin/bash'] });
    });

    it('wraps start failures in a RunError', async () => {
      runtime.runError = new Error('spawn podman ENOENT');

      const error = await createLifecycle()
        .run(createTestConfig(), testBundle(), 'ubuntu')
        .then(() => null, (e: unknown) => e);

      expect(error).toBeInstanceOf(RunError);
      expect(error).toMatchObject({ exitCode: 1, message: 'Failed to start container: spawn podman ENOENT' });
    });
  });

  describe('stop and remove', () => {
    it('does nothing when the container is not running', async () => {
      expect(await createLifecycle().stop()).toBe(false);
      expect(runtime.stopped).toEqual([]);
    });

    it('stops a running container', async () => {
      runtime.running.add('devcell');

      expect(await createLifecycle().stop()).toBe(true);
      expect(runtime.stopped).toEqual(['devcell']);
      expect(runtime.removed).toEqual([]);
    });

    it('forces removal when stop fails', async () => {
      runtime.running.add('devcell');
      runtime.stopSucceeds = false;

      await createLifecycle().stop();

      expect(runtime.removed).toEqual(['devcell']);
    });

    it('removes the image only when asked', async () => {
      runtime.images.add('devcell:latest');
      const lifecycle = createLifecycle();

      await lifecycle.remove(false);
      expect(runtime.removedImages).toEqual([]);

      await lifecycle.remove(true);
      expect(runtime.removedImages).toEqual(['devcell:latest']);
    });
  });
});
