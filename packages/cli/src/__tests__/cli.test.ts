/**
 * CLI Integration Tests
 *
 * Runs commands in-process against the in-memory host and runtime.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { StaticEnvironment } from '@devcell/core';
import { FakeSignalSource, MockContainerRuntime, MockSystemAdapter } from '@devcell/core/testing';
import { runCommand, type CommandResult } from '../cli.js';
import { readPackageInfo } from '../version.js';

const PROJECT_DIR = '/project';
const PLACEHOLDER_ISSUE = 'AWS credentials not configured - still contains placeholder values';

describe('CLI Integration Tests', () => {
  let system: MockSystemAdapter;
  let runtime: MockContainerRuntime;
  let env: Record<string, string>;

  beforeEach(() => {
    system = new MockSystemAdapter();
    system.addCommands('podman');
    system.addFile(`${PROJECT_DIR}/Containerfile`, 'FROM ubuntu:22.04\n');
    runtime = new MockContainerRuntime();
    env = {};
  });

  function runCli(args: string[]): Promise<CommandResult> {
    return runCommand(args, {
      cwd: PROJECT_DIR,
      services: {
        system,
        env: new StaticEnvironment(env),
        signals: new FakeSignalSource(),
        createRuntime: () => runtime,
      },
    });
  }

  function stageAwsCredentials(): void {
    system.addFile('/home/test/.aws/credentials', '[default]\naws_access_key_id = test-access-key\n');
  }

  describe('program', () => {
    it('prints the package version', async () => {
      const result = await runCli(['--version']);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe(`${readPackageInfo().version}\n`);
    });

    it('rejects unknown options', async () => {
      const result = await runCli(['clean', '--nope']);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toContain("unknown option '--nope'");
    });
  });

  describe('config command', () => {
    it('writes the template into the project directory', async () => {
      const result = await runCli(['config']);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe(`Configuration template written to ${PROJECT_DIR}/.devcell.env\n`);
      expect(system.readFile(`${PROJECT_DIR}/.devcell.env`)).toContain('JUPYTER_PORT=8888');
    });
  });

  describe('validate command', () => {
    it('reports a missing base directory', async () => {
      const result = await runCli(['validate']);

      expect(result.exitCode).toBe(1);
      expect(result.stdout).toContain('[FAIL] Base directory: Base directory not found: /home/test/.devcell\n');
    });

    it('reads a configuration file given with --config', async () => {
      system.addFile(`${PROJECT_DIR}/team.env`, 'HTTP_PORT=abc\n');

      const result = await runCli(['--config', 'team.env', 'validate']);

      expect(result.stdout).toContain('[FAIL] Configuration: HTTP_PORT: must be a number\n');
    });
  });

  describe('start command', () => {
    it('is the default command and stops on placeholder credentials', async () => {
      const result = await runCli([]);

      expect(result.exitCode).toBe(1);
      expect(result.stdout).toContain(`[FAIL] AWS credentials: ${PLACEHOLDER_ISSUE}\n`);
      expect(result.stderr).toContain(
        `ERROR: [validate] Environment validation failed: ${PLACEHOLDER_ISSUE} (hint: Fix the issues above, or use \`devcell shell\` to debug inside the container)\n`
      );
      expect(runtime.runs).toEqual([]);
    });

    it('passes arguments after -- to the container and returns its exit code', async () => {
      stageAwsCredentials();
      runtime.runExitCode = 4;

      const result = await runCli(['start', '--', 'npm', 'test']);

      expect(result.exitCode).toBe(4);
      expect(runtime.runs[0].command).toEqual(['npm', 'test']);
    });

    it('fails on an unsupported host', async () => {
      system.setOsType('win32');

      const result = await runCli(['start']);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toContain(
        'ERROR: [detect] Native Windows is not supported; run devcell from inside WSL2 (hint: wsl --install)\n'
      );
    });
  });

  describe('shell command', () => {
    it('rebuilds on request and opens bash', async () => {
      runtime.images.add('devcell:latest');

      const result = await runCli(['shell', '--rebuild']);

      expect(result.exitCode).toBe(0);
      expect(runtime.builds).toHaveLength(1);
      expect(runtime.runs[0].command).toEqual(['/bin/bash']);
      expect(result.stderr).toContain(`WARN: Validation: ${PLACEHOLDER_ISSUE}\n`);
    });
  });

  describe('build command', () => {
    it('builds the image', async () => {
      const result = await runCli(['build']);

      expect(result.exitCode).toBe(0);
      expect(runtime.builds[0]).toMatchObject({ tag: 'devcell:latest', context: PROJECT_DIR });
    });
  });

  describe('clean command', () => {
    it('removes the image with --clean-images', async () => {
      runtime.images.add('devcell:latest');

      const result = await runCli(['clean', '--clean-images']);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe('Cleanup complete\n');
      expect(runtime.removedImages).toEqual(['devcell:latest']);
    });

    it('keeps the image by default', async () => {
      runtime.images.add('devcell:latest');

      await runCli(['clean']);

      expect(runtime.removedImages).toEqual([]);
    });
  });

  describe('--debug', () => {
    it('shows debug output on the console', async () => {
      const result = await runCli(['--debug', 'config']);

      expect(result.stderr).toContain('DEBUG: Entering step\n');
    });
  });
});
