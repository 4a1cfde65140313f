/**
 * NodeSystemAdapter integration tests
 *
 * Tests the real NodeSystemAdapter with actual file system operations.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { NodeSystemAdapter } from '../../adapters/NodeSystemAdapter';
import { CommandTimeoutError } from '../../errors';

describe('NodeSystemAdapter', () => {
  let adapter: NodeSystemAdapter;
  let tempDir: string;

  beforeEach(() => {
    adapter = new NodeSystemAdapter();
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'system-adapter-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('host identity', () => {
    it('returns the process platform', () => {
      expect(adapter.getOsType()).toBe(process.platform);
    });

    it('returns home directory', () => {
      expect(adapter.getHomeDirectory()).toBe(os.homedir());
    });
  });

  describe('file operations', () => {
    it('writes files and creates parent directories', () => {
      const file = adapter.joinPath(tempDir, 'nested', 'dir', 'file.txt');

      adapter.writeFile(file, 'content');

      expect(adapter.exists(file)).toBe(true);
      expect(adapter.readFile(file)).toBe('content');
      expect(adapter.stat(adapter.joinPath(tempDir, 'nested')).isDirectory()).toBe(true);
    });

    it('lists directory entries', () => {
      adapter.writeFile(adapter.joinPath(tempDir, 'a.txt'), 'a');
      adapter.mkdir(adapter.joinPath(tempDir, 'sub'));

      expect(adapter.readDir(tempDir).sort()).toEqual(['a.txt', 'sub']);
    });

    it('copies into a missing directory', () => {
      const src = adapter.joinPath(tempDir, 'src.pem');
      const dest = adapter.joinPath(tempDir, 'certs', 'dest.pem');
      adapter.writeFile(src, 'PEM');

      adapter.copyFile(src, dest);

      expect(adapter.readFile(dest)).toBe('PEM');
    });

    it('reports permission bits only', () => {
      const file = adapter.joinPath(tempDir, 'credentials');
      adapter.writeFile(file, 'secret');

      adapter.chmod(file, 0o600);

      expect(adapter.stat(file).mode).toBe(0o600);
      expect(adapter.stat(file).isFile()).toBe(true);
    });

    it('creates a symbolic link to a directory', () => {
      const target = adapter.joinPath(tempDir, 'base');
      const link = adapter.joinPath(tempDir, 'link');
      adapter.mkdir(target);

      adapter.symlink(target, link);

      expect(fs.readlinkSync(link)).toBe(target);
      expect(adapter.stat(link).isDirectory()).toBe(true);
    });
  });

  describe('commands', () => {
    let originalPath: string | undefined;

    beforeEach(() => {
      originalPath = process.env.PATH;
    });

    afterEach(() => {
      process.env.PATH = originalPath;
    });

    it('finds executables on PATH', async () => {
      const tool = path.join(tempDir, 'devcell-test-tool');
      fs.writeFileSync(tool, '#!/bin/sh\n');
      fs.chmodSync(tool, 0o755);
      process.env.PATH = tempDir;

      expect(await adapter.commandExists('devcell-test-tool')).toBe(true);
      expect(await adapter.commandExists('devcell-missing-tool')).toBe(false);
    });

    it('captures output and resolves non-zero exit codes', async () => {
      const result = await adapter.exec(process.execPath, [
        '-e',
        'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)',
      ]);

      expect(result).toEqual({ exitCode: 3, stdout: 'out', stderr: 'err' });
    });

    it('rejects with a timeout error', async () => {
      await expect(
        adapter.exec(process.execPath, ['-e', 'setTimeout(() => undefined, 10000)'], { timeoutMs: 200 })
      ).rejects.toBeInstanceOf(CommandTimeoutError);
    });

    it('rejects when the command cannot be started', async () => {
      await expect(adapter.exec(path.join(tempDir, 'missing'), [])).rejects.toThrow(/ENOENT/);
    });

    it('returns the exit code of an interactive command', async () => {
      expect(await adapter.execInteractive(process.execPath, ['-e', 'process.exit(5)'])).toBe(5);
    });
  });
});
