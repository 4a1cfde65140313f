/**
 * NodeSystemAdapter - Node.js implementation of SystemAdapter
 *
 * Handles file system and process operations for Linux, WSL and macOS hosts.
 * Commands are started without a shell; arguments are passed as arrays.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { execFile, spawn } from 'child_process';
import { CommandTimeoutError } from '../errors';
import {
  SystemAdapter,
  OsType,
  FileStat,
  ExecOptions,
  ExecResult,
} from './SystemAdapter';

/**
 * Captured output above this size is truncated by Node
 */
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

function describeCommand(command: string, args: string[]): string {
  return [command, ...args].join(' ');
}

/**
 * Exit code for a process terminated by a signal (shell convention)
 */
function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (os.constants.signals[signal] ?? 1);
}

/**
 * Node.js implementation of SystemAdapter
 */
export class NodeSystemAdapter implements SystemAdapter {
  // ========== Host Identity ==========

  getOsType(): OsType {
    return process.platform;
  }

  getHomeDirectory(): string {
    return os.homedir();
  }

  getUserIds(): { uid: number; gid: number } {
    return {
      uid: process.getuid?.() ?? 0,
      gid: process.getgid?.() ?? 0,
    };
  }

  // ========== Command Execution ==========

  async commandExists(command: string): Promise<boolean> {
    const searchPath = process.env.PATH ?? '';
    for (const dir of searchPath.split(path.delimiter)) {
      if (!dir) {
        continue;
      }
      try {
        fs.accessSync(path.join(dir, command), fs.constants.X_OK);
        return true;
      } catch {
        // Not in this directory
      }
    }
    return false;
  }

  exec(command: string, args: string[], options: ExecOptions = {}): Promise<ExecResult> {
    return new Promise((resolve, reject) => {
      execFile(
        command,
        args,
        {
          cwd: options.cwd,
          timeout: options.timeoutMs ?? 0,
          encoding: 'utf-8',
          maxBuffer: MAX_OUTPUT_BYTES,
          windowsHide: true,
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ exitCode: 0, stdout, stderr });
            return;
          }
          if (error.killed && options.timeoutMs) {
            reject(new CommandTimeoutError(describeCommand(command, args), options.timeoutMs));
            return;
          }
          if (typeof error.code === 'number') {
            resolve({ exitCode: error.code, stdout, stderr });
            return;
          }
          if (error.signal) {
            resolve({ exitCode: signalExitCode(error.signal), stdout, stderr });
            return;
          }
          reject(error);
        }
      );
    });
  }

  execInteractive(command: string, args: string[], options: ExecOptions = {}): Promise<number> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { cwd: options.cwd, stdio: 'inherit' });
      let timedOut = false;
      const timer = options.timeoutMs
        ? setTimeout(() => {
            timedOut = true;
            child.kill('SIGTERM');
          }, options.timeoutMs)
        : undefined;

      child.on('error', (error) => {
        clearTimeout(timer);
        reject(error);
      });

      child.on('exit', (code, signal) => {
        clearTimeout(timer);
        if (timedOut && options.timeoutMs) {
          reject(new CommandTimeoutError(describeCommand(command, args), options.timeoutMs));
          return;
        }
        if (signal) {
          resolve(signalExitCode(signal));
          return;
        }
        resolve(code ?? 0);
      });
    });
  }

  // ========== File System ==========

  joinPath(basePath: string, ...segments: string[]): string {
    return path.join(basePath, ...segments);
  }

  exists(inputPath: string): boolean {
    return fs.existsSync(inputPath);
  }

  readFile(inputPath: string): string {
    return fs.readFileSync(inputPath, 'utf-8');
  }

  writeFile(inputPath: string, content: string): void {
    const dir = path.dirname(inputPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(inputPath, content, 'utf-8');
  }

  readDir(inputPath: string): string[] {
    return fs.readdirSync(inputPath);
  }

  mkdir(inputPath: string): void {
    fs.mkdirSync(inputPath, { recursive: true });
  }

  copyFile(src: string, dest: string): void {
    const dir = path.dirname(dest);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.copyFileSync(src, dest);
  }

  stat(inputPath: string): FileStat {
    const stats = fs.statSync(inputPath);
    return {
      mode: stats.mode & 0o777,
      isDirectory: () => stats.isDirectory(),
      isFile: () => stats.isFile(),
    };
  }

  chmod(inputPath: string, mode: number): void {
    fs.chmodSync(inputPath, mode);
  }

  symlink(target: string, inputPath: string): void {
    fs.symlinkSync(target, inputPath);
  }
}
