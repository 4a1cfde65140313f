/**
 * SystemAdapter - Abstracts all OS-specific operations
 *
 * This interface centralizes host access: platform identity, file system,
 * and external commands. Components never touch `fs` or `child_process`
 * directly.
 *
 * Implementations:
 * - NodeSystemAdapter - Node.js host
 * - MockSystemAdapter (tests) - in-memory host
 */

/**
 * Raw operating system identifier (Node's `process.platform` values)
 */
export type OsType = NodeJS.Platform;

/**
 * File stat information
 */
export interface FileStat {
  mode: number;
  isDirectory(): boolean;
  isFile(): boolean;
}

/**
 * Options for a captured (non-interactive) command
 */
export interface ExecOptions {
  /** Working directory */
  cwd?: string;
  /** Kill the command after this many milliseconds */
  timeoutMs?: number;
}

/**
 * Output of a finished command
 */
export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * SystemAdapter abstracts all OS-specific operations.
 */
export interface SystemAdapter {
  // ========== Host Identity ==========

  /**
   * Get the raw operating system identifier.
   */
  getOsType(): OsType;

  /**
   * Get the current user's home directory.
   */
  getHomeDirectory(): string;

  /**
   * Numeric user and group ids (0 on hosts without them).
   */
  getUserIds(): { uid: number; gid: number };

  // ========== Command Execution ==========

  /**
   * Check whether an executable is on PATH.
   */
  commandExists(command: string): Promise<boolean>;

  /**
   * Run a command with captured output. Resolves with the exit code instead
   * of rejecting on non-zero exit.
   * @throws CommandTimeoutError when the timeout elapses
   * @throws Error when the command cannot be started
   */
  exec(command: string, args: string[], options?: ExecOptions): Promise<ExecResult>;

  /**
   * Run a command attached to the operator's terminal and resolve with its
   * exit code once it finishes.
   */
  execInteractive(command: string, args: string[], options?: ExecOptions): Promise<number>;

  // ========== File System ==========

  /**
   * Join path segments.
   */
  joinPath(basePath: string, ...segments: string[]): string;

  /**
   * Check if a path exists.
   */
  exists(path: string): boolean;

  /**
   * Read file contents as UTF-8 string.
   * @throws Error if file doesn't exist or can't be read
   */
  readFile(path: string): string;

  /**
   * Write content to a file, creating parent directories if needed.
   */
  writeFile(path: string, content: string): void;

  /**
   * Read directory entry names.
   */
  readDir(path: string): string[];

  /**
   * Create a directory recursively.
   */
  mkdir(path: string): void;

  /**
   * Copy a file, creating the destination directory if needed.
   */
  copyFile(src: string, dest: string): void;

  /**
   * Get file/directory stats.
   */
  stat(path: string): FileStat;

  /**
   * Change file mode/permissions.
   */
  chmod(path: string, mode: number): void;

  /**
   * Create a symbolic link at `path` pointing to `target`.
   */
  symlink(target: string, path: string): void;
}
