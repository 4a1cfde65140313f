/**
 * Custom error classes for structured error handling
 *
 * Each error includes:
 * - Descriptive name for logging
 * - Error code for programmatic handling
 * - Context information for debugging
 * - An optional remediation hint shown to the operator
 *
 * Non-fatal conditions are DevcellWarning values, not errors.
 */

import type { PlatformKind } from '../types/platform';

// ============================================================================
// Base Error
// ============================================================================

/**
 * Base error class for all devcell errors
 */
export abstract class DevcellError extends Error {
  /** Error code for programmatic handling */
  abstract readonly code: string;
  /** Concrete next step for the operator */
  readonly hint?: string;
  /** Additional context for debugging */
  readonly context?: Record<string, unknown>;

  constructor(message: string, options: { hint?: string; context?: Record<string, unknown> } = {}) {
    super(message);
    this.name = this.constructor.name;
    this.hint = options.hint;
    this.context = options.context;
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      hint: this.hint,
      context: this.context,
    };
  }
}

// ============================================================================
// Platform Errors
// ============================================================================

/**
 * The host cannot run the environment at all
 */
export class DetectionFailure extends DevcellError {
  readonly code = 'DETECTION_FAILURE';

  constructor(platform: PlatformKind, reason: string, hint?: string) {
    super(reason, { hint, context: { platform } });
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * A merged configuration value is invalid
 */
export class ConfigurationError extends DevcellError {
  readonly code = 'CONFIG_ERROR';
  readonly issues: string[];

  constructor(issues: string[], source?: string) {
    super(`Invalid configuration${source ? ` (${source})` : ''}: ${issues.join('; ')}`, {
      hint: 'Fix the listed values in the configuration file or environment, or run `devcell config` to start from a template',
      context: { issues, source },
    });
    this.issues = issues;
  }
}

// ============================================================================
// Container Runtime Errors
// ============================================================================

/**
 * No container runtime found, or the runtime is not functional
 */
export class RuntimeUnavailable extends DevcellError {
  readonly code = 'RUNTIME_UNAVAILABLE';

  constructor(runtime: string, reason: string, hint?: string) {
    super(`Container runtime '${runtime}' ${reason}`, { hint, context: { runtime } });
  }
}

/**
 * Image build failed
 */
export class BuildError extends DevcellError {
  readonly code = 'BUILD_ERROR';

  constructor(imageTag: string, reason: string, exitCode?: number) {
    super(`Failed to build image '${imageTag}': ${reason}`, {
      hint: 'Re-run with --debug to see the full runtime output',
      context: { imageTag, exitCode },
    });
  }
}

/**
 * The container run could not be started or exited with a non-zero code.
 * The exit code becomes the process exit code.
 */
export class RunError extends DevcellError {
  readonly code = 'RUN_ERROR';
  readonly exitCode: number;

  constructor(containerName: string, exitCode: number, reason?: string) {
    super(reason ?? `Container '${containerName}' exited with code ${exitCode}`, {
      context: { containerName, exitCode },
    });
    this.exitCode = exitCode;
  }
}

/**
 * The pre-run checklist found issues and the command requires a clean run
 */
export class ValidationFailedError extends DevcellError {
  readonly code = 'VALIDATION_FAILED';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Environment validation failed: ${issues.join('; ')}`, {
      hint: 'Fix the issues above, or use `devcell shell` to debug inside the container',
      context: { issues },
    });
    this.issues = issues;
  }
}

/**
 * An external command did not finish in time
 */
export class CommandTimeoutError extends DevcellError {
  readonly code = 'TIMEOUT';

  constructor(command: string, timeoutMs: number) {
    super(`Command '${command}' timed out after ${timeoutMs}ms`, {
      context: { command, timeoutMs },
    });
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Check if an error is a DevcellError
 */
export function isDevcellError(error: unknown): error is DevcellError {
  return error instanceof DevcellError;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
