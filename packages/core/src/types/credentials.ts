/**
 * Credential bundle model
 *
 * The bundle is the staged tree under the base directory. It is recreated
 * additively on every session start and only deleted by an explicit cleanup
 * of the whole base directory.
 */

import type { DevcellWarning } from './warnings';

export type MaterialKind = 'certs' | 'ssh' | 'aws';

export const MATERIAL_KINDS: readonly MaterialKind[] = ['certs', 'ssh', 'aws'];

/**
 * Subdirectories created under the base directory.
 */
export const BUNDLE_DIRECTORIES = [
  'workspace',
  'config',
  'cache',
  'certs',
  'ssh',
  'aws',
  'logs',
  'backups',
] as const;

export type BundleDirectory = (typeof BUNDLE_DIRECTORIES)[number];

export type BundlePaths = Record<BundleDirectory, string>;

/**
 * Outcome of one discovery strategy.
 */
export interface StrategyAttempt {
  strategy: string;
  succeeded: boolean;
  /** Failure reason or a short note on success */
  detail: string;
}

export interface MaterialReport {
  kind: MaterialKind;
  attempts: StrategyAttempt[];
  /** Name of the strategy that produced the staged material, if any */
  resolvedBy: string | null;
  /** Staged file paths, relative to the material directory */
  files: string[];
}

export interface CredentialBundle {
  baseDir: string;
  paths: BundlePaths;
  materials: Partial<Record<MaterialKind, MaterialReport>>;
  warnings: DevcellWarning[];
  /** Link to the base directory created in the Windows user profile (WSL only) */
  windowsLink?: string;
}

/**
 * Literal values written into the credential template when no real
 * credentials could be found.
 */
export const AWS_PLACEHOLDER_ACCESS_KEY = 'YOUR_ACCESS_KEY_HERE';
export const AWS_PLACEHOLDER_SECRET_KEY = 'YOUR_SECRET_KEY_HERE';
