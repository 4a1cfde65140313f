/**
 * Platform classification
 *
 * The host platform is computed once per invocation and passed explicitly to
 * every component that needs it.
 */

/**
 * Classified host environment.
 * - wsl: Linux running under the Windows compatibility layer
 * - ubuntu: Ubuntu or an Ubuntu derivative
 * - generic-linux: any other Linux (also the fallback for unknown hosts)
 * - macos: Darwin
 * - cloud-workspace: managed cloud workspace (detected via environment markers)
 * - unsupported: native Windows without the compatibility layer
 */
export type PlatformKind =
  | 'wsl'
  | 'ubuntu'
  | 'generic-linux'
  | 'macos'
  | 'cloud-workspace'
  | 'unsupported';

/**
 * Human-readable label for each platform.
 */
export function describePlatform(kind: PlatformKind): string {
  switch (kind) {
    case 'wsl':
      return 'Windows WSL2';
    case 'ubuntu':
      return 'Ubuntu Linux';
    case 'generic-linux':
      return 'Generic Linux';
    case 'macos':
      return 'macOS';
    case 'cloud-workspace':
      return 'Cloud workspace';
    case 'unsupported':
      return 'Windows (not WSL)';
    default:
      return assertNever(kind);
  }
}

/**
 * Exhaustiveness guard for switches over closed unions.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${String(value)}`);
}
