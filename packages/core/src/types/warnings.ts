/**
 * Non-fatal conditions are carried as values and logged; they never unwind
 * the current command.
 */

export type WarningKind =
  | 'platform'
  | 'port-conflict'
  | 'credential-provision'
  | 'region'
  | 'config-file'
  | 'runtime';

export interface DevcellWarning {
  kind: WarningKind;
  message: string;
}

export function warning(kind: WarningKind, message: string): DevcellWarning {
  return { kind, message };
}
