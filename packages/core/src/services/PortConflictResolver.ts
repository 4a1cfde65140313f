/**
 * PortConflictResolver - Moves host ports away from existing listeners
 *
 * Listening sockets are read from `ss`, falling back to `netstat`. A desired
 * port that is already taken is shifted by a fixed offset. When no probe tool
 * works the desired ports are returned unchanged with a warning.
 */

import type { SystemAdapter } from '../adapters/SystemAdapter';
import type { ILogger } from './Logger';
import type { PortName } from '../types/config';
import { PORT_NAMES } from '../types/config';
import { DevcellWarning, warning } from '../types/warnings';
import { errorMessage } from '../errors';

export const PORT_CONFLICT_OFFSET = 1000;

const PROBE_TIMEOUT_MS = 10_000;
const MAX_PORT = 65535;

/**
 * Listener probes, in order of preference
 */
export const LISTENER_PROBES: ReadonlyArray<{ command: string; args: string[] }> = [
  { command: 'ss', args: ['-lntu'] },
  { command: 'netstat', args: ['-lntu'] },
];

export type DesiredPorts = Partial<Record<PortName, number>>;

export interface PortAssignment {
  name: PortName;
  desired: number;
  resolved: number;
  /** The desired port was taken */
  conflict: boolean;
  /** The offset port is taken as well */
  unresolved: boolean;
}

export interface PortResolution {
  assignments: PortAssignment[];
  /** Probe command that produced the listener table, or null when none worked */
  probe: string | null;
  warnings: DevcellWarning[];
}

/**
 * Extract listening port numbers from `ss`/`netstat` output.
 */
export function parseListeningPorts(output: string): Set<number> {
  const ports = new Set<number>();
  for (const match of output.matchAll(/:(\d+)\s/g)) {
    const port = Number(match[1]);
    if (port > 0 && port <= MAX_PORT) {
      ports.add(port);
    }
  }
  return ports;
}

export class PortConflictResolver {
  private readonly logger: ILogger;

  constructor(
    private readonly system: SystemAdapter,
    logger: ILogger
  ) {
    this.logger = logger.child({ component: 'PortConflictResolver' });
  }

  /**
   * Read the current listener table.
   * @returns The probe used and the listening ports, or null when no probe works
   */
  async listListeningPorts(): Promise<{ probe: string; ports: Set<number> } | null> {
    for (const { command, args } of LISTENER_PROBES) {
      if (!(await this.system.commandExists(command))) {
        this.logger.debug({ command }, 'Listener probe not installed');
        continue;
      }
      try {
        const result = await this.system.exec(command, args, { timeoutMs: PROBE_TIMEOUT_MS });
        if (result.exitCode === 0) {
          const ports = parseListeningPorts(result.stdout);
          if (ports.size === 0 && result.stdout.trim()) {
            this.logger.debug({ command }, 'Listener probe output contained no recognisable ports');
          }
          return { probe: command, ports };
        }
        this.logger.debug({ command, exitCode: result.exitCode }, 'Listener probe failed');
      } catch (error) {
        this.logger.debug({ command, err: errorMessage(error) }, 'Listener probe failed');
      }
    }
    return null;
  }

  async resolve(desired: DesiredPorts): Promise<PortResolution> {
    const requested = PORT_NAMES.flatMap((name) => {
      const port = desired[name];
      return port === undefined ? [] : [{ name, port }];
    });

    const table = await this.listListeningPorts();
    if (!table) {
      const skipped = warning(
        'port-conflict',
        'Port conflict detection skipped: neither ss nor netstat is usable'
      );
      this.logger.warn(skipped.message);
      return {
        assignments: requested.map(({ name, port }) => ({
          name,
          desired: port,
          resolved: port,
          conflict: false,
          unresolved: false,
        })),
        probe: null,
        warnings: [skipped],
      };
    }

    const warnings: DevcellWarning[] = [];
    const assignments = requested.map(({ name, port }): PortAssignment => {
      if (!table.ports.has(port)) {
        return { name, desired: port, resolved: port, conflict: false, unresolved: false };
      }

      const shifted = port + PORT_CONFLICT_OFFSET;
      if (shifted > MAX_PORT) {
        // Resolved ports stay within 1-65535
        const message = `Port ${port} (${name}) is in use and the alternative ${shifted} is out of range`;
        warnings.push(warning('port-conflict', message));
        this.logger.warn({ name, desired: port }, message);
        return { name, desired: port, resolved: port, conflict: true, unresolved: true };
      }

      const unresolved = table.ports.has(shifted);
      const message = unresolved
        ? `Port ${port} (${name}) is in use and the alternative ${shifted} is unavailable`
        : `Port ${port} (${name}) is in use, using ${shifted}`;
      warnings.push(warning('port-conflict', message));
      this.logger.warn({ name, desired: port, resolved: shifted }, message);
      return { name, desired: port, resolved: shifted, conflict: true, unresolved };
    });

    return { assignments, probe: table.probe, warnings };
  }
}
