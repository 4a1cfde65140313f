/**
 * CleanupScope - Run-once teardown for a single command
 *
 * Actions run in reverse registration order. A failing action is logged and
 * the remaining actions still run; nothing is thrown out of `run`.
 */

import type { ILogger } from '../services/Logger';
import { errorMessage } from '../errors';

export type CleanupAction = () => Promise<unknown>;

export class CleanupScope {
  private readonly actions: Array<{ label: string; action: CleanupAction }> = [];
  private running: Promise<void> | null = null;

  constructor(private readonly logger: ILogger) {}

  get size(): number {
    return this.actions.length;
  }

  add(label: string, action: CleanupAction): void {
    this.actions.push({ label, action });
  }

  /**
   * Run every action once. Later calls wait for the first run.
   */
  run(): Promise<void> {
    this.running ??= this.runAll();
    return this.running;
  }

  private async runAll(): Promise<void> {
    for (const { label, action } of [...this.actions].reverse()) {
      try {
        await action();
      } catch (error) {
        this.logger.warn({ cleanup: label, err: errorMessage(error) }, `Cleanup step '${label}' failed`);
      }
    }
  }
}
