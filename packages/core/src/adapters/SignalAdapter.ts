/**
 * SignalAdapter - Termination signal delivery
 *
 * Lets the dispatcher register its cleanup scope for termination signals
 * without installing process-wide handlers itself.
 */

import * as os from 'os';

export type TerminationHandler = (signal: NodeJS.Signals) => Promise<void>;

export interface SignalSource {
  /**
   * Register a handler for termination signals.
   * @returns Function that unregisters the handler
   */
  onTerminate(handler: TerminationHandler): () => void;
}

const TERMINATION_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/**
 * Signal source backed by the Node.js process. After the handler settles the
 * process exits with 128 + signal number.
 */
export class ProcessSignalSource implements SignalSource {
  onTerminate(handler: TerminationHandler): () => void {
    const listener = (signal: NodeJS.Signals): void => {
      const exitCode = 128 + (os.constants.signals[signal] ?? 1);
      handler(signal).then(
        () => process.exit(exitCode),
        () => process.exit(exitCode)
      );
    };

    for (const signal of TERMINATION_SIGNALS) {
      process.once(signal, listener);
    }

    return () => {
      for (const signal of TERMINATION_SIGNALS) {
        process.removeListener(signal, listener);
      }
    };
  }
}
