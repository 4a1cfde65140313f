/**
 * Print utilities for intentional user-facing output
 *
 * Reports (such as the validation checklist) go to stdout through these
 * helpers; diagnostics go through the logger. Tests capture output with
 * capturePrintOutput instead of patching process streams.
 */

// Capture handlers for testing
let _captureStdout: ((s: string) => void) | null = null;
let _captureStderr: ((s: string) => void) | null = null;

/**
 * Print a line to stdout
 */
export function print(...args: unknown[]): void {
  const str = args.map(String).join(' ') + '\n';
  if (_captureStdout) {
    _captureStdout(str);
  } else {
    process.stdout.write(str);
  }
}

/**
 * Print a line to stderr
 */
export function printError(...args: unknown[]): void {
  const str = args.map(String).join(' ') + '\n';
  if (_captureStderr) {
    _captureStderr(str);
  } else {
    process.stderr.write(str);
  }
}

/**
 * Capture print output for testing.
 * Returns a restore function.
 */
export function capturePrintOutput(
  onStdout: (s: string) => void,
  onStderr: (s: string) => void = () => undefined
): () => void {
  _captureStdout = onStdout;
  _captureStderr = onStderr;
  return () => {
    _captureStdout = null;
    _captureStderr = null;
  };
}
