/**
 * Console log stream
 *
 * pino writes JSON lines; this stream turns each one into `LEVEL: message`
 * for the terminal. The JSON form still goes to the log file untouched.
 */

import pino from 'pino';
import { Chalk, type ChalkInstance } from 'chalk';
import { z } from 'zod';

const LogLineSchema = z.object({
  level: z.number(),
  msg: z.string().default(''),
});

export interface ConsoleStreamOptions {
  /** Receives one formatted line, newline included */
  write: (line: string) => void;
  /** Colour the level label */
  colour: boolean;
}

function levelColour(chalk: ChalkInstance, level: number): (text: string) => string {
  if (level >= pino.levels.values.error) {
    return chalk.red.bold;
  }
  if (level >= pino.levels.values.warn) {
    return chalk.yellow;
  }
  if (level >= pino.levels.values.info) {
    return chalk.blue;
  }
  return chalk.dim;
}

/**
 * Format one pino JSON line. Lines that are not pino records pass through.
 */
export function formatLogLine(line: string, chalk: ChalkInstance): string {
  let parsed: z.infer<typeof LogLineSchema>;
  try {
    parsed = LogLineSchema.parse(JSON.parse(line));
  } catch {
    return line.endsWith('\n') ? line : `${line}\n`;
  }

  const label = (pino.levels.labels[parsed.level] ?? 'log').toUpperCase();
  return `${levelColour(chalk, parsed.level)(label)}: ${parsed.msg}\n`;
}

/**
 * pino destination that writes human-readable lines.
 */
export function createConsoleStream(options: ConsoleStreamOptions): pino.DestinationStream {
  const chalk = new Chalk({ level: options.colour ? 1 : 0 });
  return {
    write(line: string): void {
      options.write(formatLogLine(line, chalk));
    },
  };
}
