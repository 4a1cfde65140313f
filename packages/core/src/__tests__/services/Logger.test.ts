/**
 * Tests for Logger
 */

import { describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import { createLogger } from '../../services/Logger';

function collectingStream(lines: string[]): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, callback): void {
      lines.push(chunk.toString());
      callback();
    },
  });
}

function parseLine(line: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(line);
  return typeof parsed === 'object' && parsed !== null ? { ...parsed } : {};
}

describe('createLogger', () => {
  it('writes JSON lines with the component binding', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'info', streams: [collectingStream(lines)] });

    logger.child({ component: 'ConfigResolver' }).info({ path: '/project/.devcell.env' }, 'Loaded');

    expect(lines).toHaveLength(1);
    expect(parseLine(lines[0])).toMatchObject({
      level: 30,
      app: 'devcell',
      component: 'ConfigResolver',
      path: '/project/.devcell.env',
      msg: 'Loaded',
    });
  });

  it('drops records below the level', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'warn', streams: [collectingStream(lines)] });

    logger.info('hidden');
    logger.warn('shown');

    expect(lines.map((line) => parseLine(line).msg)).toEqual(['shown']);
  });
});
