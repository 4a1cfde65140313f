/**
 * Tests for the CLI composition root
 */

import { describe, it, expect, afterEach } from 'vitest';
import { StaticEnvironment } from '@devcell/core';
import { FakeSignalSource, MockSystemAdapter } from '@devcell/core/testing';
import {
  ServiceContainer,
  defaultLogFile,
  disposeContainer,
  getContainer,
  initializeContainer,
  isContainerInitialized,
} from '../services/ServiceContainer.js';

function createOptions(lines: string[] = []) {
  return {
    projectDir: '/project',
    overrides: {
      system: new MockSystemAdapter(),
      env: new StaticEnvironment(),
      signals: new FakeSignalSource(),
      logFile: null,
      colour: false,
      writeConsole: (line: string) => {
        lines.push(line);
      },
    },
  };
}

describe('defaultLogFile', () => {
  it('uses the state directory under home', () => {
    expect(defaultLogFile(new MockSystemAdapter(), new StaticEnvironment())).toBe(
      '/home/test/.local/state/devcell/devcell.log'
    );
  });

  it('honours XDG_STATE_HOME', () => {
    expect(defaultLogFile(new MockSystemAdapter(), new StaticEnvironment({ XDG_STATE_HOME: '/var/state' }))).toBe(
      '/var/state/devcell/devcell.log'
    );
  });
});

describe('ServiceContainer', () => {
  afterEach(() => {
    disposeContainer();
  });

  it('stages under ~/.devcell', () => {
    expect(new ServiceContainer(createOptions()).baseDir).toBe('/home/test/.devcell');
  });

  it('resolves the configuration file from the project directory', () => {
    const container = new ServiceContainer(createOptions());
    expect(container.configResolver.configFile).toBe('/project/.devcell.env');
  });

  it('logs to the console stream at info by default', () => {
    const lines: string[] = [];
    const container = new ServiceContainer(createOptions(lines));

    container.logger.debug('hidden');
    container.logger.info('shown');

    expect(lines).toEqual(['INFO: shown\n']);
  });

  it('logs debug output when asked', () => {
    const lines: string[] = [];
    const container = new ServiceContainer({ ...createOptions(lines), debug: true });

    container.logger.debug('visible');

    expect(lines).toContain('DEBUG: visible\n');
  });

  it('manages a global instance', () => {
    expect(isContainerInitialized()).toBe(false);
    expect(() => getContainer()).toThrow('ServiceContainer not initialized');

    const container = initializeContainer(createOptions());

    expect(getContainer()).toBe(container);
    disposeContainer();
    expect(container.isDisposed).toBe(true);
    expect(isContainerInitialized()).toBe(false);
  });
});
