/**
 * Tests for the console logger
 */

import chalk from 'chalk';
import { createConsoleLogger } from '../src/logger';

let errorSpy: jest.SpyInstance;

beforeAll(() => {
  chalk.level = 0;
});

beforeEach(() => {
  errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  errorSpy.mockRestore();
});

describe('createConsoleLogger', () => {
  test('debug lines are dropped unless enabled', () => {
    createConsoleLogger().debug('hidden');
    expect(errorSpy).not.toHaveBeenCalled();
  });

  test('debug lines go to stderr when enabled', () => {
    createConsoleLogger({ debug: true }).debug('Requesting layout: x');
    expect(errorSpy).toHaveBeenCalledWith('[debug] Requesting layout: x');
  });

  test('warnings and errors are always printed', () => {
    const logger = createConsoleLogger();
    logger.warn('Could not write cache to disk: disk full');
    logger.error('boom');

    expect(errorSpy.mock.calls).toEqual([
      ['⚠️  Could not write cache to disk: disk full'],
      ['❌ Error: boom'],
    ]);
  });
});
