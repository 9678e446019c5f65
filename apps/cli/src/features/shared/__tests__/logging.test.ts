import { readFileSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { getWalletRootDirectory, resetEnvCache } from '@spo-wallet/env';
import { flushLoggers, getLogger, initLogger } from '@spo-wallet/logger';
import tmp from 'tmp';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { configureCliLogging, LOG_FILE_NAME } from '../logging.js';

function logLines(path: string): unknown[] {
  return readFileSync(path, 'utf8')
    .trim()
    .split('\n')
    .map((line): unknown => JSON.parse(line));
}

describe('configureCliLogging', () => {
  let logDirectory: string;

  beforeEach(() => {
    logDirectory = join(tmp.dirSync({ unsafeCleanup: true }).name, 'logs');
    vi.stubEnv('SPO_WALLET_LOG_LEVEL', undefined);
    resetEnvCache();
  });

  afterEach(() => {
    initLogger({ sinks: [] });
    vi.unstubAllEnvs();
    resetEnvCache();
  });

  it('logs to an owner-only file at info level by default', () => {
    const logging = configureCliLogging({ verbose: false, logDirectory });

    expect(logging).toEqual({ level: 'info', logFile: join(logDirectory, LOG_FILE_NAME), console: false });

    getLogger('test').debug('hidden');
    getLogger('test').info({ ticker: 'TESTPOOL' }, 'visible');
    flushLoggers();

    expect(logLines(join(logDirectory, LOG_FILE_NAME))).toEqual([
      expect.objectContaining({ level: 'info', category: 'test', msg: 'visible', context: { ticker: 'TESTPOOL' } }),
    ]);
    expect(statSync(join(logDirectory, LOG_FILE_NAME)).mode & 0o777).toBe(0o600);
  });

  it('adds the console at debug level for --verbose', () => {
    expect(configureCliLogging({ verbose: true, logDirectory })).toMatchObject({ level: 'debug', console: true });
  });

  it('honours SPO_WALLET_LOG_LEVEL', () => {
    vi.stubEnv('SPO_WALLET_LOG_LEVEL', 'warn');
    resetEnvCache();

    expect(configureCliLogging({ verbose: true, logDirectory })).toMatchObject({ level: 'warn', console: true });
  });

  it('writes configuration warnings to the log', () => {
    vi.stubEnv('SPO_WALLET_HOME', '   ');
    resetEnvCache();
    expect(getWalletRootDirectory()).toBe(homedir());

    configureCliLogging({ verbose: false, logDirectory });
    flushLoggers();

    expect(logLines(join(logDirectory, LOG_FILE_NAME))).toEqual([
      expect.objectContaining({
        level: 'warn',
        category: 'cli',
        msg: `SPO_WALLET_HOME is empty; falling back to ${homedir()}`,
        context: { variable: 'SPO_WALLET_HOME' },
      }),
    ]);
  });
});
