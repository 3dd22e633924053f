import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'path';

import {
  DEFAULT_MAXIMUM_LOG_BYTES,
  DEFAULT_MINIMUM_FREE_DISK_BYTES,
  DEFAULT_TRIM_BATCH_BYTES,
  getDbPath,
  getPort,
  loadConfig,
} from '../src/config.js';

const KEYS = [
  'DATA_DIR',
  'DB_PATH',
  'PORT',
  'DIAGNOSTICS_LOG_PATH',
  'DIAGNOSTICS_MAX_LOG_BYTES',
  'DIAGNOSTICS_TRIM_BYTES',
  'DIAGNOSTICS_MIN_FREE_BYTES',
  'DIAGNOSTICS_CONSOLE_TAP',
  'APP_NAME',
  'APP_VERSION',
] as const;

const saved = Object.fromEntries(KEYS.map((key) => [key, process.env[key]]));

afterEach(() => {
  for (const key of KEYS) {
    const value = saved[key];
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
});

function clearEnv(): void {
  for (const key of KEYS) delete process.env[key];
}

describe('loadConfig', () => {
  it('uses defaults under /data', () => {
    clearEnv();
    expect(loadConfig()).toEqual({
      logPath: join('/data', 'diagnostics_log.txt'),
      maximumLogBytes: DEFAULT_MAXIMUM_LOG_BYTES,
      trimBatchBytes: DEFAULT_TRIM_BATCH_BYTES,
      minimumFreeDiskBytes: DEFAULT_MINIMUM_FREE_DISK_BYTES,
      consoleTap: 'on',
      appName: 'Diagnostics',
      appVersion: '0.1.0',
    });
    expect(getDbPath()).toBe(join('/data', 'diagnostics.db'));
    expect(getPort()).toBe(8080);
  });

  it('reads overrides from the environment', () => {
    clearEnv();
    process.env.DATA_DIR = '/srv/state';
    process.env.DIAGNOSTICS_MAX_LOG_BYTES = '4096';
    process.env.DIAGNOSTICS_TRIM_BYTES = '512';
    process.env.DIAGNOSTICS_MIN_FREE_BYTES = '0';
    process.env.DIAGNOSTICS_CONSOLE_TAP = 'off';
    process.env.APP_NAME = 'Shop';

    const config = loadConfig();
    expect(config.logPath).toBe(join('/srv/state', 'diagnostics_log.txt'));
    expect(config.maximumLogBytes).toBe(4096);
    expect(config.trimBatchBytes).toBe(512);
    expect(config.minimumFreeDiskBytes).toBe(0);
    expect(config.consoleTap).toBe('off');
    expect(config.appName).toBe('Shop');
    expect(getDbPath()).toBe(join('/srv/state', 'diagnostics.db'));
  });

  it('prefers explicit log and database paths', () => {
    clearEnv();
    process.env.DIAGNOSTICS_LOG_PATH = '/var/log/app.txt';
    process.env.DB_PATH = '/var/db/prefs.db';
    expect(loadConfig().logPath).toBe('/var/log/app.txt');
    expect(getDbPath()).toBe('/var/db/prefs.db');
  });

  it('falls back to defaults for invalid sizes', () => {
    clearEnv();
    process.env.DIAGNOSTICS_MAX_LOG_BYTES = 'lots';
    process.env.DIAGNOSTICS_TRIM_BYTES = '-5';
    const config = loadConfig();
    expect(config.maximumLogBytes).toBe(DEFAULT_MAXIMUM_LOG_BYTES);
    expect(config.trimBatchBytes).toBe(DEFAULT_TRIM_BATCH_BYTES);
  });
});
