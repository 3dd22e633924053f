/**
 * Runtime configuration from environment variables.
 *
 * Values are read on each call so tests can point DATA_DIR at a temp
 * directory before anything touches the filesystem.
 */

import { join } from 'path';

export interface DiagnosticsConfig {
  /** Absolute path of the rolling log file */
  logPath: string;
  /** Hard cap for the log file */
  maximumLogBytes: number;
  /** Extra bytes dropped below the cap on each trim */
  trimBatchBytes: number;
  /** Writes are dropped while free disk space is below this floor */
  minimumFreeDiskBytes: number;
  /** 'off' disables the console tap */
  consoleTap: 'on' | 'off';
  appName: string;
  appVersion: string;
}

export const DEFAULT_MAXIMUM_LOG_BYTES = 2 * 1024 * 1024; // 2 MB
export const DEFAULT_TRIM_BATCH_BYTES = 100 * 1024; // 100 KB
export const DEFAULT_MINIMUM_FREE_DISK_BYTES = 500 * 1024 * 1024; // 500 MB

export function getDataDir(): string {
  return process.env.DATA_DIR || '/data';
}

export function getDbPath(): string {
  return process.env.DB_PATH || join(getDataDir(), 'diagnostics.db');
}

export function getPort(): number {
  return parseInt(process.env.PORT || '8080', 10);
}

function readBytes(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || String(fallback), 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export function loadConfig(): DiagnosticsConfig {
  return {
    logPath: process.env.DIAGNOSTICS_LOG_PATH || join(getDataDir(), 'diagnostics_log.txt'),
    maximumLogBytes: readBytes('DIAGNOSTICS_MAX_LOG_BYTES', DEFAULT_MAXIMUM_LOG_BYTES),
    trimBatchBytes: readBytes('DIAGNOSTICS_TRIM_BYTES', DEFAULT_TRIM_BATCH_BYTES),
    minimumFreeDiskBytes: readBytes('DIAGNOSTICS_MIN_FREE_BYTES', DEFAULT_MINIMUM_FREE_DISK_BYTES),
    consoleTap: process.env.DIAGNOSTICS_CONSOLE_TAP === 'off' ? 'off' : 'on',
    appName: process.env.APP_NAME || 'Diagnostics',
    appVersion: process.env.APP_VERSION || '0.1.0',
  };
}
