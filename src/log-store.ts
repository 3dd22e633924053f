/**
 * Rolling log store — a size-capped, append-only text file on disk.
 *
 * Every mutation runs on one SerialQueue, so appends never interleave and
 * readAll() sees everything queued before it. The running size is tracked
 * in memory; the file is only stat'ed at startup and after a recreate.
 *
 * Failure policy:
 * - low disk space: the write is dropped
 * - file vanished at runtime: recreate it and retry the append once
 * - trim I/O failure: skip the trim, the next append tries again
 */

import { existsSync, mkdirSync, statSync, writeFileSync, constants } from 'fs';
import { mkdir, open, readFile, rename, rm, stat, writeFile, type FileHandle } from 'fs/promises';
import { dirname } from 'path';
import {
  DEFAULT_MAXIMUM_LOG_BYTES,
  DEFAULT_MINIMUM_FREE_DISK_BYTES,
  DEFAULT_TRIM_BATCH_BYTES,
} from './config.js';
import { freeDiskSpace, type DiskSpaceProbe } from './disk-space.js';
import {
  AlreadyInitializedError,
  LogFileCreationError,
  NotReadyError,
  errorMessage,
} from './errors.js';
import { SerialQueue } from './serial-queue.js';
import { currentSessionInfo, formatSessionMarker, type SessionInfo } from './session-marker.js';

export interface RollingLogStoreOptions {
  maximumSizeBytes?: number;
  trimBatchBytes?: number;
  minimumFreeDiskBytes?: number;
  /** Recreations allowed after the first creation (default 2) */
  fileCreationLimit?: number;
  /** Version written into each session marker */
  appVersion?: string;
  diskSpace?: DiskSpaceProbe;
  sessionInfo?: () => SessionInfo;
}

const DEFAULT_FILE_CREATION_LIMIT = 2;

/** Open for appending without O_CREAT so a vanished file is noticed */
const APPEND_EXISTING = constants.O_WRONLY | constants.O_APPEND;

export class RollingLogStore {
  readonly maximumSizeBytes: number;
  readonly trimBatchBytes: number;
  readonly minimumFreeDiskBytes: number;

  private location: string | null = null;
  private logSize = 0;
  private ready = false;
  private disabled = false;
  private fileCreationCount = 0;
  private readonly fileCreationLimit: number;
  private readonly queue = new SerialQueue();
  private readonly diskSpace: DiskSpaceProbe;
  private readonly sessionInfo: () => SessionInfo;

  constructor(options: RollingLogStoreOptions = {}) {
    this.maximumSizeBytes = options.maximumSizeBytes ?? DEFAULT_MAXIMUM_LOG_BYTES;
    this.trimBatchBytes = Math.min(options.trimBatchBytes ?? DEFAULT_TRIM_BATCH_BYTES, this.maximumSizeBytes);
    this.minimumFreeDiskBytes = options.minimumFreeDiskBytes ?? DEFAULT_MINIMUM_FREE_DISK_BYTES;
    this.fileCreationLimit = options.fileCreationLimit ?? DEFAULT_FILE_CREATION_LIMIT;
    this.diskSpace = options.diskSpace ?? freeDiskSpace;
    const appVersion = options.appVersion ?? '0.0.0';
    this.sessionInfo = options.sessionInfo ?? (() => currentSessionInfo(appVersion));
  }

  get isReady(): boolean {
    return this.ready;
  }

  get filePath(): string | null {
    return this.location;
  }

  /** Tracked byte length of the log file */
  get size(): number {
    return this.logSize;
  }

  /**
   * Open or create the log file, read its size once and queue a session marker.
   * Throws AlreadyInitializedError on a second call and LogFileCreationError
   * when the file cannot be created.
   */
  initialize(filePath: string): void {
    if (this.location !== null) throw new AlreadyInitializedError(this.location);
    this.location = filePath;

    if (!existsSync(filePath)) {
      this.claimCreationAttempt(filePath);
      try {
        mkdirSync(dirname(filePath), { recursive: true });
        writeFileSync(filePath, '', { flag: 'a' });
      } catch (err) {
        this.location = null;
        throw new LogFileCreationError(filePath, err);
      }
    }

    this.logSize = statSync(filePath).size;
    this.ready = true;
    this.startNewSession();
  }

  /** Queue a session marker; a non-empty log gets a separator first */
  startNewSession(): void {
    this.requireReady('startNewSession');
    this.queue
      .run(() => this.write(formatSessionMarker(this.sessionInfo(), this.logSize === 0)))
      .catch((err) => this.reportInternalError('Session marker failed', err));
  }

  /** Queue `text` for appending and return immediately */
  append(text: string): void {
    this.appendAndWait(text).catch((err) => this.reportInternalError('Append failed', err));
  }

  /** Same as append(), resolving once the text has been written or dropped */
  appendAndWait(text: string): Promise<void> {
    this.requireReady('append');
    return this.queue.run(() => this.write(text));
  }

  /** Full file content, ordered after every append queued before the call */
  async readAll(): Promise<Buffer> {
    const location = this.requireReady('readAll');
    return this.queue.run(async () => {
      try {
        return await readFile(location);
      } catch (err) {
        if (isNotFound(err)) return Buffer.alloc(0);
        throw err;
      }
    });
  }

  /** Remove the log file; resolves quietly when there is nothing to remove */
  async clear(): Promise<void> {
    const location = this.location;
    if (location === null) return;
    await this.queue.run(async () => {
      await rm(location, { force: true });
      this.logSize = 0;
      // Deliberate removal does not count against the creation limit
      this.fileCreationCount = 0;
      this.disabled = false;
    });
  }

  /** Resolves when every queued task has settled */
  flush(): Promise<void> {
    return this.queue.onIdle();
  }

  /** Queue a trim; appends already run one after each write */
  trimIfOverCap(): Promise<void> {
    return this.queue.run(() => this.trim());
  }

  /** Drop whole lines from the head until the file is back under the cap */
  private async trim(): Promise<void> {
    if (this.logSize <= this.maximumSizeBytes || this.location === null) return;
    const location = this.location;

    let data: Buffer;
    try {
      data = await readFile(location);
    } catch {
      // retried on the next append
      return;
    }
    if (data.length === 0) return;

    const target = this.maximumSizeBytes - this.trimBatchBytes;
    let position = 0;
    while (this.logSize - position > target) {
      const newline = data.indexOf(0x0a, position);
      if (newline === -1) break;
      position = newline + 1;
    }
    if (position === 0) return;

    const tempPath = `${location}.${process.pid}.tmp`;
    try {
      await writeFile(tempPath, data.subarray(position));
      await rename(tempPath, location);
    } catch {
      await rm(tempPath, { force: true }).catch(() => undefined);
      return;
    }
    this.logSize -= position;
  }

  private async write(output: string, retried = false): Promise<void> {
    if (this.disabled || this.location === null) return;
    const location = this.location;

    if (!(await this.hasEnoughDiskSpace(location))) return;

    const data = Buffer.from(output, 'utf8');
    let handle: FileHandle;
    try {
      handle = await open(location, APPEND_EXISTING);
    } catch (err) {
      if (retried) {
        this.disabled = true;
        this.reportInternalError('Log writes disabled, could not reopen the log file', err);
        return;
      }
      try {
        await this.recreateFile(location);
      } catch (createErr) {
        this.disabled = true;
        this.reportInternalError('Log writes disabled', createErr);
        return;
      }
      return this.write(output, true);
    }

    try {
      await handle.write(data);
    } catch (err) {
      // ENOSPC, EIO and friends will not clear up on the next line
      this.disabled = true;
      this.reportInternalError('Log writes disabled, write failed', err);
      return;
    } finally {
      await handle.close();
    }
    this.logSize += data.length;
    await this.trim();
  }

  private async hasEnoughDiskSpace(location: string): Promise<boolean> {
    try {
      return (await this.diskSpace(location)) > this.minimumFreeDiskBytes;
    } catch (err) {
      // Directory gone: let the open fail and recreate it
      return isNotFound(err);
    }
  }

  /** Bring back a file that disappeared while running */
  private async recreateFile(location: string): Promise<void> {
    if (!existsSync(location)) {
      this.claimCreationAttempt(location);
      try {
        await mkdir(dirname(location), { recursive: true });
        await writeFile(location, '', { flag: 'a' });
      } catch (err) {
        throw new LogFileCreationError(location, err);
      }
    }
    this.logSize = (await stat(location)).size;
  }

  private claimCreationAttempt(location: string): void {
    if (this.fileCreationCount > this.fileCreationLimit) {
      throw new LogFileCreationError(location);
    }
    this.fileCreationCount++;
  }

  private requireReady(operation: string): string {
    if (!this.ready || this.location === null) throw new NotReadyError(operation);
    return this.location;
  }

  private reportInternalError(context: string, err: unknown): void {
    console.error(`[diagnostics] ${context}: ${errorMessage(err)}`);
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
