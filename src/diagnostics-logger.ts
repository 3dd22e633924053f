/**
 * Diagnostics logger — the public logging API.
 *
 * Lines are formatted on the caller's turn and handed to the store's queue,
 * so no call waits on disk I/O:
 *
 *   2024-03-05 09:07:01 | EVENT: upload | finished | server.ts:handleUpload:L42
 */

import type { RollingLogStore } from './log-store.js';
import { NotReadyError } from './errors.js';
import { captureCallerLocation, type SourceLocation } from './source-location.js';
import { formatTimestamp } from './timestamp.js';

export interface LogLine {
  timestamp: Date;
  source: SourceLocation;
  body: string;
}

export function formatLogLine(line: LogLine): string {
  const { file, function: fn, line: lineNumber } = line.source;
  return `${formatTimestamp(line.timestamp)} | ${line.body} | ${file}:${fn}:L${lineNumber}\n`;
}

function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}

function withDescription(text: string, description?: string): string {
  return description ? `${text} | ${description}` : text;
}

export class DiagnosticsLogger {
  constructor(
    private readonly store: RollingLogStore,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Log a free-form message */
  log(message: string, source?: SourceLocation): void {
    this.record(message, source ?? captureCallerLocation(this.log));
  }

  /** Log an error with an optional note */
  error(error: unknown, description?: string, source?: SourceLocation): void {
    this.record(
      `ERROR: ${withDescription(describeError(error), description)}`,
      source ?? captureCallerLocation(this.error),
    );
  }

  event(name: string, description?: string, source?: SourceLocation): void {
    this.record(`EVENT: ${withDescription(name, description)}`, source ?? captureCallerLocation(this.event));
  }

  /** Log that a screen (page, view, route) was shown */
  screen(name: string, source?: SourceLocation): void {
    this.record(`SCREEN: ${name}`, source ?? captureCallerLocation(this.screen));
  }

  /** Raw console output; written without timestamp or provenance */
  system(line: string): void {
    this.requireReady();
    this.store.append(`SYSTEM: ${line}\n`);
  }

  /** Resolves once every queued line is on disk (or dropped) */
  flush(): Promise<void> {
    return this.store.flush();
  }

  private record(body: string, source: SourceLocation): void {
    this.requireReady();
    this.store.append(formatLogLine({ timestamp: this.now(), source, body }));
  }

  private requireReady(): void {
    if (!this.store.isReady) throw new NotReadyError('log');
  }
}
