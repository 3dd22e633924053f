/**
 * Console tap — mirrors process stdout/stderr into the diagnostics log.
 *
 * Wraps the `write` method of each stream. Every chunk still reaches the
 * original stream; complete lines are also passed to a line sink. Text
 * after the last newline waits for the next chunk. Lines tagged
 * `[diagnostics]` are passed through but not captured, so a failing store
 * reporting its own errors cannot feed itself.
 *
 * Skipped under a test runner and inside worker threads, where stdout is an
 * async proxy to the parent and wrapping it loses ordering.
 */

import { isMainThread } from 'worker_threads';
import { TextDecoder } from 'util';
import { errorMessage } from './errors.js';

export type LineSink = (line: string) => void;

/** Lines the diagnostics code prints about itself; never mirrored into the log */
export const DIAGNOSTICS_TAG = '[diagnostics]';

/** The part of a writable stream the tap wraps */
export interface TapStream {
  write(chunk: string | Uint8Array, ...rest: unknown[]): boolean;
}

export interface ConsoleTapOptions {
  stdout?: TapStream;
  stderr?: TapStream;
  /** Attach even under a test runner or in a worker thread */
  force?: boolean;
  env?: NodeJS.ProcessEnv;
}

type StreamName = 'stdout' | 'stderr';

interface TappedStream {
  stream: TapStream;
  original: TapStream['write'];
  decoder: TextDecoder;
  partial: string;
}

export function isTestRun(env: NodeJS.ProcessEnv): boolean {
  return Boolean(env.VITEST || env.JEST_WORKER_ID) || env.NODE_ENV === 'test';
}

/** Why the tap should stay off, or null when it may attach */
export function tapDisabledReason(env: NodeJS.ProcessEnv, mainThread = isMainThread): string | null {
  if (isTestRun(env)) return 'running under a test runner';
  if (!mainThread) return 'running in a worker thread';
  if (env.DIAGNOSTICS_CONSOLE_TAP === 'off') return 'DIAGNOSTICS_CONSOLE_TAP=off';
  return null;
}

export class ConsoleTap {
  private readonly streams: Record<StreamName, TapStream>;
  private readonly force: boolean;
  private readonly env: NodeJS.ProcessEnv;
  private tapped = new Map<StreamName, TappedStream>();
  /** Set while the sink runs, so anything it prints is not captured again */
  private forwarding = false;

  constructor(
    private readonly sink: LineSink,
    options: ConsoleTapOptions = {},
  ) {
    this.streams = {
      stdout: options.stdout ?? process.stdout,
      stderr: options.stderr ?? process.stderr,
    };
    this.force = options.force ?? false;
    this.env = options.env ?? process.env;
  }

  get isAttached(): boolean {
    return this.tapped.size > 0;
  }

  /** Start mirroring; false when already attached or disabled here */
  attach(): boolean {
    if (this.isAttached) return false;
    if (!this.force && tapDisabledReason(this.env) !== null) return false;

    for (const name of ['stdout', 'stderr'] as const) {
      const stream = this.streams[name];
      const original = stream.write;
      const entry: TappedStream = {
        stream,
        original,
        decoder: new TextDecoder('utf-8', { fatal: true }),
        partial: '',
      };
      stream.write = (chunk: string | Uint8Array, ...rest: unknown[]): boolean => {
        const result = original.call(stream, chunk, ...rest);
        this.capture(name, entry, chunk);
        return result;
      };
      this.tapped.set(name, entry);
    }
    return true;
  }

  /** Restore the original writers and emit any unterminated text */
  detach(): void {
    for (const [name, entry] of this.tapped) {
      entry.stream.write = entry.original;
      const rest = entry.partial;
      entry.partial = '';
      if (rest.trim().length > 0 && !rest.startsWith(DIAGNOSTICS_TAG)) this.forward(name, [rest]);
    }
    this.tapped.clear();
  }

  private capture(name: StreamName, entry: TappedStream, chunk: string | Uint8Array): void {
    if (this.forwarding) return;

    const text = typeof chunk === 'string' ? chunk : this.decode(name, entry, chunk);
    const lines = (entry.partial + text).split(/\r?\n/);
    entry.partial = lines.pop() ?? '';
    this.forward(
      name,
      lines.filter((line) => line.length > 0 && !line.startsWith(DIAGNOSTICS_TAG)),
    );
  }

  private decode(name: StreamName, entry: TappedStream, bytes: Uint8Array): string {
    try {
      return entry.decoder.decode(bytes, { stream: true });
    } catch (err) {
      entry.decoder = new TextDecoder('utf-8', { fatal: true });
      this.reportInconsistency(name, `captured ${bytes.length} bytes that are not valid UTF-8 (${errorMessage(err)})`);
      return new TextDecoder('utf-8').decode(bytes);
    }
  }

  private forward(name: StreamName, lines: string[]): void {
    if (lines.length === 0) return;
    this.forwarding = true;
    try {
      for (const line of lines) this.sink(line);
    } catch (err) {
      this.reportInconsistency(name, `line sink failed: ${errorMessage(err)}`);
    } finally {
      this.forwarding = false;
    }
  }

  /** Written straight to the original stderr so it is never captured */
  private reportInconsistency(name: StreamName, message: string): void {
    const stderr = this.tapped.get('stderr');
    const line = `[diagnostics] console tap (${name}): ${message}\n`;
    if (stderr) stderr.original.call(stderr.stream, line);
    else this.streams.stderr.write(line);
  }
}
