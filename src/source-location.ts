/**
 * Caller provenance for log lines, read from a V8 stack trace.
 */

import { basename } from 'path';

export interface SourceLocation {
  /** Short file name, e.g. `server.ts` */
  file: string;
  function: string;
  line: number;
}

const UNKNOWN_LOCATION: SourceLocation = { file: 'unknown', function: '<anonymous>', line: 0 };

// "    at fn (/app/src/server.ts:12:5)" or "    at /app/src/server.ts:12:5"
const FRAME_PATTERN = /^\s*at (?:async )?(?:(.+?) \()?(.+?):(\d+):\d+\)?$/;

/** Parse one stack frame line; null when it does not look like a frame */
export function parseStackFrame(frame: string): SourceLocation | null {
  const match = frame.match(FRAME_PATTERN);
  if (!match) return null;
  const [, fn, path, line] = match;
  return {
    file: basename(path.replace(/^file:\/\//, '').replace(/\\/g, '/')),
    function: fn && fn.length > 0 ? fn : '<anonymous>',
    line: parseInt(line, 10),
  };
}

/**
 * Location of whoever called `boundary`. Frames for `boundary` and
 * everything above it are cut from the trace.
 */
export function captureCallerLocation(boundary: (...args: never[]) => unknown): SourceLocation {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, boundary);
  const frame = holder.stack?.split('\n')[1];
  if (!frame) return UNKNOWN_LOCATION;
  return parseStackFrame(frame) ?? UNKNOWN_LOCATION;
}
