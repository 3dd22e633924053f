/**
 * Built-in report filters for scrubbing chapter payloads before rendering.
 */

import type { Diagnostics, ReportFilter } from './chapter.js';

export const REDACTED = '[REDACTED]';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/** Apply `fn` to every string inside a value, descending into arrays and plain objects */
function mapStrings(value: unknown, fn: (text: string) => string): unknown {
  if (typeof value === 'string') return fn(value);
  if (Array.isArray(value)) return value.map((item) => mapStrings(item, fn));
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, mapStrings(v, fn)]));
  }
  return value;
}

/** Replaces every match of the given patterns, in text and in record values */
export class RedactionFilter implements ReportFilter {
  readonly name = 'redaction';
  private readonly patterns: RegExp[];

  constructor(
    patterns: RegExp[],
    private readonly replacement = REDACTED,
  ) {
    // replace() needs the global flag to hit every occurrence
    this.patterns = patterns.map((p) => (p.global ? p : new RegExp(p.source, p.flags + 'g')));
  }

  filter(diagnostics: Diagnostics): Diagnostics {
    const redact = (text: string): string =>
      this.patterns.reduce((acc, pattern) => acc.replace(pattern, this.replacement), text);
    if (typeof diagnostics === 'string') return redact(diagnostics);
    return Object.fromEntries(Object.entries(diagnostics).map(([k, v]) => [k, mapStrings(v, redact)]));
  }
}

/** Masks values stored under sensitive keys (matched case-insensitively, at any depth) */
export class KeyRedactionFilter implements ReportFilter {
  readonly name = 'key-redaction';
  private readonly keys: Set<string>;

  constructor(keys: string[]) {
    this.keys = new Set(keys.map((k) => k.toLowerCase()));
  }

  filter(diagnostics: Diagnostics): Diagnostics {
    if (typeof diagnostics === 'string') return diagnostics;
    return this.redactRecord(diagnostics);
  }

  private redactRecord(record: Record<string, unknown>): Record<string, unknown> {
    return Object.fromEntries(
      Object.entries(record).map(([key, value]) => [key, this.keys.has(key.toLowerCase()) ? REDACTED : this.redactValue(value)]),
    );
  }

  private redactValue(value: unknown): unknown {
    if (Array.isArray(value)) return value.map((item) => this.redactValue(item));
    if (isPlainObject(value)) return this.redactRecord(value);
    return value;
  }
}
