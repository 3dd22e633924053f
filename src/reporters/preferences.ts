/**
 * Preferences reporter — every stored user preference as sorted, pretty JSON.
 */

import { ReportChapter, type Diagnostics } from '../chapter.js';
import { preformatted } from '../html.js';
import { getAllPreferences } from '../preferences.js';
import type { Reporter } from '../report-compiler.js';

export const UNPARSABLE_PREFERENCES = 'Could not parse user preferences';

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (typeof value === 'object' && value !== null && !(value instanceof Date)) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map((key) => [key, sortKeys(Reflect.get(value, key))]),
    );
  }
  return value;
}

export function formatPreferences(diagnostics: Diagnostics): string {
  if (typeof diagnostics === 'string') return preformatted(diagnostics);
  try {
    return preformatted(JSON.stringify(sortKeys(diagnostics), null, 2));
  } catch {
    return preformatted(UNPARSABLE_PREFERENCES);
  }
}

export class PreferencesReporter implements Reporter {
  readonly title: string;

  constructor(
    private readonly source: () => Record<string, unknown> = getAllPreferences,
    title = 'User Preferences',
  ) {
    this.title = title;
  }

  report(): ReportChapter {
    return new ReportChapter(this.title, this.source(), formatPreferences);
  }
}
