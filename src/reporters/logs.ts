/**
 * Logs reporter — the rolling log file, one block per session.
 */

import { ReportChapter, type Diagnostics } from '../chapter.js';
import { escapeHtml, preformatted } from '../html.js';
import type { Reporter } from '../report-compiler.js';
import type { RollingLogStore } from '../log-store.js';
import { SESSION_SEPARATOR } from '../session-marker.js';

export const NO_LOG_ENTRIES = '(no log entries)';

function lineClass(line: string): string | null {
  if (line.includes(' | ERROR: ')) return 'error';
  if (line.startsWith('SYSTEM: ')) return 'system';
  return null;
}

function renderLine(line: string): string {
  const cls = lineClass(line);
  const text = escapeHtml(line);
  return cls ? `<span class="${cls}">${text}</span>` : text;
}

export function formatLogs(diagnostics: Diagnostics): string {
  if (typeof diagnostics !== 'string') return preformatted(JSON.stringify(diagnostics, null, 2));
  if (diagnostics.trim().length === 0) return preformatted(NO_LOG_ENTRIES);

  return diagnostics
    .split(SESSION_SEPARATOR)
    .filter((session) => session.trim().length > 0)
    .map((session) => {
      const lines = session.replace(/\n+$/, '').split('\n').map(renderLine);
      return `<div class="session"><pre>${lines.join('\n')}</pre></div>`;
    })
    .join('');
}

export class LogsReporter implements Reporter {
  readonly title: string;

  constructor(
    private readonly store: RollingLogStore,
    title = 'Logs',
  ) {
    this.title = title;
  }

  async report(): Promise<ReportChapter> {
    const data = await this.store.readAll();
    return new ReportChapter(this.title, data.toString('utf8'), formatLogs);
  }
}
