/**
 * Report compiler — runs reporters, filters their chapters and renders one
 * HTML document with a navigation menu keyed by chapter title.
 *
 * Reporters run one after another in the order given. A reporter that throws
 * still gets a chapter, holding the error text, so one broken collector does
 * not cost the whole report.
 */

import { ReportChapter, type ReportFilter } from './chapter.js';
import { errorMessage } from './errors.js';
import { REPORT_STYLE, anchorFor, escapeHtml } from './html.js';
import { DiagnosticsReport } from './report.js';

export interface Reporter {
  /** Used for the fallback chapter when report() throws */
  readonly title?: string;
  report(): ReportChapter | Promise<ReportChapter>;
}

export interface CreateReportOptions {
  reporters: readonly Reporter[];
  filters?: readonly ReportFilter[];
  /** Heading and page title */
  title?: string;
}

export const DEFAULT_REPORT_TITLE = 'Diagnostics Report';

export async function createReport(options: CreateReportOptions): Promise<DiagnosticsReport> {
  const filters = options.filters ?? [];
  const chapters: ReportChapter[] = [];

  for (const [index, reporter] of options.reporters.entries()) {
    const chapter = await runReporter(reporter, index);
    if (filters.length > 0) chapter.applyFilters(filters);
    chapters.push(chapter);
  }

  return new DiagnosticsReport(generateHtml(chapters, options.title ?? DEFAULT_REPORT_TITLE));
}

async function runReporter(reporter: Reporter, index: number): Promise<ReportChapter> {
  try {
    return await reporter.report();
  } catch (err) {
    const title = reporter.title ?? `Reporter ${index + 1}`;
    console.error(`[diagnostics] Reporter "${title}" failed: ${errorMessage(err)}`);
    return new ReportChapter(title, `(could not produce chapter: ${errorMessage(err)})`);
  }
}

/**
 * One anchor per title. Repeated anchors get a numeric suffix (`logs`,
 * `logs-2`) so every menu entry points at its own chapter.
 */
export function assignAnchors(titles: readonly string[]): string[] {
  const used = new Set<string>();
  return titles.map((title) => {
    const base = anchorFor(title) || 'chapter';
    let anchor = base;
    for (let n = 2; used.has(anchor); n++) anchor = `${base}-${n}`;
    if (anchor !== base) {
      console.warn(`[diagnostics] Duplicate chapter title "${title}", using anchor #${anchor}`);
    }
    used.add(anchor);
    return anchor;
  });
}

export function generateHtml(chapters: readonly ReportChapter[], title: string): string {
  const anchors = assignAnchors(chapters.map((c) => c.title));

  let html = '<html>';
  html += header(title);
  html += '<body>';
  html += '<main class="container">';
  html += menu(chapters, anchors);
  html += mainContent(chapters, anchors, title);
  html += '</main>';
  html += '<footer></footer>';
  html += '</body>';
  html += '</html>';
  return html;
}

function header(title: string): string {
  return (
    '<head>' +
    `<title>${escapeHtml(title)}</title>` +
    REPORT_STYLE +
    '<meta charset="utf-8">' +
    '<meta name="viewport" content="width=device-width, initial-scale=1">' +
    '</head>'
  );
}

function menu(chapters: readonly ReportChapter[], anchors: readonly string[]): string {
  const items = chapters
    .map((chapter, i) => `<li><a href="#${escapeHtml(anchors[i])}">${escapeHtml(chapter.title)}</a></li>`)
    .join('');
  return `<aside class="nav-container"><nav><ul>${items}</ul></nav></aside>`;
}

function mainContent(chapters: readonly ReportChapter[], anchors: readonly string[], title: string): string {
  const body = chapters.map((chapter, i) => chapter.render(anchors[i])).join('');
  return `<div class="main-content"><header><h1>${escapeHtml(title)}</h1></header>${body}</div>`;
}
