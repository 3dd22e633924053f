/**
 * Report chapter — one titled section of the diagnostics report.
 */

import { escapeHtml, keyValueTable, preformatted } from './html.js';

export type DiagnosticsRecord = Record<string, unknown>;

/** Raw chapter payload: plain text or a key/value record */
export type Diagnostics = string | DiagnosticsRecord;

/** Renders a chapter payload to HTML; the result is inserted as-is */
export type ChapterFormatter = (diagnostics: Diagnostics) => string;

export interface ReportFilter {
  /** Recorded on every chapter the filter touched */
  readonly name: string;
  filter(diagnostics: Diagnostics): Diagnostics;
}

export class ReportChapter {
  private content: Diagnostics;
  private filters: string[] = [];

  constructor(
    readonly title: string,
    diagnostics: Diagnostics,
    private readonly formatter?: ChapterFormatter,
  ) {
    this.content = diagnostics;
  }

  get diagnostics(): Diagnostics {
    return this.content;
  }

  get appliedFilters(): readonly string[] {
    return this.filters;
  }

  /** Run each filter over the payload, in order */
  applyFilters(filters: readonly ReportFilter[]): this {
    for (const f of filters) {
      this.content = f.filter(this.content);
      this.filters.push(f.name);
    }
    return this;
  }

  /** Inner HTML of the chapter body */
  renderContent(): string {
    if (this.formatter) return this.formatter(this.content);
    if (typeof this.content === 'string') return preformatted(this.content);
    return keyValueTable(this.content);
  }

  render(anchor: string): string {
    return (
      `<div class="chapter">` +
      `<span class="anchor" id="${escapeHtml(anchor)}"></span>` +
      `<h3>${escapeHtml(this.title)}</h3>` +
      `<div class="chapter-content">${this.renderContent()}</div>` +
      `</div>`
    );
  }
}
