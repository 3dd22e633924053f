import { ReportChapter } from '../chapter.js';
import type { Reporter } from '../report-compiler.js';
import { formatTimestamp } from '../timestamp.js';

/** Opening chapter: what this report is and when it was made */
export class GeneralInfoReporter implements Reporter {
  readonly title = 'Information';

  constructor(
    private readonly appName: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  report(): ReportChapter {
    return new ReportChapter(this.title, {
      App: this.appName,
      'Report created (GMT)': formatTimestamp(this.now()),
      About:
        'This report contains the recent application log, captured console output, ' +
        'user preferences and system metadata to help diagnose problems.',
    });
  }
}
