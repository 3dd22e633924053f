/**
 * The compiled diagnostics report, ready to save, serve or attach.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { errorMessage } from './errors.js';

export const REPORT_FILENAME = 'Diagnostics-Report.html';

export type ReportMimeType = 'text/html';

export class DiagnosticsReport {
  readonly mimeType: ReportMimeType = 'text/html';
  /** UTF-8 bytes of `html` */
  readonly data: Buffer;

  constructor(
    readonly html: string,
    readonly filename: string = REPORT_FILENAME,
  ) {
    this.data = Buffer.from(html, 'utf8');
    Object.freeze(this);
  }

  /** Write the report into `folder`; resolves to the saved path, or null on failure */
  async saveToFolder(folder: string): Promise<string | null> {
    const filePath = join(folder, this.filename);
    try {
      await mkdir(folder, { recursive: true });
      await writeFile(filePath, this.data);
    } catch (err) {
      console.error(`[diagnostics] Report could not be saved to ${filePath}: ${errorMessage(err)}`);
      return null;
    }
    console.log(`[diagnostics] Report saved to: ${filePath}`);
    return filePath;
  }
}
