/**
 * System metadata reporter — app version, runtime, OS and resource figures.
 */

import os from 'os';
import { ReportChapter } from '../chapter.js';
import { freeDiskSpace, type DiskSpaceProbe } from '../disk-space.js';
import { errorMessage } from '../errors.js';
import type { Reporter } from '../report-compiler.js';

export interface SystemMetadataOptions {
  appName: string;
  appVersion: string;
  /** Any path on the volume whose free space should be reported */
  diskPath: string;
  diskSpace?: DiskSpaceProbe;
}

function megabytes(bytes: number): string {
  return `${Math.round(bytes / 1024 / 1024)} MB`;
}

export class SystemMetadataReporter implements Reporter {
  readonly title = 'App System Metadata';
  private readonly diskSpace: DiskSpaceProbe;

  constructor(private readonly options: SystemMetadataOptions) {
    this.diskSpace = options.diskSpace ?? freeDiskSpace;
  }

  async report(): Promise<ReportChapter> {
    const { locale, timeZone } = Intl.DateTimeFormat().resolvedOptions();
    const mem = process.memoryUsage();

    let freeDisk: string;
    try {
      freeDisk = megabytes(await this.diskSpace(this.options.diskPath));
    } catch (err) {
      freeDisk = `(unavailable: ${errorMessage(err)})`;
    }

    return new ReportChapter(this.title, {
      'App name': this.options.appName,
      'App version': this.options.appVersion,
      Node: process.version,
      Platform: `${process.platform} (${process.arch})`,
      System: `${os.type()} ${os.release()}`,
      Locale: locale,
      Timezone: timeZone,
      Uptime: `${Math.floor(process.uptime())}s`,
      Heap: `${megabytes(mem.heapUsed)} / ${megabytes(mem.heapTotal)}`,
      RSS: megabytes(mem.rss),
      'Free disk space': freeDisk,
    });
  }
}
