/**
 * Wires a log store, the logger facade and the console tap together, and
 * builds reports from the default reporters.
 */

import { ConsoleTap, tapDisabledReason, type ConsoleTapOptions } from './console-tap.js';
import type { ReportFilter } from './chapter.js';
import { loadConfig, type DiagnosticsConfig } from './config.js';
import { DiagnosticsLogger } from './diagnostics-logger.js';
import { RollingLogStore } from './log-store.js';
import { createReport, type Reporter } from './report-compiler.js';
import type { DiagnosticsReport } from './report.js';
import { defaultReporters } from './reporters/index.js';

export interface DiagnosticsRuntime {
  readonly config: DiagnosticsConfig;
  readonly store: RollingLogStore;
  readonly logger: DiagnosticsLogger;
  readonly tap: ConsoleTap;
  /** Compile a report; defaults to the built-in reporters */
  createReport(options?: { reporters?: Reporter[]; filters?: ReportFilter[] }): Promise<DiagnosticsReport>;
  /** Detach the tap and wait for queued writes */
  shutdown(): Promise<void>;
}

export interface StartDiagnosticsOptions {
  store?: RollingLogStore;
  tap?: ConsoleTapOptions;
  /** Applied when createReport() is called without filters */
  filters?: ReportFilter[];
}

export function startDiagnostics(
  config: DiagnosticsConfig = loadConfig(),
  options: StartDiagnosticsOptions = {},
): DiagnosticsRuntime {
  const store =
    options.store ??
    new RollingLogStore({
      maximumSizeBytes: config.maximumLogBytes,
      trimBatchBytes: config.trimBatchBytes,
      minimumFreeDiskBytes: config.minimumFreeDiskBytes,
      appVersion: config.appVersion,
    });
  store.initialize(config.logPath);

  const logger = new DiagnosticsLogger(store);
  const tap = new ConsoleTap((line) => logger.system(line), options.tap);

  if (config.consoleTap === 'on') {
    if (tap.attach()) {
      console.log(`[diagnostics] Console tap attached, logging to ${config.logPath}`);
    } else {
      const reason = tapDisabledReason(options.tap?.env ?? process.env) ?? 'already attached';
      console.log(`[diagnostics] Console tap skipped (${reason})`);
    }
  }

  return {
    config,
    store,
    logger,
    tap,
    createReport: (reportOptions = {}) =>
      createReport({
        reporters:
          reportOptions.reporters ??
          defaultReporters({ store, appName: config.appName, appVersion: config.appVersion }),
        filters: reportOptions.filters ?? options.filters,
        title: `${config.appName} - Diagnostics Report`,
      }),
    shutdown: async () => {
      tap.detach();
      await store.flush();
    },
  };
}
