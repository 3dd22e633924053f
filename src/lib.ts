export { RollingLogStore, type RollingLogStoreOptions } from './log-store.js';
export { DiagnosticsLogger, formatLogLine, type LogLine } from './diagnostics-logger.js';
export { ConsoleTap, isTestRun, tapDisabledReason, type ConsoleTapOptions, type LineSink, type TapStream } from './console-tap.js';
export { SerialQueue } from './serial-queue.js';
export { captureCallerLocation, parseStackFrame, type SourceLocation } from './source-location.js';
export { freeDiskSpace, type DiskSpaceProbe } from './disk-space.js';
export {
  ReportChapter,
  type ChapterFormatter,
  type Diagnostics,
  type DiagnosticsRecord,
  type ReportFilter,
} from './chapter.js';
export { RedactionFilter, KeyRedactionFilter, REDACTED } from './report-filters.js';
export { createReport, generateHtml, assignAnchors, type Reporter, type CreateReportOptions } from './report-compiler.js';
export { DiagnosticsReport, REPORT_FILENAME } from './report.js';
export * from './reporters/index.js';
export { startDiagnostics, type DiagnosticsRuntime, type StartDiagnosticsOptions } from './diagnostics.js';
export { loadConfig, type DiagnosticsConfig } from './config.js';
export {
  getPreference,
  setPreference,
  deletePreference,
  getAllPreferences,
  type PreferenceValue,
} from './preferences.js';
export { closeDb } from './storage.js';
export {
  DiagnosticsError,
  AlreadyInitializedError,
  NotReadyError,
  LogFileCreationError,
  type DiagnosticsErrorCode,
} from './errors.js';
