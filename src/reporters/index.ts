import type { RollingLogStore } from '../log-store.js';
import type { Reporter } from '../report-compiler.js';
import { GeneralInfoReporter } from './general-info.js';
import { LogsReporter } from './logs.js';
import { PreferencesReporter } from './preferences.js';
import { SystemMetadataReporter } from './system-metadata.js';

export { GeneralInfoReporter } from './general-info.js';
export { LogsReporter, formatLogs } from './logs.js';
export { PreferencesReporter, formatPreferences } from './preferences.js';
export { SystemMetadataReporter } from './system-metadata.js';

export interface DefaultReporterContext {
  store: RollingLogStore;
  appName: string;
  appVersion: string;
}

/** Information, system metadata, logs and user preferences, in that order */
export function defaultReporters(context: DefaultReporterContext): Reporter[] {
  return [
    new GeneralInfoReporter(context.appName),
    new SystemMetadataReporter({
      appName: context.appName,
      appVersion: context.appVersion,
      diskPath: context.store.filePath ?? process.cwd(),
    }),
    new LogsReporter(context.store),
    new PreferencesReporter(),
  ];
}
