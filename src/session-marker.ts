/**
 * Session marker — the block written when a log store starts, so one run's
 * lines can be told apart from the previous run's.
 */

import os from 'os';
import { formatTimestamp } from './timestamp.js';

export const SESSION_SEPARATOR = '\n\n---\n\n';

export interface SessionInfo {
  date: Date;
  system: string;
  locale: string;
  timezone: string;
  appVersion: string;
}

export function currentSessionInfo(appVersion: string): SessionInfo {
  const { locale, timeZone } = Intl.DateTimeFormat().resolvedOptions();
  return {
    date: new Date(),
    system: `${os.type()} ${os.release()}`,
    locale,
    timezone: timeZone,
    appVersion,
  };
}

/** Render the marker; a non-empty log gets a separator in front */
export function formatSessionMarker(info: SessionInfo, logIsEmpty: boolean): string {
  const block =
    `${formatTimestamp(info.date)}\n` +
    `System: ${info.system}\n` +
    `Locale: ${info.locale}\n` +
    `Timezone: ${info.timezone}\n` +
    `Version: ${info.appVersion}\n\n`;
  return logIsEmpty ? block : SESSION_SEPARATOR + block;
}
