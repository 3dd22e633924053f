/**
 * User preferences — small JSON values keyed by name, persisted in SQLite.
 */

import { getDb } from './storage.js';

export type PreferenceValue =
  | string
  | number
  | boolean
  | null
  | PreferenceValue[]
  | { [key: string]: PreferenceValue };

interface PreferenceRow {
  key: string;
  value: string;
  updated_at: number;
}

export function setPreference(key: string, value: PreferenceValue): void {
  getDb()
    .prepare(
      `INSERT INTO user_preferences (key, value, updated_at) VALUES (?, ?, ?)
       ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
    )
    .run(key, JSON.stringify(value), Date.now());
}

export function getPreference(key: string): PreferenceValue | undefined {
  const row = getDb().prepare('SELECT key, value, updated_at FROM user_preferences WHERE key = ?').get(key) as
    | PreferenceRow
    | undefined;
  return row ? parseValue(row.value) : undefined;
}

/** Returns true when a row was removed */
export function deletePreference(key: string): boolean {
  return getDb().prepare('DELETE FROM user_preferences WHERE key = ?').run(key).changes > 0;
}

export function getAllPreferences(): Record<string, PreferenceValue> {
  const rows = getDb()
    .prepare('SELECT key, value, updated_at FROM user_preferences ORDER BY key')
    .all() as PreferenceRow[];

  const preferences: Record<string, PreferenceValue> = {};
  for (const row of rows) {
    preferences[row.key] = parseValue(row.value);
  }
  return preferences;
}

/** Rows written outside this module may hold plain text */
function parseValue(raw: string): PreferenceValue {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}
