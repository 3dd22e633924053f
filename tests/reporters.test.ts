import { describe, it, expect, afterAll } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

// Set DATA_DIR before any storage module usage (getDbPath reads lazily)
const tempDir = mkdtempSync(join(tmpdir(), 'diagnostics-reporters-test-'));
process.env.DATA_DIR = tempDir;
delete process.env.DB_PATH;

import { RollingLogStore } from '../src/log-store.js';
import { DiagnosticsLogger } from '../src/diagnostics-logger.js';
import { escapeHtml } from '../src/html.js';
import { setPreference } from '../src/preferences.js';
import { closeDb } from '../src/storage.js';
import { SESSION_SEPARATOR } from '../src/session-marker.js';
import {
  GeneralInfoReporter,
  LogsReporter,
  PreferencesReporter,
  SystemMetadataReporter,
  defaultReporters,
  formatLogs,
  formatPreferences,
} from '../src/reporters/index.js';

afterAll(() => {
  closeDb();
  rmSync(tempDir, { recursive: true, force: true });
});

const NOW = new Date(Date.UTC(2024, 2, 5, 9, 7, 1));

describe('LogsReporter', () => {
  it('reads the whole log into a "Logs" chapter', async () => {
    const store = new RollingLogStore({ diskSpace: async () => Number.MAX_SAFE_INTEGER });
    store.initialize(join(tempDir, 'logs-reporter.txt'));
    await store.clear();
    const logger = new DiagnosticsLogger(store, () => NOW);
    logger.log('started', { file: 'main.ts', function: 'boot', line: 3 });
    logger.error(new Error('disk gone'), undefined, { file: 'main.ts', function: 'boot', line: 9 });

    const chapter = await new LogsReporter(store).report();

    expect(chapter.title).toBe('Logs');
    expect(chapter.diagnostics).toBe(
      '2024-03-05 09:07:01 | started | main.ts:boot:L3\n' +
        '2024-03-05 09:07:01 | ERROR: Error: disk gone | main.ts:boot:L9\n',
    );
    expect(chapter.renderContent()).toBe(
      '<div class="session"><pre>2024-03-05 09:07:01 | started | main.ts:boot:L3\n' +
        '<span class="error">2024-03-05 09:07:01 | ERROR: Error: disk gone | main.ts:boot:L9</span></pre></div>',
    );
  });
});

describe('formatLogs', () => {
  it('shows a placeholder for an empty log', () => {
    expect(formatLogs('')).toBe('<pre>(no log entries)</pre>');
  });

  it('renders one block per session and marks system lines', () => {
    expect(formatLogs('first\n' + SESSION_SEPARATOR + 'SYSTEM: booted\n')).toBe(
      '<div class="session"><pre>first</pre></div>' +
        '<div class="session"><pre><span class="system">SYSTEM: booted</span></pre></div>',
    );
  });
});

describe('PreferencesReporter', () => {
  it('dumps stored preferences', () => {
    setPreference('theme', 'dark');
    setPreference('notifications', { email: true, push: false });

    const chapter = new PreferencesReporter().report();

    expect(chapter.title).toBe('User Preferences');
    expect(chapter.diagnostics).toEqual({ notifications: { email: true, push: false }, theme: 'dark' });
  });

  it('formats as key-sorted pretty JSON', () => {
    const chapter = new PreferencesReporter(() => ({ b: 1, a: { d: 2, c: 3 } }));
    const expected = JSON.stringify({ a: { c: 3, d: 2 }, b: 1 }, null, 2);
    expect(chapter.report().renderContent()).toBe(`<pre>${escapeHtml(expected)}</pre>`);
  });

  it('falls back when the preferences cannot be serialized', () => {
    expect(formatPreferences({ counter: 10n })).toBe('<pre>Could not parse user preferences</pre>');
  });
});

describe('SystemMetadataReporter', () => {
  it('reports app, runtime and free disk space', async () => {
    const reporter = new SystemMetadataReporter({
      appName: 'Shop',
      appVersion: '2.1.0',
      diskPath: tempDir,
      diskSpace: async () => 2 * 1024 * 1024 * 1024,
    });

    const chapter = await reporter.report();
    const diagnostics = chapter.diagnostics;
    if (typeof diagnostics === 'string') throw new Error('expected a record');

    expect(chapter.title).toBe('App System Metadata');
    expect(diagnostics['App name']).toBe('Shop');
    expect(diagnostics['App version']).toBe('2.1.0');
    expect(diagnostics['Node']).toBe(process.version);
    expect(diagnostics['Free disk space']).toBe('2048 MB');
  });

  it('notes when free disk space is unavailable', async () => {
    const reporter = new SystemMetadataReporter({
      appName: 'Shop',
      appVersion: '2.1.0',
      diskPath: tempDir,
      diskSpace: async () => {
        throw new Error('statfs unsupported');
      },
    });

    const diagnostics = (await reporter.report()).diagnostics;
    if (typeof diagnostics === 'string') throw new Error('expected a record');
    expect(diagnostics['Free disk space']).toBe('(unavailable: statfs unsupported)');
  });
});

describe('GeneralInfoReporter', () => {
  it('names the app and the creation time', () => {
    const chapter = new GeneralInfoReporter('Shop', () => NOW).report();
    const diagnostics = chapter.diagnostics;
    if (typeof diagnostics === 'string') throw new Error('expected a record');

    expect(chapter.title).toBe('Information');
    expect(diagnostics['App']).toBe('Shop');
    expect(diagnostics['Report created (GMT)']).toBe('2024-03-05 09:07:01');
  });
});

describe('defaultReporters', () => {
  it('returns information, metadata, logs and preferences in order', () => {
    const store = new RollingLogStore();
    const titles = defaultReporters({ store, appName: 'Shop', appVersion: '2.1.0' }).map((r) => r.title);
    expect(titles).toEqual(['Information', 'App System Metadata', 'Logs', 'User Preferences']);
  });
});
