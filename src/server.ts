/**
 * HTTP surface: health, diagnostics report download, log reset and
 * user preferences.
 */

import express, { type Request, type Response } from 'express';
import http from 'http';
import type { DiagnosticsRuntime } from './diagnostics.js';
import { errorMessage } from './errors.js';
import {
  deletePreference,
  getAllPreferences,
  getPreference,
  setPreference,
  type PreferenceValue,
} from './preferences.js';
import { getDb } from './storage.js';

function isPreferenceValue(value: unknown): value is PreferenceValue {
  if (value === null) return true;
  if (['string', 'number', 'boolean'].includes(typeof value)) return true;
  if (Array.isArray(value)) return value.every(isPreferenceValue);
  if (typeof value === 'object') return Object.values(value).every(isPreferenceValue);
  return false;
}

function fail(res: Response, context: string, err: unknown): void {
  console.error(`[server] ${context}:`, errorMessage(err));
  res.status(500).json({ error: errorMessage(err) });
}

export function createApp(runtime: DiagnosticsRuntime): express.Express {
  const app = express();
  app.use(express.json({ limit: '256kb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      service: runtime.config.appName,
      version: runtime.config.appVersion,
      uptime: process.uptime(),
    });
  });

  const sendReport = async (res: Response, download: boolean): Promise<void> => {
    try {
      const report = await runtime.createReport();
      res.type(report.mimeType);
      if (download) res.attachment(report.filename);
      res.send(report.data);
    } catch (err) {
      fail(res, 'Report generation failed', err);
    }
  };

  app.get('/diagnostics/report', (_req, res) => sendReport(res, false));
  app.get('/diagnostics/report/download', (_req, res) => sendReport(res, true));

  app.delete('/diagnostics/logs', async (_req, res) => {
    try {
      await runtime.store.clear();
      res.json({ ok: true });
    } catch (err) {
      fail(res, 'Clearing logs failed', err);
    }
  });

  app.post('/diagnostics/events', (req: Request, res: Response) => {
    const { name, description } = req.body ?? {};
    if (typeof name !== 'string' || name.length === 0) {
      res.status(400).json({ error: 'name is required' });
      return;
    }
    runtime.logger.event(name, typeof description === 'string' ? description : undefined);
    res.status(202).json({ ok: true });
  });

  app.get('/preferences', (_req, res) => {
    try {
      res.json({ preferences: getAllPreferences() });
    } catch (err) {
      fail(res, 'Listing preferences failed', err);
    }
  });

  app.get('/preferences/:key', (req: Request<{ key: string }>, res: Response) => {
    try {
      const value = getPreference(req.params.key);
      if (value === undefined) {
        res.status(404).json({ error: 'Preference not found' });
        return;
      }
      res.json({ key: req.params.key, value });
    } catch (err) {
      fail(res, 'Reading preference failed', err);
    }
  });

  app.put('/preferences/:key', (req: Request<{ key: string }>, res: Response) => {
    const value: unknown = req.body?.value;
    if (value === undefined || !isPreferenceValue(value)) {
      res.status(400).json({ error: 'value must be a JSON value' });
      return;
    }
    try {
      setPreference(req.params.key, value);
      res.json({ preferences: getAllPreferences() });
    } catch (err) {
      fail(res, 'Saving preference failed', err);
    }
  });

  app.delete('/preferences/:key', (req: Request<{ key: string }>, res: Response) => {
    try {
      deletePreference(req.params.key);
      res.json({ preferences: getAllPreferences() });
    } catch (err) {
      fail(res, 'Deleting preference failed', err);
    }
  });

  return app;
}

export function startServer(port: number, runtime: DiagnosticsRuntime): http.Server {
  getDb();
  console.log('[storage] Database initialized');

  const server = http.createServer(createApp(runtime));
  server.listen(port, () => {
    console.log(`[server] Listening on port ${port}`);
    console.log(`[server] Report: http://localhost:${port}/diagnostics/report`);
  });
  return server;
}
