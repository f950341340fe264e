import { createServer, IncomingMessage, ServerResponse } from 'http';
import * as path from 'path';
import { loadAppConfig, settingsDefaultsFrom } from '../src/config/appConfig';
import type { DataLoaderService, WizardSettings } from '../src/domain/contracts';
import { FixtureDataLoaderService } from '../src/providers/fixtureDataLoaderService';
import { FetchHttpClient } from '../src/providers/httpClient';
import { HttpDataLoaderService } from '../src/providers/httpDataLoaderService';
import { ConsoleLogger } from '../src/services/logging/logger';
import { IoPool } from '../src/services/pool/ioPool';
import { FileSettingsStore } from '../src/services/settings/fileSettingsStore';
import { WizardController } from '../src/services/wizard/wizardController';
import { WizardSessionRegistry } from '../src/services/wizard/wizardSessionRegistry';
import { eventView, WizardApi } from './wizardApi';

const config = loadAppConfig();
const logger = new ConsoleLogger({ level: config.logLevel, scope: 'server' });

const pool = new IoPool(config.ioPoolSize);
const httpClient = new FetchHttpClient((url, init) => fetch(url, init));
const settingsStore = new FileSettingsStore({
  filePath: path.join(process.cwd(), '.config', 'settings.json'),
  defaults: settingsDefaultsFrom(config),
});

function buildLoaderService(settings: WizardSettings): DataLoaderService {
  if (config.dataSource === 'http') {
    if (!settings.loaderServiceUrl) {
      throw new Error('DATA_SOURCE=http needs LOADER_SERVICE_URL or a loader service URL in settings');
    }
    return new HttpDataLoaderService({ baseUrl: settings.loaderServiceUrl, client: httpClient });
  }
  return new FixtureDataLoaderService({ rootDir: config.fixturesDir });
}

function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  res.statusCode = status;
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify(payload));
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.on('data', (chunk) => {
      body += chunk;
    });
    req.on('end', () => resolve(body));
    req.on('error', reject);
  });
}

const STREAM_HEARTBEAT_MS = 15_000;

/**
 * Forwards every bus event of one session. An open stream keeps its session
 * alive; the stream ends with a `session:closed` event when the session is
 * deleted or expires.
 */
function openEventStream(api: WizardApi, sessions: WizardSessionRegistry, id: string, res: ServerResponse): void {
  const record = sessions.get(id);
  res.writeHead(200, {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache',
    Connection: 'keep-alive',
  });
  res.write(`data: ${JSON.stringify({ type: 'connected' })}\n\n`);

  const unsubscribe = record.controller.subscribeAll((event) => {
    const view = eventView(event, api.settings.maxPreviewRows);
    res.write(`event: ${view.topic}\ndata: ${JSON.stringify(view.payload ?? null)}\n\n`);
  });
  const heartbeat = setInterval(() => {
    if (sessions.touch(id)) {
      res.write(': keep-alive\n\n');
    }
  }, STREAM_HEARTBEAT_MS);
  const stopWatchingClose = sessions.onClose(id, () => {
    res.write(`event: session:closed\ndata: ${JSON.stringify({ sessionId: id })}\n\n`);
    res.end();
  });
  logger.debug(`Event stream opened for session ${id}`);

  res.on('close', () => {
    clearInterval(heartbeat);
    stopWatchingClose();
    unsubscribe();
    logger.debug(`Event stream closed for session ${id}`);
  });
}

async function main(): Promise<void> {
  const settings = await settingsStore.load();
  let loaderService = buildLoaderService(settings);

  const sessions = new WizardSessionRegistry({
    ttlMs: config.sessionTtlMs,
    logger: logger.child('sessions'),
    createController: (sessionId) =>
      new WizardController({
        loaderService,
        pool,
        fetchTimeoutMs: config.fetchTimeoutMs,
        defaultDropNaThreshold: api.settings.defaultDropNaThreshold,
        logger: logger.child(`wizard:${sessionId.slice(0, 8)}`),
      }),
  });

  const api: WizardApi = new WizardApi({
    sessions,
    settingsStore,
    settings,
    logger: logger.child('api'),
    onSettingsChanged: (next) => {
      loaderService = buildLoaderService(next);
    },
  });

  setInterval(() => sessions.sweep(), 60_000).unref();

  createServer((req, res) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET,POST,PUT,DELETE,OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    handleRequest(api, sessions, req, res).catch((error: unknown) => {
      logger.error('Request handling failed', error);
      if (!res.headersSent) {
        sendJson(res, 500, { error: error instanceof Error ? error.message : 'Unexpected error' });
      }
    });
  }).listen(config.port, () => {
    logger.info(`Wizard API server listening on http://localhost:${config.port} (data source: ${config.dataSource})`);
  });
}

async function handleRequest(
  api: WizardApi,
  sessions: WizardSessionRegistry,
  req: IncomingMessage,
  res: ServerResponse,
): Promise<void> {
  const method = req.method ?? 'GET';
  const pathname = (req.url ?? '').split('?')[0] ?? '';

  const stream = /^\/api\/session\/([^/]+)\/events$/.exec(pathname);
  if (method === 'GET' && stream?.[1]) {
    const response = await api.handle({ method: 'GET', pathname: `/api/session/${stream[1]}` });
    if (response.status !== 200) {
      sendJson(res, response.status, response.kind === 'json' ? response.body : null);
      return;
    }
    openEventStream(api, sessions, stream[1], res);
    return;
  }

  let body: unknown;
  if (method === 'POST' || method === 'PUT') {
    const raw = await readBody(req);
    try {
      body = raw ? JSON.parse(raw) : undefined;
    } catch {
      sendJson(res, 400, { error: 'Request body is not valid JSON', code: 'INVALID_CONFIGURATION' });
      return;
    }
  }

  const response = await api.handle({ method, pathname, body });
  switch (response.kind) {
    case 'json':
      sendJson(res, response.status, response.body);
      return;
    case 'binary':
      res.writeHead(response.status, {
        'Content-Type': response.archive.contentType,
        'Content-Disposition': `attachment; filename="${response.archive.fileName}"`,
        'Content-Length': response.archive.data.byteLength,
      });
      res.end(Buffer.from(response.archive.data));
      return;
    case 'empty':
      res.writeHead(response.status);
      res.end();
      return;
  }
}

main().catch((error: unknown) => {
  logger.error('Failed to start the wizard API server', error);
  process.exitCode = 1;
});
