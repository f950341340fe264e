import { z } from 'zod';
import type {
  DataTable,
  LoaderArchive,
  PipelineState,
  TableSet,
  WizardEvents,
  WizardSettings,
  WizardSnapshot,
} from '../src/domain/contracts';
import { InvalidConfigurationError, WizardError } from '../src/domain/errors';
import { stageSchema } from '../src/domain/schemas';
import { type Logger, silentLogger } from '../src/services/logging/logger';
import { settingsSchema } from '../src/services/settings/fileSettingsStore';
import type { BusEvent } from '../src/services/wizard/notificationBus';
import type { WizardSessionRegistry } from '../src/services/wizard/wizardSessionRegistry';

export interface ApiRequest {
  method: string;
  pathname: string;
  body?: unknown;
}

export type ApiResponse =
  | { kind: 'json'; status: number; body: unknown }
  | { kind: 'binary'; status: number; archive: LoaderArchive }
  | { kind: 'empty'; status: number };

export interface SettingsStore {
  load(): Promise<WizardSettings>;
  save(settings: WizardSettings): Promise<WizardSettings>;
}

export interface TablePreview extends DataTable {
  totalRows: number;
}

export interface TableSetPreview {
  features: TablePreview;
  targets: TablePreview | null;
  odds: TablePreview | null;
}

export type StateView = Omit<PipelineState, 'trainTables' | 'fixtureTables'> & {
  trainTables?: TableSetPreview;
  fixtureTables?: TableSetPreview;
};

export interface SessionView extends Omit<WizardSnapshot, 'state'> {
  sessionId: string;
  state: StateView;
}

export interface WizardApiOptions {
  sessions: WizardSessionRegistry;
  settingsStore: SettingsStore;
  settings: WizardSettings;
  onSettingsChanged?: (settings: WizardSettings) => void;
  logger?: Logger;
}

const sportBodySchema = z.object({ sport: z.string() });
const filterBodySchema = z.object({
  rowIds: z.array(z.number().int()),
  confirm: z.boolean().default(true),
});
const extractionBodySchema = z.object({
  oddsType: z.string().nullable(),
  dropNaThreshold: z.number(),
});
const rewindBodySchema = z.object({ stage: stageSchema });

export function previewTable(table: DataTable, maxRows: number): TablePreview {
  return {
    columns: table.columns,
    rows: table.rows.slice(0, maxRows),
    totalRows: table.rows.length,
  };
}

export function previewTableSet(tables: TableSet, maxRows: number): TableSetPreview {
  return {
    features: previewTable(tables.features, maxRows),
    targets: tables.targets ? previewTable(tables.targets, maxRows) : null,
    odds: tables.odds ? previewTable(tables.odds, maxRows) : null,
  };
}

export function sessionView(sessionId: string, snapshot: WizardSnapshot, maxRows: number): SessionView {
  const { trainTables, fixtureTables, ...rest } = snapshot.state;
  const state: StateView = { ...rest };
  if (trainTables) {
    state.trainTables = previewTableSet(trainTables, maxRows);
  }
  if (fixtureTables) {
    state.fixtureTables = previewTableSet(fixtureTables, maxRows);
  }
  return { ...snapshot, sessionId, state };
}

function isTableSet(value: unknown): value is TableSet {
  return typeof value === 'object' && value !== null && 'features' in value && 'targets' in value;
}

/** Bus event as sent over the event stream; table sets are cut down to a preview. */
export function eventView(event: BusEvent<WizardEvents>, maxRows: number): { topic: string; payload: unknown } {
  const payload: unknown = event.payload;
  return {
    topic: event.topic,
    payload: isTableSet(payload) ? previewTableSet(payload, maxRows) : payload,
  };
}

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`);
    throw new InvalidConfigurationError(`Invalid request body: ${issues.join('; ')}`);
  }
  return result.data;
}

function json(status: number, body: unknown): ApiResponse {
  return { kind: 'json', status, body };
}

/**
 * Transport-free router for the wizard API. The HTTP listener hands it the
 * method, path and parsed body and writes back whatever it returns.
 */
export class WizardApi {
  private currentSettings: WizardSettings;
  private readonly logger: Logger;

  constructor(private readonly options: WizardApiOptions) {
    this.currentSettings = options.settings;
    this.logger = options.logger ?? silentLogger;
  }

  get settings(): WizardSettings {
    return this.currentSettings;
  }

  async handle(request: ApiRequest): Promise<ApiResponse> {
    try {
      return await this.route(request);
    } catch (error) {
      if (error instanceof WizardError) {
        return json(error.statusCode, { error: error.message, code: error.code });
      }
      this.logger.error(`${request.method} ${request.pathname} failed`, error);
      return json(500, { error: error instanceof Error ? error.message : 'Unexpected error' });
    }
  }

  private async route({ method, pathname, body }: ApiRequest): Promise<ApiResponse> {
    if (pathname === '/api/settings') {
      if (method === 'GET') {
        return json(200, this.currentSettings);
      }
      if (method === 'PUT') {
        return this.updateSettings(body);
      }
    }

    if (method === 'POST' && pathname === '/api/session') {
      const record = this.options.sessions.create();
      return json(201, this.view(record.id, record.controller.snapshot()));
    }

    const segments: Array<string | undefined> = pathname.split('/');
    const [, api, resource, id, action, ...extra] = segments;
    if (api !== 'api' || resource !== 'session' || !id || extra.length > 0) {
      return json(404, { error: 'Route not found' });
    }

    if (action === undefined) {
      if (method === 'GET') {
        const record = this.options.sessions.get(id);
        return json(200, this.view(id, record.controller.snapshot()));
      }
      if (method === 'DELETE') {
        this.options.sessions.delete(id);
        return { kind: 'empty', status: 204 };
      }
      return json(404, { error: 'Route not found' });
    }

    if (method === 'GET' && action === 'export') {
      return this.exportLoader(id);
    }
    if (method === 'POST') {
      return this.runAction(id, action, body);
    }
    return json(404, { error: 'Route not found' });
  }

  private async runAction(id: string, action: string, body: unknown): Promise<ApiResponse> {
    switch (action) {
      case 'sport': {
        const { sport } = parseBody(sportBodySchema, body);
        const controller = this.options.sessions.get(id).controller;
        return json(200, this.view(id, controller.selectSport(sport)));
      }
      case 'filter': {
        const { rowIds, confirm } = parseBody(filterBodySchema, body);
        const controller = this.options.sessions.get(id).controller;
        const snapshot = confirm
          ? await controller.confirmFilterSelection(rowIds)
          : controller.selectFilterRows(rowIds);
        return json(200, this.view(id, snapshot));
      }
      case 'extraction': {
        const { oddsType, dropNaThreshold } = parseBody(extractionBodySchema, body);
        const controller = this.options.sessions.get(id).controller;
        return json(200, this.view(id, controller.setExtractionConfig(oddsType, dropNaThreshold)));
      }
      case 'advance': {
        const controller = this.options.sessions.get(id).controller;
        return json(200, this.view(id, await controller.advance()));
      }
      case 'rewind': {
        const { stage } = parseBody(rewindBodySchema, body);
        const controller = this.options.sessions.get(id).controller;
        return json(200, this.view(id, controller.rewind(stage)));
      }
      case 'reset': {
        const controller = this.options.sessions.get(id).controller;
        return json(200, this.view(id, controller.reset()));
      }
      default:
        return json(404, { error: 'Route not found' });
    }
  }

  private async exportLoader(id: string): Promise<ApiResponse> {
    const controller = this.options.sessions.get(id).controller;
    const archive = await controller.exportLoader();
    if (!archive) {
      return json(409, { error: 'Export was cancelled by a reset.' });
    }
    return { kind: 'binary', status: 200, archive };
  }

  private async updateSettings(body: unknown): Promise<ApiResponse> {
    const next = parseBody(settingsSchema, body);
    const saved = await this.options.settingsStore.save(next);
    this.currentSettings = saved;
    this.options.onSettingsChanged?.(saved);
    this.logger.info('Settings updated');
    return json(200, saved);
  }

  private view(id: string, snapshot: WizardSnapshot): SessionView {
    return sessionView(id, snapshot, this.currentSettings.maxPreviewRows);
  }
}
