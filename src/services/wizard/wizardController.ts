import { SUPPORTED_SPORTS } from '../../domain/contracts';
import type {
  ControlId,
  ControlStates,
  DataLoaderService,
  FilterRow,
  LoaderArchive,
  LoaderHandle,
  Stage,
  TableSet,
  WizardEvents,
  WizardSnapshot,
} from '../../domain/contracts';
import { InvalidConfigurationError, NoSelectionError, NotYetSupportedError, WizardError } from '../../domain/errors';
import { parseFixtureTables, parseOddsTypes, parseParamRecords, parseTrainTables, sportSchema } from '../../domain/schemas';
import { type Logger, silentLogger } from '../logging/logger';
import type { IoPool } from '../pool/ioPool';
import { FetchCoordinator } from './fetchCoordinator';
import { assignRowIds, buildOddsTypeOptions, buildParamGrid, deriveFilterColumns } from './filterTable';
import { type BusEvent, NotificationBus, type Unsubscribe } from './notificationBus';
import { PipelineStateStore } from './pipelineStateStore';
import { getStageDefinition, isBefore } from './stageRegistry';

export interface WizardControllerConfig {
  loaderService: DataLoaderService;
  pool: IoPool;
  fetchTimeoutMs?: number;
  defaultDropNaThreshold?: number;
  logger?: Logger;
}

const CONTROL_TOPICS: { [K in ControlId]: `control:${K}` } = {
  sport: 'control:sport',
  filter: 'control:filter',
  extraction: 'control:extraction',
  advance: 'control:advance',
  export: 'control:export',
  cancel: 'control:cancel',
};

const CONTROL_IDS: readonly ControlId[] = ['sport', 'filter', 'extraction', 'advance', 'export', 'cancel'];

interface MaterializedTables {
  train: TableSet;
  fixtures: TableSet;
}

/**
 * Drives the five-stage extraction wizard for one client session.
 *
 * Inbound calls are the user's actions. Each transition checks its input,
 * hands the slow collaborator call to the fetch coordinator and, when the
 * result is still current, writes the stage outputs and moves the cursor in
 * a single bus batch.
 */
export class WizardController {
  readonly bus: NotificationBus<WizardEvents>;
  private readonly store: PipelineStateStore;
  private readonly coordinator: FetchCoordinator;
  private readonly logger: Logger;
  private readonly defaultDropNaThreshold: number;
  private cursor: Stage = 'SportSelect';
  private exported = 0;
  private filterDraft: FilterRow[] = [];
  private controls: ControlStates;

  constructor(private readonly config: WizardControllerConfig) {
    this.logger = config.logger ?? silentLogger;
    this.defaultDropNaThreshold = config.defaultDropNaThreshold ?? 0;
    this.bus = new NotificationBus<WizardEvents>(this.logger.child('bus'));
    this.store = new PipelineStateStore(this.bus, this.logger.child('store'));
    this.coordinator = new FetchCoordinator({
      bus: this.bus,
      pool: config.pool,
      timeoutMs: config.fetchTimeoutMs,
      logger: this.logger.child('fetch'),
    });

    this.bus.subscribe('stage:invalidated', (stage) => {
      if (stage === 'FilterSelect') {
        this.filterDraft = [];
      }
    });
    this.bus.subscribe('fetch:pending', () => this.publishControls());
    this.bus.subscribe('fetch:settled', () => this.publishControls());

    this.controls = this.computeControls();
  }

  subscribe<K extends keyof WizardEvents>(topic: K, listener: (payload: WizardEvents[K]) => void): Unsubscribe {
    return this.bus.subscribe(topic, listener);
  }

  subscribeAll(listener: (event: BusEvent<WizardEvents>) => void): Unsubscribe {
    return this.bus.subscribeAll(listener);
  }

  snapshot(): WizardSnapshot {
    const oddsTypes = this.store.get('availableOddsTypes');
    return {
      cursor: this.cursor,
      exported: this.exported,
      pendingStage: this.coordinator.pendingStage(),
      state: this.store.snapshot(),
      controls: { ...this.controls },
      oddsTypeOptions: oddsTypes ? buildOddsTypeOptions(oddsTypes) : [],
    };
  }

  selectSport(value: string): WizardSnapshot {
    return this.guard(() => {
      if (!this.controls.sport.enabled) {
        this.logger.debug(`Ignored sport selection "${value}" while the sport control is disabled`);
        return this.snapshot();
      }
      const parsed = sportSchema.safeParse(value);
      if (!parsed.success) {
        throw new InvalidConfigurationError(`Unknown sport "${value}".`);
      }
      this.store.set('selectedSport', parsed.data);
      this.publishControls();
      return this.snapshot();
    });
  }

  selectFilterRows(rowIds: number[]): WizardSnapshot {
    return this.guard(() => {
      if (!this.controls.filter.enabled) {
        this.logger.debug('Ignored filter selection while the filter control is disabled');
        return this.snapshot();
      }
      this.filterDraft = this.resolveRows(rowIds);
      return this.snapshot();
    });
  }

  async confirmFilterSelection(rowIds: number[]): Promise<WizardSnapshot> {
    return this.guardAsync(async () => {
      if (this.cursor !== 'FilterSelect') {
        this.logger.debug(`Ignored filter confirmation at ${this.cursor}`);
        return this.snapshot();
      }
      const rows = this.resolveRows(rowIds);
      if (!this.coordinator.isPending('FilterSelect')) {
        this.filterDraft = rows;
      }
      await this.completeFilter(rows);
      return this.snapshot();
    });
  }

  setExtractionConfig(oddsType: string | null, dropNaThreshold: number): WizardSnapshot {
    return this.guard(() => {
      if (!this.controls.extraction.enabled) {
        this.logger.debug('Ignored extraction settings while the extraction control is disabled');
        return this.snapshot();
      }
      if (!Number.isFinite(dropNaThreshold) || dropNaThreshold < 0 || dropNaThreshold > 1) {
        throw new InvalidConfigurationError('Drop NA threshold must be a number between 0 and 1.');
      }
      const available = this.store.get('availableOddsTypes') ?? [];
      if (oddsType !== null && !available.includes(oddsType)) {
        throw new InvalidConfigurationError(`Odds type "${oddsType}" is not available.`);
      }

      this.bus.batch(() => {
        this.store.set('oddsType', oddsType);
        this.store.set('dropNaThreshold', dropNaThreshold);
      });
      return this.snapshot();
    });
  }

  async advance(): Promise<WizardSnapshot> {
    return this.guardAsync(async () => {
      switch (this.cursor) {
        case 'SportSelect':
          await this.completeSport();
          break;
        case 'FilterSelect':
          await this.completeFilter(this.filterDraft);
          break;
        case 'ExtractionConfig':
          await this.completeExtraction();
          break;
        case 'DataMaterialize':
          this.revealExport();
          break;
        case 'Export':
          this.logger.debug('Advance ignored at Export');
          break;
      }
      return this.snapshot();
    });
  }

  rewind(stage: Stage): WizardSnapshot {
    return this.guard(() => {
      if (!isBefore(stage, this.cursor)) {
        throw new InvalidConfigurationError(`Cannot rewind from ${this.cursor} to ${stage}.`);
      }
      this.bus.batch(() => {
        this.store.invalidateFrom(stage);
        this.moveCursor(stage);
      });
      this.publishControls();
      return this.snapshot();
    });
  }

  reset(): WizardSnapshot {
    this.bus.batch(() => {
      this.store.reset();
      this.filterDraft = [];
      this.exported = 0;
      this.moveCursor('SportSelect');
    });
    this.publishControls();
    this.logger.info('Session reset');
    return this.snapshot();
  }

  /**
   * Serializes the loader configuration (sport and filter grid). Resolves to
   * `null` when a reset lands while the archive is being produced.
   */
  async exportLoader(): Promise<LoaderArchive | null> {
    return this.guardAsync(async () => {
      const loader = this.store.get('loader');
      if (this.cursor !== 'Export' || !loader) {
        throw new InvalidConfigurationError('Export is available once the data has been extracted.');
      }

      const outcome = await this.coordinator.run(
        'Export',
        () => this.config.loaderService.serializeLoader(loader),
        () => {
          this.exported += 1;
        },
      );
      this.publishControls();
      return outcome.status === 'committed' ? outcome.value : null;
    });
  }

  private async completeSport(): Promise<void> {
    const sport = this.store.get('selectedSport');
    if (sport === undefined) {
      throw new NoSelectionError('Please select a sport to proceed.');
    }
    if (!SUPPORTED_SPORTS.includes(sport)) {
      throw new NotYetSupportedError(`${SUPPORTED_SPORTS.join(', ')} is the only currently available sport.`);
    }

    const outcome = await this.coordinator.run(
      'SportSelect',
      async () => parseParamRecords(await this.config.loaderService.getAllParams(sport)),
      (params) =>
        this.bus.batch(() => {
          this.store.invalidateFrom('FilterSelect');
          this.store.set('availableParams', assignRowIds(params));
          this.store.set('filterColumns', deriveFilterColumns(params));
          this.moveCursor('FilterSelect');
        }),
    );
    if (outcome.status === 'committed') {
      this.logger.info(`Loaded ${outcome.value.length} parameter set(s) for ${sport}`);
    }
  }

  private async completeFilter(rows: FilterRow[]): Promise<void> {
    const sport = this.store.get('selectedSport');
    if (rows.length === 0 || sport === undefined) {
      throw new NoSelectionError('Please select at least one row of filter table.');
    }

    const loader: LoaderHandle = { sport, paramGrid: buildParamGrid(rows) };
    const outcome = await this.coordinator.run(
      'FilterSelect',
      async () => parseOddsTypes(await this.config.loaderService.getOddsTypes(loader)),
      (oddsTypes) =>
        this.bus.batch(() => {
          this.store.invalidateFrom('ExtractionConfig');
          this.store.set('selectedParamRows', rows);
          this.store.set('loader', loader);
          this.store.set('availableOddsTypes', oddsTypes);
          this.moveCursor('ExtractionConfig');
        }),
    );
    if (outcome.status === 'committed') {
      this.logger.info(`Created loader from ${rows.length} filter row(s)`);
    }
  }

  private async completeExtraction(): Promise<void> {
    const loader = this.store.get('loader');
    const oddsTypes = this.store.get('availableOddsTypes') ?? [];
    if (!loader) {
      throw new NoSelectionError('Please select at least one row of filter table.');
    }

    const chosen = this.store.get('oddsType');
    const oddsType = chosen === undefined ? (oddsTypes[0] ?? null) : chosen;
    const dropNaThreshold = this.store.get('dropNaThreshold') ?? this.defaultDropNaThreshold;
    const service = this.config.loaderService;

    const outcome = await this.coordinator.run(
      'ExtractionConfig',
      async (): Promise<MaterializedTables> => {
        const train = parseTrainTables(await service.extractTrainData(loader, oddsType, dropNaThreshold));
        const fixtures = parseFixtureTables(await service.extractFixturesData(loader));
        return { train, fixtures };
      },
      ({ train, fixtures }) =>
        this.bus.batch(() => {
          this.store.invalidateFrom('DataMaterialize');
          this.store.set('oddsType', oddsType);
          this.store.set('dropNaThreshold', dropNaThreshold);
          this.store.set('trainTables', train);
          this.store.set('fixtureTables', fixtures);
          this.moveCursor('DataMaterialize');
        }),
    );
    if (outcome.status === 'committed') {
      this.logger.info(`Extracted training and fixtures data (odds type: ${oddsType ?? 'none'})`);
    }
  }

  private revealExport(): void {
    this.bus.batch(() => this.moveCursor('Export'));
    this.publishControls();
  }

  private resolveRows(rowIds: number[]): FilterRow[] {
    const available = this.store.get('availableParams') ?? [];
    const byId = new Map(available.map((row) => [row.id, row]));
    const rows: FilterRow[] = [];
    for (const id of new Set(rowIds)) {
      const row = byId.get(id);
      if (!row) {
        throw new InvalidConfigurationError(`Filter row ${id} does not exist.`);
      }
      rows.push(row);
    }
    return rows;
  }

  private moveCursor(stage: Stage): void {
    if (!getStageDefinition(stage).canEnter(this.store.snapshot())) {
      throw new Error(`Stage ${stage} entered without its inputs.`);
    }
    if (this.cursor === stage) {
      return;
    }
    this.cursor = stage;
    this.bus.publish('cursor', stage);
  }

  private computeControls(): ControlStates {
    const busy = this.coordinator.pendingStage() !== null;
    const initial =
      this.cursor === 'SportSelect' && this.store.isEmpty() && this.exported === 0 && !busy;

    return {
      sport: { visible: true, enabled: this.cursor === 'SportSelect' && !busy },
      filter: { visible: this.store.has('availableParams'), enabled: this.cursor === 'FilterSelect' && !busy },
      extraction: {
        visible: this.store.has('availableOddsTypes'),
        enabled: this.cursor === 'ExtractionConfig' && !busy,
      },
      advance: { visible: this.cursor !== 'Export', enabled: !busy },
      export: { visible: this.cursor === 'Export', enabled: !busy },
      cancel: { visible: true, enabled: !initial },
    };
  }

  private publishControls(): void {
    const next = this.computeControls();
    const previous = this.controls;
    this.controls = next;
    for (const id of CONTROL_IDS) {
      if (previous[id].visible !== next[id].visible || previous[id].enabled !== next[id].enabled) {
        this.bus.publish(CONTROL_TOPICS[id], next[id]);
      }
    }
  }

  private guard<T>(action: () => T): T {
    try {
      return action();
    } catch (error) {
      this.report(error);
      throw error;
    }
  }

  private async guardAsync<T>(action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      this.report(error);
      throw error;
    }
  }

  private report(error: unknown): void {
    this.publishControls();
    if (error instanceof WizardError) {
      this.logger.warn(error.message);
      this.bus.publish('notice', { code: error.code, message: error.message });
      return;
    }
    this.logger.error('Unexpected wizard failure', error);
  }
}
