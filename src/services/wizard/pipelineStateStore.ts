import type { PipelineField, PipelineState, Stage, WizardEvents } from '../../domain/contracts';
import { type Logger, silentLogger } from '../logging/logger';
import type { NotificationBus } from './notificationBus';
import { getStageDefinition, stagesFrom } from './stageRegistry';

type WizardBus = NotificationBus<WizardEvents>;

/** A field value that is set; `null` stays a legal value (e.g. `oddsType`). */
export type Present<T> = T & ({} | null);

type FieldPublishers = {
  [K in PipelineField]: (bus: WizardBus, value: PipelineState[K] | undefined) => void;
};

const fieldPublishers: FieldPublishers = {
  selectedSport: (bus, value) => bus.publish('field:selectedSport', value),
  availableParams: (bus, value) => bus.publish('field:availableParams', value),
  filterColumns: (bus, value) => bus.publish('field:filterColumns', value),
  selectedParamRows: (bus, value) => bus.publish('field:selectedParamRows', value),
  loader: (bus, value) => bus.publish('field:loader', value),
  availableOddsTypes: (bus, value) => bus.publish('field:availableOddsTypes', value),
  oddsType: (bus, value) => bus.publish('field:oddsType', value),
  dropNaThreshold: (bus, value) => bus.publish('field:dropNaThreshold', value),
  trainTables: (bus, value) => bus.publish('field:trainTables', value),
  fixtureTables: (bus, value) => bus.publish('field:fixtureTables', value),
};

/**
 * Single-session record of everything the wizard has produced so far.
 *
 * `set` never cascades; callers that change an upstream field invalidate the
 * downstream stages themselves. `invalidateFrom` walks stages in ascending
 * order and always announces each stage, even when it held nothing.
 */
export class PipelineStateStore {
  private state: PipelineState = {};

  constructor(
    private readonly bus: WizardBus,
    private readonly logger: Logger = silentLogger,
  ) {}

  get<K extends PipelineField>(field: K): PipelineState[K] | undefined {
    return this.state[field];
  }

  has(field: PipelineField): boolean {
    return this.state[field] !== undefined;
  }

  set<K extends PipelineField>(field: K, value: Present<PipelineState[K]>): void {
    this.state[field] = value;
    fieldPublishers[field](this.bus, value);
  }

  invalidateFrom(stage: Stage): void {
    for (const current of stagesFrom(stage)) {
      const cleared = getStageDefinition(current).owns.filter((field) => this.clear(field));
      if (cleared.length > 0) {
        this.logger.debug(`Invalidated ${current}: ${cleared.join(', ')}`);
      }
      this.bus.publish('stage:invalidated', current);
    }
  }

  reset(): void {
    this.invalidateFrom('SportSelect');
    this.clear('selectedSport');
  }

  snapshot(): PipelineState {
    return { ...this.state };
  }

  isEmpty(): boolean {
    return Object.values(this.state).every((value) => value === undefined);
  }

  private clear(field: PipelineField): boolean {
    if (this.state[field] === undefined) {
      return false;
    }
    delete this.state[field];
    fieldPublishers[field](this.bus, undefined);
    return true;
  }
}
