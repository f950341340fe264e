import { describe, expect, test } from 'vitest';
import type { ControlState, WizardNotice } from '../../../domain/contracts';
import {
  FetchFailedError,
  FetchInProgressError,
  FetchTimeoutError,
  InvalidConfigurationError,
  NoSelectionError,
  NotYetSupportedError,
} from '../../../domain/errors';
import { IoPool } from '../../pool/ioPool';
import { WizardController } from '../wizardController';
import { FakeLoaderService, flush, sampleFixtureTables, sampleTrainTables } from './fakeLoaderService';

function setup(options?: { fetchTimeoutMs?: number; defaultDropNaThreshold?: number }) {
  const loader = new FakeLoaderService();
  const controller = new WizardController({
    loaderService: loader,
    pool: new IoPool(4),
    ...options,
  });
  return { loader, controller };
}

async function toExtraction(controller: WizardController) {
  controller.selectSport('Soccer');
  await controller.advance();
  return controller.confirmFilterSelection([1, 3]);
}

async function toExport(controller: WizardController) {
  await toExtraction(controller);
  await controller.advance();
  return controller.advance();
}

function collectNotices(controller: WizardController): WizardNotice[] {
  const notices: WizardNotice[] = [];
  controller.subscribe('notice', (notice) => notices.push(notice));
  return notices;
}

const STAGE_TOPICS = new Set(['stage:invalidated', 'cursor', 'fetch:pending', 'fetch:settled']);

/** Topic names in delivery order; stage-valued topics carry their stage. */
function recordOrder(controller: WizardController): string[] {
  const order: string[] = [];
  controller.subscribeAll((event) => {
    order.push(STAGE_TOPICS.has(event.topic) ? `${event.topic}:${String(event.payload)}` : event.topic);
  });
  return order;
}

// ── Sport selection ─────────────────────────────────────────────

describe('sport selection', () => {
  test('builds filter rows with dense ids from the fetched parameters', async () => {
    const { loader, controller } = setup();
    loader.params = [{ league: 'E0' }, { league: 'E1' }];

    controller.selectSport('Soccer');
    const snapshot = await controller.advance();

    expect(snapshot.cursor).toBe('FilterSelect');
    expect(snapshot.state.availableParams).toEqual([
      { id: 1, league: 'E0' },
      { id: 2, league: 'E1' },
    ]);
    expect(snapshot.state.filterColumns).toEqual([
      { name: 'id', label: 'ID', field: 'id', required: true, sortable: false, hidden: true },
      { name: 'league', label: 'League', field: 'league', required: false, sortable: true, hidden: false },
    ]);
    expect(loader.callsOf('getAllParams')).toEqual([['Soccer']]);
  });

  test('rejects a recognised but unsupported sport without touching state', async () => {
    const { loader, controller } = setup();
    const notices = collectNotices(controller);

    controller.selectSport('NBA');
    const before = controller.snapshot().state;

    await expect(controller.advance()).rejects.toBeInstanceOf(NotYetSupportedError);

    const after = controller.snapshot();
    expect(after.cursor).toBe('SportSelect');
    expect(after.state).toEqual(before);
    expect(loader.calls).toHaveLength(0);
    expect(notices).toEqual([
      { code: 'NOT_YET_SUPPORTED', message: 'Soccer is the only currently available sport.' },
    ]);
  });

  test('asks for a sport when none was chosen', async () => {
    const { controller } = setup();

    await expect(controller.advance()).rejects.toThrow('Please select a sport to proceed.');
    await expect(controller.advance()).rejects.toBeInstanceOf(NoSelectionError);
  });

  test('refuses unknown sport names at input time', () => {
    const { controller } = setup();

    expect(() => controller.selectSport('Cricket')).toThrow(InvalidConfigurationError);
    expect(controller.snapshot().state).toEqual({});
  });

  test('ignores sport changes once the sport stage is done', async () => {
    const { controller } = setup();
    controller.selectSport('Soccer');
    await controller.advance();

    const snapshot = controller.selectSport('NFL');

    expect(snapshot.state.selectedSport).toBe('Soccer');
  });
});

// ── Filter selection ────────────────────────────────────────────

describe('filter selection', () => {
  test('creates the loader from the selected rows in selection order', async () => {
    const { loader, controller } = setup();

    const snapshot = await toExtraction(controller);

    const expectedLoader = {
      sport: 'Soccer',
      paramGrid: [
        { league: ['England'], division: [1] },
        { league: ['Spain'], division: [1] },
      ],
    };
    expect(snapshot.cursor).toBe('ExtractionConfig');
    expect(snapshot.state.loader).toEqual(expectedLoader);
    expect(snapshot.state.selectedParamRows).toEqual([
      { id: 1, league: 'England', division: 1 },
      { id: 3, league: 'Spain', division: 1 },
    ]);
    expect(snapshot.state.availableOddsTypes).toEqual(['market_average', 'market_maximum']);
    expect(snapshot.oddsTypeOptions).toEqual([
      { value: 'market_average', label: 'Market Average' },
      { value: 'market_maximum', label: 'Market Maximum' },
      { value: null, label: 'No Odds' },
    ]);
    expect(loader.callsOf('getOddsTypes')).toEqual([[expectedLoader]]);
  });

  test('an empty selection raises NoSelection and builds no loader', async () => {
    const { loader, controller } = setup();
    controller.selectSport('Soccer');
    await controller.advance();

    await expect(controller.confirmFilterSelection([])).rejects.toThrow(
      'Please select at least one row of filter table.',
    );
    await expect(controller.advance()).rejects.toBeInstanceOf(NoSelectionError);

    const snapshot = controller.snapshot();
    expect(snapshot.cursor).toBe('FilterSelect');
    expect(snapshot.state.loader).toBeUndefined();
    expect(loader.callsOf('getOddsTypes')).toHaveLength(0);
  });

  test('drops duplicate row ids and rejects unknown ones', async () => {
    const { controller } = setup();
    controller.selectSport('Soccer');
    await controller.advance();

    await expect(controller.confirmFilterSelection([9])).rejects.toThrow('Filter row 9 does not exist.');

    const snapshot = await controller.confirmFilterSelection([3, 1, 3]);
    expect(snapshot.state.selectedParamRows?.map((row) => row.id)).toEqual([3, 1]);
  });

  test('advance uses the drafted row selection', async () => {
    const { controller } = setup();
    controller.selectSport('Soccer');
    await controller.advance();

    controller.selectFilterRows([2]);
    const snapshot = await controller.advance();

    expect(snapshot.state.loader?.paramGrid).toEqual([{ league: ['England'], division: [2] }]);
  });
});

// ── Extraction ──────────────────────────────────────────────────

describe('extraction', () => {
  test('the No Odds choice reaches the loader as null', async () => {
    const { loader, controller } = setup();
    const atExtraction = await toExtraction(controller);

    controller.setExtractionConfig(null, 0.5);
    const snapshot = await controller.advance();

    expect(loader.callsOf('extractTrainData')).toEqual([[atExtraction.state.loader, null, 0.5]]);
    expect(snapshot.cursor).toBe('DataMaterialize');
    expect(snapshot.state.oddsType).toBeNull();
    expect(snapshot.state.dropNaThreshold).toBe(0.5);
    expect(snapshot.state.trainTables).toEqual(sampleTrainTables());
    expect(snapshot.state.fixtureTables).toEqual(sampleFixtureTables());
  });

  test('defaults to the first odds type and the configured threshold', async () => {
    const { loader, controller } = setup({ defaultDropNaThreshold: 0.25 });
    await toExtraction(controller);

    await controller.advance();

    const [[, oddsType, threshold]] = loader.callsOf('extractTrainData');
    expect(oddsType).toBe('market_average');
    expect(threshold).toBe(0.25);
  });

  test('validates the extraction settings when they are entered', async () => {
    const { loader, controller } = setup();
    await toExtraction(controller);

    expect(() => controller.setExtractionConfig('market_average', 1.5)).toThrow(
      'Drop NA threshold must be a number between 0 and 1.',
    );
    expect(() => controller.setExtractionConfig('market_average', Number.NaN)).toThrow(InvalidConfigurationError);
    expect(() => controller.setExtractionConfig('closing', 0.2)).toThrow('Odds type "closing" is not available.');
    expect(controller.snapshot().state.dropNaThreshold).toBeUndefined();
    expect(loader.callsOf('extractTrainData')).toHaveLength(0);
  });

  test('ignores extraction settings before the extraction stage', () => {
    const { controller } = setup();

    const snapshot = controller.setExtractionConfig(null, 0.3);

    expect(snapshot.state).toEqual({});
  });
});

// ── Export and reset ────────────────────────────────────────────

describe('export and reset', () => {
  test('walks to Export, exports, then reset restores the empty state', async () => {
    const { loader, controller } = setup();

    const atExport = await toExport(controller);
    expect(atExport.cursor).toBe('Export');
    expect(atExport.controls.export).toEqual({ visible: true, enabled: true });
    expect(atExport.controls.advance.visible).toBe(false);

    const archive = await controller.exportLoader();
    expect(archive?.fileName).toBe('dataloader.json');
    expect(controller.snapshot().exported).toBe(1);
    expect(controller.snapshot().state.trainTables).toEqual(sampleTrainTables());

    const cleared = controller.reset();
    expect(cleared.state).toEqual({});
    expect(cleared.cursor).toBe('SportSelect');
    expect(cleared.exported).toBe(0);
    expect(cleared.controls.cancel).toEqual({ visible: true, enabled: false });

    controller.selectSport('Soccer');
    await controller.advance();
    expect(loader.callsOf('getAllParams')).toHaveLength(2);
  });

  test('reset after any number of completed stages gives the empty state', async () => {
    for (let steps = 0; steps <= 4; steps += 1) {
      const { controller } = setup();
      controller.selectSport('Soccer');
      for (let step = 0; step < steps; step += 1) {
        if (controller.snapshot().cursor === 'FilterSelect') {
          await controller.confirmFilterSelection([1]);
        } else {
          await controller.advance();
        }
      }

      expect(controller.reset().state).toEqual({});
    }
  });

  test('advance at Export changes nothing', async () => {
    const { controller } = setup();
    const atExport = await toExport(controller);

    const again = await controller.advance();

    expect(again).toEqual(atExport);
  });

  test('export is refused before the Export stage', async () => {
    const { controller } = setup();
    await toExtraction(controller);

    await expect(controller.exportLoader()).rejects.toBeInstanceOf(InvalidConfigurationError);
  });

  test('an export overtaken by reset resolves to null', async () => {
    const { loader, controller } = setup();
    await toExport(controller);
    loader.hold('serializeLoader');

    const pending = controller.exportLoader();
    await flush();
    controller.reset();
    loader.release('serializeLoader');

    await expect(pending).resolves.toBeNull();
    expect(controller.snapshot().exported).toBe(0);
  });

  test('only one export runs at a time', async () => {
    const { loader, controller } = setup();
    await toExport(controller);
    loader.hold('serializeLoader');

    const first = controller.exportLoader();
    await flush();
    expect(controller.snapshot().controls.export).toEqual({ visible: true, enabled: false });
    await expect(controller.exportLoader()).rejects.toBeInstanceOf(FetchInProgressError);

    loader.release('serializeLoader');
    await first;
    expect(controller.snapshot().exported).toBe(1);
    expect(loader.callsOf('serializeLoader')).toHaveLength(1);
  });
});

// ── Rewind ──────────────────────────────────────────────────────

describe('rewind', () => {
  test('clears the target stage and everything after it', async () => {
    const { controller } = setup();
    await toExtraction(controller);
    await controller.advance();

    const snapshot = controller.rewind('FilterSelect');

    expect(snapshot.cursor).toBe('FilterSelect');
    expect(Object.keys(snapshot.state).sort()).toEqual(['availableParams', 'filterColumns', 'selectedSport']);
  });

  test('refuses to rewind forwards', async () => {
    const { controller } = setup();
    controller.selectSport('Soccer');
    await controller.advance();

    expect(() => controller.rewind('Export')).toThrow('Cannot rewind from FilterSelect to Export.');
    expect(() => controller.rewind('FilterSelect')).toThrow(InvalidConfigurationError);
  });
});

// ── Fetch coordination ──────────────────────────────────────────

describe('fetch coordination', () => {
  test('a second trigger while a fetch is pending is rejected', async () => {
    const { loader, controller } = setup();
    loader.hold('getAllParams');
    controller.selectSport('Soccer');

    const first = controller.advance();
    await flush();
    const pending = controller.snapshot();
    expect(pending.pendingStage).toBe('SportSelect');
    expect(pending.controls.sport.enabled).toBe(false);
    expect(pending.controls.advance.enabled).toBe(false);

    await expect(controller.advance()).rejects.toBeInstanceOf(FetchInProgressError);

    loader.release('getAllParams');
    const done = await first;
    expect(done.cursor).toBe('FilterSelect');
    expect(done.pendingStage).toBeNull();
    expect(loader.callsOf('getAllParams')).toHaveLength(1);
  });

  test('a result landing after reset is discarded and a fresh fetch wins', async () => {
    const { loader, controller } = setup();
    loader.hold('getAllParams');
    loader.params = [{ league: 'Old' }];
    controller.selectSport('Soccer');
    const stale = controller.advance();
    await flush();

    controller.reset();
    expect(controller.snapshot().pendingStage).toBeNull();

    loader.params = [{ league: 'New' }];
    controller.selectSport('Soccer');
    const fresh = controller.advance();
    await flush();
    expect(loader.waiting('getAllParams')).toBe(2);

    loader.release('getAllParams');
    await stale;
    expect(controller.snapshot().state.availableParams).toBeUndefined();
    expect(controller.snapshot().pendingStage).toBe('SportSelect');

    loader.release('getAllParams');
    const snapshot = await fresh;
    expect(snapshot.state.availableParams).toEqual([{ id: 1, league: 'New' }]);
  });

  test('a failed fetch leaves the stage as it was and can be retried', async () => {
    const { loader, controller } = setup();
    const notices = collectNotices(controller);
    loader.hold('getAllParams');
    controller.selectSport('Soccer');

    const attempt = controller.advance();
    await flush();
    loader.fail('getAllParams', new Error('service down'));

    const error = await attempt.then(
      () => null,
      (reason: unknown) => reason,
    );
    expect(error).toBeInstanceOf(FetchFailedError);
    expect(error instanceof FetchFailedError && error.stage).toBe('SportSelect');
    expect(error instanceof Error && error.message).toBe('Fetch for SportSelect failed: service down');
    expect(controller.snapshot().state).toEqual({ selectedSport: 'Soccer' });
    expect(controller.snapshot().pendingStage).toBeNull();
    expect(notices.map((notice) => notice.code)).toEqual(['FETCH_FAILED']);

    loader.resume('getAllParams');
    const retried = await controller.advance();
    expect(retried.cursor).toBe('FilterSelect');
  });

  test('a slow fetch fails with a timeout when one is configured', async () => {
    const { loader, controller } = setup({ fetchTimeoutMs: 20 });
    loader.hold('getAllParams');
    controller.selectSport('Soccer');

    const error = await controller.advance().then(
      () => null,
      (reason: unknown) => reason,
    );

    expect(error).toBeInstanceOf(FetchFailedError);
    expect(error instanceof FetchFailedError && error.cause).toBeInstanceOf(FetchTimeoutError);
    expect(controller.snapshot().cursor).toBe('SportSelect');
    expect(controller.snapshot().pendingStage).toBe('SportSelect');
    await expect(controller.advance()).rejects.toBeInstanceOf(FetchInProgressError);
    expect(loader.callsOf('getAllParams')).toHaveLength(1);

    loader.release('getAllParams');
    await flush();

    const settled = controller.snapshot();
    expect(settled.pendingStage).toBeNull();
    expect(settled.controls.advance.enabled).toBe(true);
    expect(settled.state.availableParams).toBeUndefined();
  });

  test('loader output that fails validation is reported as a failed fetch', async () => {
    const { loader, controller } = setup();
    loader.oddsTypes = [''];
    controller.selectSport('Soccer');
    await controller.advance();

    await expect(controller.confirmFilterSelection([1])).rejects.toBeInstanceOf(FetchFailedError);
    expect(controller.snapshot().state.loader).toBeUndefined();
  });
});

// ── Notifications ───────────────────────────────────────────────

describe('notifications', () => {
  test('the stage output is complete when the cursor event fires', async () => {
    const { controller } = setup();
    const seen: Array<boolean> = [];
    controller.subscribe('cursor', () => {
      const state = controller.snapshot().state;
      seen.push(state.availableParams !== undefined && state.filterColumns !== undefined);
    });

    controller.selectSport('Soccer');
    await controller.advance();

    expect(seen).toEqual([true]);
  });

  test('control events are published only when a control changes', async () => {
    const { controller } = setup();
    const advanceEvents: ControlState[] = [];
    const cancelEvents: ControlState[] = [];
    controller.subscribe('control:advance', (state) => advanceEvents.push(state));
    controller.subscribe('control:cancel', (state) => cancelEvents.push(state));

    controller.selectSport('Soccer');
    await controller.advance();

    expect(advanceEvents).toEqual([
      { visible: true, enabled: false },
      { visible: true, enabled: true },
    ]);
    expect(cancelEvents).toEqual([{ visible: true, enabled: true }]);
  });

  test('reset during a pending fetch announces invalidations and the cursor before re-enabling controls', async () => {
    const { loader, controller } = setup();
    controller.selectSport('Soccer');
    await controller.advance();
    loader.hold('getOddsTypes');
    const pending = controller.confirmFilterSelection([1]);
    await flush();
    const order = recordOrder(controller);

    controller.reset();

    expect(order).toEqual([
      'field:availableParams',
      'field:filterColumns',
      'stage:invalidated:SportSelect',
      'stage:invalidated:FilterSelect',
      'stage:invalidated:ExtractionConfig',
      'stage:invalidated:DataMaterialize',
      'stage:invalidated:Export',
      'field:selectedSport',
      'cursor:SportSelect',
      'fetch:settled:FilterSelect',
      'control:sport',
      'control:filter',
      'control:advance',
      'control:export',
      'control:cancel',
    ]);

    loader.release('getOddsTypes');
    await pending;
    expect(controller.snapshot().state).toEqual({});
  });

  test('rewind during a pending fetch announces invalidations and the cursor before re-enabling controls', async () => {
    const { loader, controller } = setup();
    controller.selectSport('Soccer');
    await controller.advance();
    loader.hold('getOddsTypes');
    const pending = controller.confirmFilterSelection([1]);
    await flush();
    const order = recordOrder(controller);

    controller.rewind('SportSelect');

    expect(order).toEqual([
      'field:availableParams',
      'field:filterColumns',
      'stage:invalidated:SportSelect',
      'stage:invalidated:FilterSelect',
      'stage:invalidated:ExtractionConfig',
      'stage:invalidated:DataMaterialize',
      'stage:invalidated:Export',
      'cursor:SportSelect',
      'fetch:settled:FilterSelect',
      'control:sport',
      'control:filter',
      'control:advance',
      'control:export',
    ]);

    loader.release('getOddsTypes');
    await pending;
    expect(controller.snapshot().state).toEqual({ selectedSport: 'Soccer' });
  });

  test('invalidation events arrive in stage order', async () => {
    const { controller } = setup();
    await toExtraction(controller);
    const invalidated: string[] = [];
    controller.subscribe('stage:invalidated', (stage) => invalidated.push(stage));

    controller.rewind('FilterSelect');

    expect(invalidated).toEqual(['FilterSelect', 'ExtractionConfig', 'DataMaterialize', 'Export']);
  });
});
