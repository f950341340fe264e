import type {
  DataLoaderService,
  LoaderArchive,
  LoaderHandle,
  ParamRecord,
  Sport,
  TableSet,
} from '../../../domain/contracts';

export type LoaderMethod = keyof DataLoaderService;

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(reason: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Lets pending microtasks and pool dispatches run. */
export const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

export const sampleTrainTables = (): TableSet => ({
  features: {
    columns: ['league', 'home_team'],
    rows: [{ league: 'England', home_team: 'Arsenal' }],
  },
  targets: {
    columns: ['output__home_win__full_time_goals'],
    rows: [{ output__home_win__full_time_goals: true }],
  },
  odds: {
    columns: ['odds__market_average__home_win__full_time_goals'],
    rows: [{ odds__market_average__home_win__full_time_goals: 1.8 }],
  },
});

export const sampleFixtureTables = (): TableSet => ({
  features: {
    columns: ['league', 'home_team'],
    rows: [{ league: 'England', home_team: 'Chelsea' }],
  },
  targets: null,
  odds: null,
});

/**
 * In-process data loader. Calls return the configured data at once unless
 * their method is held, in which case each call waits until `release` or
 * `fail` is called for it.
 */
export class FakeLoaderService implements DataLoaderService {
  params: ParamRecord[] = [
    { league: 'England', division: 1 },
    { league: 'England', division: 2 },
    { league: 'Spain', division: 1 },
  ];
  oddsTypes: string[] = ['market_average', 'market_maximum'];
  trainTables: TableSet = sampleTrainTables();
  fixtureTables: TableSet = sampleFixtureTables();
  archive: LoaderArchive = {
    fileName: 'dataloader.json',
    contentType: 'application/json',
    data: new TextEncoder().encode('{}'),
  };

  readonly calls: Array<{ method: LoaderMethod; args: unknown[] }> = [];
  private readonly held = new Set<LoaderMethod>();
  private readonly gates = new Map<LoaderMethod, Array<Deferred<void>>>();

  hold(method: LoaderMethod): void {
    this.held.add(method);
  }

  resume(method: LoaderMethod): void {
    this.held.delete(method);
  }

  waiting(method: LoaderMethod): number {
    return this.gates.get(method)?.length ?? 0;
  }

  release(method: LoaderMethod): void {
    this.nextGate(method).resolve();
  }

  fail(method: LoaderMethod, error: Error): void {
    this.nextGate(method).reject(error);
  }

  callsOf(method: LoaderMethod): unknown[][] {
    return this.calls.filter((call) => call.method === method).map((call) => call.args);
  }

  async getAllParams(sport: Sport): Promise<ParamRecord[]> {
    const params = this.params;
    await this.pass('getAllParams', [sport]);
    return params;
  }

  async getOddsTypes(loader: LoaderHandle): Promise<string[]> {
    const oddsTypes = this.oddsTypes;
    await this.pass('getOddsTypes', [loader]);
    return oddsTypes;
  }

  async extractTrainData(loader: LoaderHandle, oddsType: string | null, dropNaThreshold: number): Promise<TableSet> {
    const tables = this.trainTables;
    await this.pass('extractTrainData', [loader, oddsType, dropNaThreshold]);
    return tables;
  }

  async extractFixturesData(loader: LoaderHandle): Promise<TableSet> {
    const tables = this.fixtureTables;
    await this.pass('extractFixturesData', [loader]);
    return tables;
  }

  async serializeLoader(loader: LoaderHandle): Promise<LoaderArchive> {
    const archive = this.archive;
    await this.pass('serializeLoader', [loader]);
    return archive;
  }

  private async pass(method: LoaderMethod, args: unknown[]): Promise<void> {
    this.calls.push({ method, args });
    if (!this.held.has(method)) {
      return;
    }
    const gate = deferred<void>();
    this.gates.set(method, [...(this.gates.get(method) ?? []), gate]);
    await gate.promise;
  }

  private nextGate(method: LoaderMethod): Deferred<void> {
    const [gate, ...rest] = this.gates.get(method) ?? [];
    if (!gate) {
      throw new Error(`No ${method} call is waiting`);
    }
    this.gates.set(method, rest);
    return gate;
  }
}
