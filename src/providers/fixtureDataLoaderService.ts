import { promises as fs } from 'fs';
import * as path from 'path';
import { setTimeout as delay } from 'timers/promises';
import { z } from 'zod';
import type {
  DataLoaderService,
  DataTable,
  LoaderArchive,
  LoaderHandle,
  ParamGrid,
  ParamRecord,
  Scalar,
  Sport,
  TableSet,
} from '../domain/contracts';
import { dataTableSchema, paramRecordListSchema, trainTableSetSchema } from '../domain/schemas';

export interface FixtureDataLoaderServiceOptions {
  rootDir?: string;
  /** Artificial delay added to every call, to mimic a slow loader. */
  latencyMs?: number;
}

const fixtureSetSchema = z.object({
  features: dataTableSchema,
  odds: dataTableSchema.nullable(),
});

type TrainFixture = z.infer<typeof trainTableSetSchema>;

const ODDS_PREFIX = 'odds__';

/**
 * Serves the data-loader contract from JSON files laid out as
 * `<rootDir>/<sport>/{params,train,fixtures}.json`.
 */
export class FixtureDataLoaderService implements DataLoaderService {
  private readonly rootDir: string;
  private readonly latencyMs: number;
  private readonly trainOddsTypes = new WeakMap<LoaderHandle, string | null>();

  constructor(options?: FixtureDataLoaderServiceOptions) {
    this.rootDir = options?.rootDir ?? path.join(process.cwd(), 'fixtures');
    this.latencyMs = options?.latencyMs ?? 0;
  }

  async getAllParams(sport: Sport): Promise<ParamRecord[]> {
    return paramRecordListSchema.parse(await this.readFixture(sport, 'params.json'));
  }

  async getOddsTypes(loader: LoaderHandle): Promise<string[]> {
    const train = await this.readTrain(loader.sport);
    const indices = matchingIndices(train.features, loader.paramGrid);
    if (!train.odds) {
      return [];
    }

    const odds = train.odds;
    const types: string[] = [];
    for (const column of odds.columns) {
      const oddsType = parseOddsType(column);
      if (oddsType === null || types.includes(oddsType)) {
        continue;
      }
      if (indices.some((index) => isPresent(odds.rows[index]?.[column]))) {
        types.push(oddsType);
      }
    }
    return types;
  }

  async extractTrainData(loader: LoaderHandle, oddsType: string | null, dropNaThreshold: number): Promise<TableSet> {
    const train = await this.readTrain(loader.sport);
    const indices = matchingIndices(train.features, loader.paramGrid);
    this.trainOddsTypes.set(loader, oddsType);

    const features = dropSparseColumns(pickRows(train.features, indices), dropNaThreshold);
    const targets = pickRows(train.targets, indices);
    const odds = oddsType && train.odds ? selectOddsColumns(pickRows(train.odds, indices), oddsType) : null;

    return { features, targets, odds };
  }

  async extractFixturesData(loader: LoaderHandle): Promise<TableSet> {
    const fixtures = fixtureSetSchema.parse(await this.readFixture(loader.sport, 'fixtures.json'));
    const indices = matchingIndices(fixtures.features, loader.paramGrid);
    const oddsType = this.trainOddsTypes.get(loader) ?? null;

    return {
      features: pickRows(fixtures.features, indices),
      targets: null,
      odds: oddsType && fixtures.odds ? selectOddsColumns(pickRows(fixtures.odds, indices), oddsType) : null,
    };
  }

  async serializeLoader(loader: LoaderHandle): Promise<LoaderArchive> {
    await this.simulateLatency();
    const payload = JSON.stringify({ sport: loader.sport, param_grid: loader.paramGrid }, null, 2);
    return {
      fileName: 'dataloader.json',
      contentType: 'application/json',
      data: new TextEncoder().encode(payload),
    };
  }

  private async readTrain(sport: Sport): Promise<TrainFixture> {
    return trainTableSetSchema.parse(await this.readFixture(sport, 'train.json'));
  }

  private async readFixture(sport: Sport, file: string): Promise<unknown> {
    await this.simulateLatency();
    const filePath = path.join(this.rootDir, sport.toLowerCase(), file);
    try {
      const raw = await fs.readFile(filePath, 'utf-8');
      return JSON.parse(raw);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new Error(`No ${file} fixture for ${sport} under ${this.rootDir}`);
      }
      throw error;
    }
  }

  private async simulateLatency(): Promise<void> {
    if (this.latencyMs > 0) {
      await delay(this.latencyMs);
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isPresent(value: Scalar | undefined): boolean {
  return value !== null && value !== undefined;
}

function parseOddsType(column: string): string | null {
  if (!column.startsWith(ODDS_PREFIX)) {
    return null;
  }
  const [oddsType] = column.slice(ODDS_PREFIX.length).split('__');
  return oddsType ? oddsType : null;
}

function matchesGrid(row: Record<string, Scalar>, grid: ParamGrid): boolean {
  return grid.some((entry) =>
    Object.entries(entry).every(([name, values]) => values.includes(row[name] ?? null)),
  );
}

function matchingIndices(table: DataTable, grid: ParamGrid): number[] {
  return table.rows.flatMap((row, index) => (matchesGrid(row, grid) ? [index] : []));
}

function pickRows(table: DataTable, indices: number[]): DataTable {
  return {
    columns: [...table.columns],
    rows: indices.flatMap((index) => (table.rows[index] ? [{ ...table.rows[index] }] : [])),
  };
}

/** Keeps a column when at least `floor(threshold * rows)` of its values are present. */
export function dropSparseColumns(table: DataTable, threshold: number): DataTable {
  const required = Math.floor(threshold * table.rows.length);
  const columns = table.columns.filter(
    (column) => table.rows.filter((row) => isPresent(row[column])).length >= required,
  );
  return {
    columns,
    rows: table.rows.map((row) => Object.fromEntries(columns.map((column) => [column, row[column] ?? null]))),
  };
}

function selectOddsColumns(table: DataTable, oddsType: string): DataTable {
  const prefix = `${ODDS_PREFIX}${oddsType}__`;
  const columns = table.columns.filter((column) => column.startsWith(prefix));
  return {
    columns,
    rows: table.rows.map((row) => Object.fromEntries(columns.map((column) => [column, row[column] ?? null]))),
  };
}
