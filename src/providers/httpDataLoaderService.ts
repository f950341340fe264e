import type { DataLoaderService, LoaderArchive, LoaderHandle, ParamRecord, Sport, TableSet } from '../domain/contracts';
import { parseFixtureTables, parseOddsTypes, parseParamRecords, parseTrainTables } from '../domain/schemas';
import type { HttpClient } from './httpClient';

export interface HttpDataLoaderServiceConfig {
  baseUrl: string;
  client: HttpClient;
}

interface LoaderRequestBody {
  sport: Sport;
  param_grid: LoaderHandle['paramGrid'];
}

const DEFAULT_ARCHIVE_NAME = 'dataloader.pkl';

/**
 * Talks to a remote data-loading service that owns the extraction logic.
 * The loader handle travels with every request, so the service can stay
 * stateless between calls.
 */
export class HttpDataLoaderService implements DataLoaderService {
  private readonly baseUrl: string;

  constructor(private readonly config: HttpDataLoaderServiceConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  async getAllParams(sport: Sport): Promise<ParamRecord[]> {
    const payload = await this.config.client.getJson(`${this.baseUrl}/params`, { sport });
    return parseParamRecords(payload);
  }

  async getOddsTypes(loader: LoaderHandle): Promise<string[]> {
    const payload = await this.config.client.postJson(`${this.baseUrl}/odds-types`, this.loaderBody(loader));
    return parseOddsTypes(payload);
  }

  async extractTrainData(loader: LoaderHandle, oddsType: string | null, dropNaThreshold: number): Promise<TableSet> {
    const payload = await this.config.client.postJson(`${this.baseUrl}/train`, {
      ...this.loaderBody(loader),
      odds_type: oddsType,
      drop_na_thres: dropNaThreshold,
    });
    return parseTrainTables(payload);
  }

  async extractFixturesData(loader: LoaderHandle): Promise<TableSet> {
    const payload = await this.config.client.postJson(`${this.baseUrl}/fixtures`, this.loaderBody(loader));
    return parseFixtureTables(payload);
  }

  async serializeLoader(loader: LoaderHandle): Promise<LoaderArchive> {
    const payload = await this.config.client.postForBinary(`${this.baseUrl}/save`, this.loaderBody(loader));
    return {
      fileName: payload.fileName ?? DEFAULT_ARCHIVE_NAME,
      contentType: payload.contentType ?? 'application/octet-stream',
      data: payload.data,
    };
  }

  private loaderBody(loader: LoaderHandle): LoaderRequestBody {
    return {
      sport: loader.sport,
      param_grid: loader.paramGrid,
    };
  }
}
