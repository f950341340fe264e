export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface ResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  headers: { get(name: string): string | null };
  json(): Promise<unknown>;
  text(): Promise<string>;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface RequestInitLike {
  headers?: Record<string, string>;
  method?: string;
  body?: string;
}

export type FetchLike = (url: string, init?: RequestInitLike) => Promise<ResponseLike>;

export interface BinaryPayload {
  data: Uint8Array;
  contentType: string | null;
  fileName: string | null;
}

export interface HttpClient {
  getJson(url: string, params?: QueryParams): Promise<unknown>;
  postJson(url: string, body: unknown): Promise<unknown>;
  postForBinary(url: string, body: unknown): Promise<BinaryPayload>;
}

export class FetchHttpClient implements HttpClient {
  constructor(private readonly fetchImpl: FetchLike) {}

  async getJson(url: string, params?: QueryParams): Promise<unknown> {
    const requestUrl = this.decorateQuery(url, params);
    const response = await this.fetchImpl(requestUrl, { method: 'GET', headers: { Accept: 'application/json' } });
    this.assertOk(response, requestUrl);
    return response.json();
  }

  async postJson(url: string, body: unknown): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify(body),
    });
    this.assertOk(response, url);
    return response.json();
  }

  async postForBinary(url: string, body: unknown): Promise<BinaryPayload> {
    const response = await this.fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
    this.assertOk(response, url);
    const buffer = await response.arrayBuffer();
    return {
      data: new Uint8Array(buffer),
      contentType: response.headers.get('content-type'),
      fileName: this.parseFileName(response.headers.get('content-disposition')),
    };
  }

  private assertOk(response: ResponseLike, requestUrl: string): void {
    if (!response.ok) {
      throw new Error(`Request failed (${response.status} ${response.statusText}) for ${requestUrl}`);
    }
  }

  private parseFileName(disposition: string | null): string | null {
    if (!disposition) {
      return null;
    }
    const match = /filename="?([^";]+)"?/i.exec(disposition);
    return match ? match[1] : null;
  }

  private decorateQuery(url: string, params?: QueryParams): string {
    if (!params || Object.keys(params).length === 0) {
      return url;
    }

    const search = Object.entries(params)
      .filter(([, value]) => value !== undefined && value !== null)
      .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`)
      .join('&');

    return `${url}?${search}`;
  }
}
