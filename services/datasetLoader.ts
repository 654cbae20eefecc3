import { ForecastDataset, ForecastRecord } from '../types';
import { parseForecastCsv } from './csvParser';
import { DataNotFoundError } from './errors';
import { createLogger } from './logger';

// A DOM File satisfies this; tests pass plain objects.
export interface FileLike {
  name: string;
  size: number;
  lastModified: number;
  text(): Promise<string>;
}

export type DataSource =
  | { kind: 'url'; url: string }
  | { kind: 'file'; file: FileLike };

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export type FetchLike = (url: string, init?: { method?: string }) => Promise<FetchResponseLike>;

export interface DatasetLoaderOptions {
  fetchFn?: FetchLike;
  cache?: ForecastCache;
  onWarning?: (message: string) => void;
  now?: () => number;
}

export const sourceId = (source: DataSource): string =>
  source.kind === 'url' ? `url:${source.url}` : `file:${source.file.name}:${source.file.size}`;

export const sourceLabel = (source: DataSource): string =>
  source.kind === 'url' ? source.url : source.file.name;

/**
 * Loaded datasets keyed by source identity. Each entry remembers the version
 * it was read at; a lookup with a different known version misses.
 */
export class ForecastCache {
  private entries = new Map<string, ForecastDataset>();

  get(id: string, version: string | null): ForecastDataset | undefined {
    const hit = this.entries.get(id);
    if (!hit) return undefined;
    // An unknown version is not evidence of a change.
    if (version !== null && hit.version !== null && hit.version !== version) return undefined;
    return hit;
  }

  set(dataset: ForecastDataset) {
    this.entries.set(dataset.sourceId, dataset);
  }

  delete(id: string): boolean {
    return this.entries.delete(id);
  }

  clear() {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

const log = createLogger('DatasetLoader');

const defaultFetch: FetchLike = (url, init) => fetch(url, init);

const freezeRecords = (records: ForecastRecord[]): readonly ForecastRecord[] =>
  Object.freeze(records.map(r => Object.freeze(r)));

export class DatasetLoader {
  readonly cache: ForecastCache;
  private readonly fetchFn: FetchLike;
  private readonly onWarning?: (message: string) => void;
  private readonly now: () => number;

  constructor(options: DatasetLoaderOptions = {}) {
    this.cache = options.cache ?? new ForecastCache();
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.onWarning = options.onWarning;
    this.now = options.now ?? Date.now;
  }

  async load(source: DataSource): Promise<ForecastDataset> {
    const id = sourceId(source);
    const version = await this.probeVersion(source);

    const cached = this.cache.get(id, version);
    if (cached) return cached;

    const text = await this.readText(source);
    const { records, droppedRows } = parseForecastCsv(text);

    if (droppedRows > 0) {
      const message = `Dropped ${droppedRows} row(s) with unparsable dates from '${sourceLabel(source)}'`;
      log.warn(message);
      this.onWarning?.(message);
    }

    const dataset: ForecastDataset = {
      sourceId: id,
      version,
      records: freezeRecords(records),
      droppedRows,
      loadedAt: this.now(),
    };
    this.cache.set(dataset);
    return dataset;
  }

  invalidate(source: DataSource): boolean {
    return this.cache.delete(sourceId(source));
  }

  // Files carry their own mtime; URLs report ETag/Last-Modified on HEAD.
  private async probeVersion(source: DataSource): Promise<string | null> {
    if (source.kind === 'file') return String(source.file.lastModified);

    let response: FetchResponseLike;
    try {
      response = await this.fetchFn(source.url, { method: 'HEAD' });
    } catch (err) {
      throw new DataNotFoundError(source.url, err);
    }
    if (!response.ok) {
      throw new DataNotFoundError(source.url, `${response.status} ${response.statusText}`);
    }
    return response.headers.get('etag') ?? response.headers.get('last-modified');
  }

  private async readText(source: DataSource): Promise<string> {
    if (source.kind === 'file') {
      try {
        return await source.file.text();
      } catch (err) {
        throw new DataNotFoundError(source.file.name, err);
      }
    }

    let response: FetchResponseLike;
    try {
      response = await this.fetchFn(source.url);
    } catch (err) {
      throw new DataNotFoundError(source.url, err);
    }
    if (!response.ok) {
      throw new DataNotFoundError(source.url, `${response.status} ${response.statusText}`);
    }
    try {
      return await response.text();
    } catch (err) {
      throw new DataNotFoundError(source.url, err);
    }
  }
}
