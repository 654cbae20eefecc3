import { addDays, format } from 'date-fns';
import { ForecastRecord } from '../../types';
import { FetchLike, FileLike } from '../datasetLoader';

export const HEADER = 'Date,Actual_Volatility,GARCH_Volatility,Predicted_Volatility';

export const dayOf = (offset: number, start = new Date(2024, 0, 1)) =>
  format(addDays(start, offset), 'yyyy-MM-dd');

/** n consecutive daily records from 2024-01-01. */
export const makeRecords = (n: number): ForecastRecord[] =>
  Array.from({ length: n }, (_, i) => ({
    date: dayOf(i),
    actualVolatility: 0.4 + i / 100,
    garchVolatility: 0.45 + i / 100,
    predictedVolatility: 0.41 + i / 100,
  }));

const cell = (v: number | null) => (v === null ? '' : String(v));

export const csvOf = (records: ForecastRecord[]) =>
  [HEADER, ...records.map(r => [r.date, cell(r.actualVolatility), cell(r.garchVolatility), cell(r.predictedVolatility)].join(','))]
    .join('\n') + '\n';

export interface FakeFile {
  body: string;
  etag?: string;
  status?: number;
}

/** In-process stand-in for fetch serving a fixed set of URLs. */
export const createFakeFetch = (files: Record<string, FakeFile>) => {
  const calls: string[] = [];
  const fetchFn: FetchLike = async (url, init) => {
    const method = init?.method ?? 'GET';
    calls.push(`${method} ${url}`);
    const file = files[url];
    const status = file ? file.status ?? 200 : 404;
    return {
      ok: status >= 200 && status < 300,
      status,
      statusText: status === 404 ? 'Not Found' : 'OK',
      headers: { get: (name: string) => (name.toLowerCase() === 'etag' && file?.etag) || null },
      text: async () => (method === 'HEAD' || !file ? '' : file.body),
    };
  };
  return { fetchFn, calls, files };
};

export const makeFile = (name: string, body: string, lastModified = 1): FileLike & { reads: number } => {
  const file: FileLike & { reads: number } = {
    name,
    size: body.length,
    lastModified,
    reads: 0,
    text: async () => {
      file.reads++;
      return body;
    },
  };
  return file;
};
