import { vi } from 'vitest';
import type { HttpClient, HttpResponse, QueryParams } from '../src/types.js';

export const DAY_MS = 24 * 60 * 60 * 1000;
export const JAN_2_2024 = Date.UTC(2024, 0, 2);

export function aggregate(dayOffset: number, close: number, volume = 1_000_000) {
  return {
    t: JAN_2_2024 + dayOffset * DAY_MS,
    o: close - 0.1,
    h: close + 0.5,
    l: close - 0.5,
    c: close,
    v: volume,
    vw: close,
    n: 1200,
  };
}

export function ok(data: unknown): HttpResponse {
  return { status: 200, statusText: 'OK', data, headers: {} };
}

export const snapshotBody = {
  status: 'OK',
  request_id: 'test-request',
  ticker: {
    ticker: 'RIVN',
    todaysChange: 0.42,
    day: { o: 12.1, h: 12.9, l: 11.95, c: 12.6, v: 38_500_000, vw: 12.4 },
    lastTrade: { p: 12.64, s: 100, t: 1735837200000 },
    min: { c: 12.61, v: 120_000 },
    prevDay: { o: 11.9, h: 12.3, l: 11.7, c: 12.18, v: 41_000_000 },
  },
};

export const detailsBody = {
  status: 'OK',
  results: { ticker: 'RIVN', name: 'Rivian Automotive, Inc.', market_cap: 12_345_678_901 },
};

/**
 * Stub transport answering by path prefix. An Error entry makes the call
 * reject, as a transport failure would.
 */
export function stubHttp(routes: Record<string, HttpResponse | Error>) {
  const get = vi.fn(async (url: string, _config?: { params?: QueryParams }): Promise<HttpResponse> => {
    const match = Object.entries(routes).find(([prefix]) => url.startsWith(prefix));
    if (!match) {
      return { status: 404, statusText: 'Not Found', data: { status: 'NOT_FOUND' } };
    }
    const [, response] = match;
    if (response instanceof Error) {
      throw response;
    }
    return response;
  });

  const client: HttpClient = { get };
  return { client, get };
}
