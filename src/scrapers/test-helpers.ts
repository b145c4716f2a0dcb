import { vi } from 'vitest';
import { JobCollection } from './collection';
import { RunGuard } from './guard';
import { HttpClient } from './http';
import type { FetchLike, FetchResponse } from './http';
import type { ScrapeContext, ScrapeOptions } from './types';
import { silentLogger } from '../utils/logger';

export function textResponse(status: number, body = ''): FetchResponse {
  return { ok: status >= 200 && status < 300, status, text: async () => body };
}

/** Fake fetch answering from `route`; a route returning undefined answers 404. */
export function fakeFetch(route: (url: string) => string | undefined) {
  return vi.fn<FetchLike>(async url => {
    const body = route(url);
    return body === undefined ? textResponse(404) : textResponse(200, body);
  });
}

export function testHttp(fetch: FetchLike): HttpClient {
  return new HttpClient({
    minDelayMs: 0,
    maxDelayMs: 0,
    requestTimeoutMs: 1000,
    maxRetries: 2,
    fetch,
    sleep: async () => {},
    random: () => 0,
    logger: silentLogger,
  });
}

export function testContext(fetch: FetchLike, options: Partial<ScrapeOptions> = {}): ScrapeContext {
  return {
    http: testHttp(fetch),
    collection: new JobCollection({ defaultLocation: 'Paris', today: () => '2024-05-01' }),
    guard: new RunGuard({ maxRuntimeMs: 60_000, now: () => 0, logger: silentLogger }),
    logger: silentLogger,
    options: {
      location: 'Paris',
      queryFr: 'immobilier',
      queryEn: 'real estate',
      maxPages: 2,
      additionalTerms: [],
      ...options,
    },
  };
}
