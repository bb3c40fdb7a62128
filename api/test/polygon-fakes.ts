import { AxiosError, AxiosHeaders, type AxiosResponse } from 'axios';
import { of, throwError, type Observable } from 'rxjs';
import { buildConfig, type AppConfig } from '../src/config/configuration';

export const TEST_USER = 'admin';
export const TEST_PASSWORD = 'test-secret';
export const TEST_API_KEY = 'test-key';

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return buildConfig({
    NODE_ENV: 'test',
    POLYGON_API_KEY: TEST_API_KEY,
    POLYGON_BASE_URL: 'https://polygon.test',
    BASIC_AUTH_USERNAME: TEST_USER,
    BASIC_AUTH_PASSWORD: TEST_PASSWORD,
    ...overrides,
  });
}

export function axiosResponse<T>(data: T, status = 200): AxiosResponse<T> {
  return {
    data,
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}

export function axiosError(status: number): AxiosError {
  const response = axiosResponse<unknown>({ status: 'ERROR' }, status);
  return new AxiosError(
    `Request failed with status code ${status}`,
    'ERR_BAD_REQUEST',
    response.config,
    undefined,
    response,
  );
}

export type FakeReply = { data: unknown } | { status: number } | { networkError: string };

/**
 * Stand-in for @nestjs/axios HttpService: answers by URL substring and
 * records every requested URL.
 */
export class FakeHttpService {
  readonly urls: string[] = [];
  private readonly routes: Array<[string, FakeReply]> = [];

  on(fragment: string, reply: FakeReply): this {
    this.routes.unshift([fragment, reply]);
    return this;
  }

  get(url: string): Observable<AxiosResponse<unknown>> {
    this.urls.push(url);
    const route = this.routes.find(([fragment]) => url.includes(fragment));
    if (!route) return throwError(() => axiosError(404));

    const reply = route[1];
    if ('networkError' in reply) return throwError(() => new AxiosError(reply.networkError, 'ECONNRESET'));
    if ('status' in reply) return throwError(() => axiosError(reply.status));
    return of(axiosResponse(reply.data));
  }
}

/** Aggregates payload of close prices, one bar every `stepMs` from `startMs`. */
export function aggregatesPayload(closes: number[], startMs = Date.UTC(2024, 5, 17, 13, 30), stepMs = 300_000) {
  return {
    status: 'OK',
    ticker: 'AAPL',
    resultsCount: closes.length,
    queryCount: closes.length,
    adjusted: true,
    results: closes.map((c, i) => ({
      t: startMs + i * stepMs,
      o: c,
      h: c,
      l: c,
      c,
      v: 1000,
      vw: c,
      n: 10,
    })),
  };
}

export function referencePayload(name: string) {
  return { status: 'OK', results: { ticker: 'AAPL', name, market: 'stocks' } };
}
