/**
 * Shared Mocks
 * Reusable stand-ins for loggers and network primitives
 */

import { createLogger, Logger } from '../../lib/logger';
import { Connector } from '../../lib/probe/probe.types';
import { FetchFn } from '../../lib/sources/source.types';

/**
 * Logger that writes nothing; spy on its methods to assert log calls
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'debug', silent: true });
}

export type MockResponse = { status?: number; body: string; contentType?: string } | Error;

/**
 * fetch stand-in answering from a URL → response table; unknown URLs fail like a DNS error
 */
export function createMockFetch(routes: Record<string, MockResponse>): jest.Mock<Promise<Response>, Parameters<FetchFn>> {
  return jest.fn<Promise<Response>, Parameters<FetchFn>>(async (url) => {
    const route = routes[url];
    if (route === undefined) {
      throw new TypeError('fetch failed');
    }
    if (route instanceof Error) {
      throw route;
    }
    return new Response(route.body, {
      status: route.status ?? 200,
      headers: { 'content-type': route.contentType ?? 'text/plain' },
    });
  });
}

/**
 * fetch stand-in that never answers until its signal aborts
 */
export function createHangingFetch(): jest.Mock<Promise<Response>, Parameters<FetchFn>> {
  return jest.fn<Promise<Response>, Parameters<FetchFn>>(
    (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          const error = new Error('This operation was aborted');
          error.name = 'AbortError';
          reject(error);
        });
      })
  );
}

/**
 * Connector answering from a `host:port` → latency table; missing endpoints are unreachable
 */
export function createFakeConnector(
  latencies: Record<string, number | null>
): jest.Mock<Promise<number | null>, Parameters<Connector>> {
  return jest.fn<Promise<number | null>, Parameters<Connector>>(
    async (host, port) => latencies[`${host}:${port}`] ?? null
  );
}
