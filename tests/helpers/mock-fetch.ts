/**
 * Shared test helpers for mocking fetch and building samples.
 * Keeps the dispatcher tests off the network.
 */
import { vi } from 'vitest';
import type { RequestSpec, Sample } from '../../src/types.js';

// ============================================================================
// Fetch Mocking
// ============================================================================

export type FetchMock = ReturnType<typeof createMockFetch>;

export function createMockFetch() {
  return vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();
}

export function installMockFetch() {
  const mockFetch = createMockFetch();
  vi.stubGlobal('fetch', mockFetch);
  return mockFetch;
}

// ============================================================================
// Response Builders
// ============================================================================

export function mockResponse(status = 200, body = 'ok'): Response {
  return new Response(body, { status });
}

export function delayedResponse(ms: number, status = 200): () => Promise<Response> {
  return () => new Promise(resolve => setTimeout(() => resolve(mockResponse(status)), ms));
}

// Headers arrive, then the connection drops before the body is read
export function erroredBodyResponse(message: string, status = 200): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.error(new Error(message));
    },
  });
  return new Response(body, { status });
}

export function timeoutError(): Error {
  const err = new Error('The operation was aborted due to timeout');
  err.name = 'TimeoutError';
  return err;
}

export function connectionError(): Error {
  return new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:9') });
}

// ============================================================================
// Fixtures
// ============================================================================

export const TARGET_URL = 'http://example.test/ok';

export function requestSpec(overrides: Partial<RequestSpec> = {}): RequestSpec {
  return {
    url: TARGET_URL,
    method: 'GET',
    headers: [],
    timeoutMs: 5000,
    concurrency: 5,
    ...overrides,
  };
}

export function sample(latency: number, status = 200, worker = 0): Sample {
  return { worker, status, latency, timestamp: 1_700_000_000_000 };
}

export function samplesOf(latencies: number[], status = 200): Sample[] {
  return latencies.map((latency, i) => sample(latency, status, i));
}
