import { HeaderEntry, HttpMethod, RequestSpec } from './types.js';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH'];

export interface RequestInput {
  url: string;
  method: string;
  headers?: string[];
  body?: string;
  /** Seconds. */
  timeout: number;
  concurrency: number;
}

export function parseMethod(value: string): HttpMethod {
  const upper = value.toUpperCase();
  const method = HTTP_METHODS.find(m => m === upper);
  if (!method) {
    throw new Error(`'${value}' is not a valid HTTP method`);
  }
  return method;
}

/**
 * Parses `"Name: Value"` strings in order. Entries without a colon are
 * skipped; only the first colon separates name from value.
 */
export function parseHeaders(raw: string[]): HeaderEntry[] {
  const headers: HeaderEntry[] = [];

  for (const entry of raw) {
    const colon = entry.indexOf(':');
    if (colon === -1) continue;

    headers.push({
      name: entry.slice(0, colon).trim(),
      value: entry.slice(colon + 1).trim(),
    });
  }

  return headers;
}

export function methodCarriesBody(method: HttpMethod): boolean {
  return method !== 'GET';
}

export function buildRequestSpec(input: RequestInput): RequestSpec {
  let parsed: URL;
  try {
    parsed = new URL(input.url);
  } catch {
    throw new Error(`Invalid URL: ${input.url}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`Unsupported URL protocol: ${parsed.protocol}`);
  }

  if (!Number.isInteger(input.concurrency) || input.concurrency < 1) {
    throw new Error(`Concurrency must be a positive integer, got ${input.concurrency}`);
  }

  if (!Number.isFinite(input.timeout) || input.timeout <= 0) {
    throw new Error(`Timeout must be a positive number of seconds, got ${input.timeout}`);
  }

  return {
    url: input.url,
    method: parseMethod(input.method),
    headers: parseHeaders(input.headers ?? []),
    body: input.body,
    timeoutMs: Math.round(input.timeout * 1000),
    concurrency: input.concurrency,
  };
}
