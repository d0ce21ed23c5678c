import { methodCarriesBody } from './request.js';
import { HeaderEntry, RequestSpec } from './types.js';

export const DEFAULT_USER_AGENT = 'loadburst/1.0.0';

// Largest delay a Node timer accepts
export const MAX_TIMEOUT_MS = 4294967295;

export interface HttpClientOptions {
  timeoutMs: number;
  headers?: HeaderEntry[];
  userAgent?: string;
}

// Shared read-only by every worker of a run
export class HttpClient {
  readonly timeoutMs: number;
  private headers: Headers;

  constructor(options: HttpClientOptions) {
    if (!Number.isInteger(options.timeoutMs) || options.timeoutMs <= 0 || options.timeoutMs > MAX_TIMEOUT_MS) {
      throw new HttpClientError(`Invalid timeout: ${options.timeoutMs}ms`);
    }
    this.timeoutMs = options.timeoutMs;

    const headers = new Headers();
    try {
      headers.set('User-Agent', options.userAgent ?? DEFAULT_USER_AGENT);
      for (const { name, value } of options.headers ?? []) {
        headers.append(name, value);
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new HttpClientError(`Invalid header: ${reason}`);
    }
    this.headers = headers;
  }

  /** Resolves as soon as the response headers have been received. */
  async send(spec: Pick<RequestSpec, 'url' | 'method' | 'body'>): Promise<Response> {
    const attachBody = spec.body !== undefined && methodCarriesBody(spec.method);

    return fetch(spec.url, {
      method: spec.method,
      headers: new Headers(this.headers),
      ...(attachBody && { body: spec.body }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }
}

export class HttpClientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HttpClientError';
  }
}
