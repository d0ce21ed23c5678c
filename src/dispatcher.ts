import chalk from 'chalk';
import { HttpClient } from './http-client.js';
import {
  CallFailure,
  DispatchResult,
  FailureKind,
  RequestSpec,
  Sample,
  WorkerOutcome,
} from './types.js';

export interface DispatchOptions {
  userAgent?: string;
  onSample?: (sample: Sample) => void;
  onFailure?: (failure: CallFailure) => void;
}

function reportFailure(failure: CallFailure): void {
  console.error(chalk.red(`Request failed: ${failure.message}`));
}

function classifyError(error: unknown): FailureKind {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return 'timeout';
  }
  return 'network';
}

function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  // undici reports "fetch failed" and keeps the socket error as the cause
  if (error.cause instanceof Error) {
    return `${error.message}: ${error.cause.message}`;
  }
  return error.message;
}

// Only the headers are timed; the body is dropped so the connection is freed.
// A body that already errored still leaves the response counted.
async function releaseBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    console.error(chalk.yellow(`Could not discard response body: ${describeError(error)}`));
  }
}

async function runWorker(client: HttpClient, spec: RequestSpec, worker: number): Promise<WorkerOutcome> {
  const start = performance.now();

  let response: Response;
  try {
    response = await client.send(spec);
  } catch (error) {
    return {
      ok: false,
      failure: {
        worker,
        kind: classifyError(error),
        message: describeError(error),
        latency: performance.now() - start,
      },
    };
  }

  const sample: Sample = {
    worker,
    status: response.status,
    latency: performance.now() - start,
    timestamp: Date.now(),
  };

  await releaseBody(response);

  return { ok: true, sample };
}

function notify<T>(name: string, hook: ((value: T) => void) | undefined, value: T): void {
  if (!hook) return;
  try {
    hook(value);
  } catch (error) {
    console.error(chalk.red(`${name} handler failed: ${describeError(error)}`));
  }
}

/**
 * Fires `spec.concurrency` requests at once, one per worker, and waits for
 * every one of them. Each worker hands back its own outcome, so nothing is
 * shared between workers except the read-only client. Calls that fail never
 * become samples; they are returned in `failures` instead.
 *
 * A hook that throws is reported on stderr and does not stop the run.
 *
 * Throws `HttpClientError` before any request is sent when the client cannot
 * be built.
 */
export async function dispatch(spec: RequestSpec, options: DispatchOptions = {}): Promise<DispatchResult> {
  const { onSample, onFailure = reportFailure } = options;

  const client = new HttpClient({
    timeoutMs: spec.timeoutMs,
    headers: spec.headers,
    userAgent: options.userAgent,
  });

  const samples: Sample[] = [];
  const failures: CallFailure[] = [];
  const startedAt = Date.now();
  const start = performance.now();

  const workers: Promise<void>[] = [];
  for (let i = 0; i < spec.concurrency; i++) {
    workers.push(
      runWorker(client, spec, i).then(outcome => {
        if (outcome.ok) {
          samples.push(outcome.sample);
          notify('onSample', onSample, outcome.sample);
        } else {
          failures.push(outcome.failure);
          notify('onFailure', onFailure, outcome.failure);
        }
      })
    );
  }

  await Promise.allSettled(workers);

  return {
    samples,
    failures,
    issued: spec.concurrency,
    startedAt,
    wallClockMs: performance.now() - start,
  };
}
