export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

export interface HeaderEntry {
  name: string;
  value: string;
}

export interface RequestSpec {
  url: string;
  method: HttpMethod;
  headers: HeaderEntry[];
  body?: string;
  timeoutMs: number;
  concurrency: number;
}

export interface Sample {
  worker: number;
  status: number;
  /** Milliseconds from request start until response headers arrived. */
  latency: number;
  /** Epoch milliseconds at completion. */
  timestamp: number;
}

export type FailureKind = 'timeout' | 'network';

export interface CallFailure {
  worker: number;
  kind: FailureKind;
  message: string;
  latency: number;
}

export type WorkerOutcome =
  | { ok: true; sample: Sample }
  | { ok: false; failure: CallFailure };

export interface DispatchResult {
  samples: Sample[];
  failures: CallFailure[];
  issued: number;
  startedAt: number;
  wallClockMs: number;
}

export interface LatencyStats {
  min: number;
  max: number;
  avg: number;
  p50: number;
  p75: number;
  p95: number;
  p99: number;
}

export interface SuccessLatencyStats {
  min: number;
  max: number;
  avg: number;
}

export interface StatusCodeShare {
  count: number;
  percentage: number;
}

export interface NoResponseShare {
  count: number;
  /** Mean milliseconds until the call gave up. */
  avgLatency: number;
}

export interface Report {
  /** Epoch milliseconds when the run was launched, if known. */
  startedAt: number | null;
  total: number;
  successful: number;
  failed: number;
  issued: number;
  dropped: number;
  totalLatency: number;
  averageLatency: number;
  latency: LatencyStats;
  success: SuccessLatencyStats;
  /** Completed calls per second of summed latency, not of elapsed time. */
  throughput: number;
  wallClockThroughput: number | null;
  statusCodes: Map<number, StatusCodeShare>;
  noResponse: Map<FailureKind, NoResponseShare>;
}

export type OutputFormat = 'pretty' | 'json' | 'csv';
