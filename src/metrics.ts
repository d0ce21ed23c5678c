import {
  CallFailure,
  FailureKind,
  LatencyStats,
  NoResponseShare,
  Report,
  Sample,
  StatusCodeShare,
  SuccessLatencyStats,
} from './types.js';

export interface AggregateContext {
  /** Calls launched, including those that never produced a sample. */
  issued?: number;
  wallClockMs?: number;
  startedAt?: number;
  /** Calls that never got a response; `issued` defaults to total plus these. */
  failures?: readonly CallFailure[];
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Rank-based percentile: the value at `floor(p/100 * n)`, clamped to the last
 * index. No interpolation. Returns 0 for an empty list.
 */
export function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const index = Math.floor(sorted.length * (p / 100));
  return sorted[Math.min(Math.max(0, index), sorted.length - 1)];
}

export function calculateLatencyStats(latencies: number[]): LatencyStats {
  if (latencies.length === 0) {
    return { min: 0, max: 0, avg: 0, p50: 0, p75: 0, p95: 0, p99: 0 };
  }

  const sorted = [...latencies].sort((a, b) => a - b);
  const sum = sorted.reduce((a, b) => a + b, 0);

  return {
    min: sorted[0],
    max: sorted[sorted.length - 1],
    avg: sum / sorted.length,
    p50: percentile(sorted, 50),
    p75: percentile(sorted, 75),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
  };
}

function calculateSuccessStats(latencies: number[]): SuccessLatencyStats {
  if (latencies.length === 0) {
    return { min: 0, max: 0, avg: 0 };
  }

  return {
    min: latencies.reduce((a, b) => Math.min(a, b)),
    max: latencies.reduce((a, b) => Math.max(a, b)),
    avg: latencies.reduce((a, b) => a + b, 0) / latencies.length,
  };
}

function countStatusCodes(samples: readonly Sample[]): Map<number, StatusCodeShare> {
  const counts = new Map<number, number>();
  for (const sample of samples) {
    counts.set(sample.status, (counts.get(sample.status) || 0) + 1);
  }

  const shares = new Map<number, StatusCodeShare>();
  for (const [status, count] of counts) {
    shares.set(status, { count, percentage: (count / samples.length) * 100 });
  }
  return shares;
}

function groupFailures(failures: readonly CallFailure[]): Map<FailureKind, NoResponseShare> {
  const totals = new Map<FailureKind, { count: number; latency: number }>();
  for (const failure of failures) {
    const entry = totals.get(failure.kind) ?? { count: 0, latency: 0 };
    entry.count++;
    entry.latency += failure.latency;
    totals.set(failure.kind, entry);
  }

  const shares = new Map<FailureKind, NoResponseShare>();
  for (const [kind, { count, latency }] of totals) {
    shares.set(kind, { count, avgLatency: latency / count });
  }
  return shares;
}

/**
 * Summarises a finished sample set. Does not modify `samples`. An empty set
 * yields a report whose latency figures and throughput are all zero.
 */
export function aggregate(samples: readonly Sample[], context: AggregateContext = {}): Report {
  const total = samples.length;
  const latencies = samples.map(s => s.latency);
  const successLatencies = samples.filter(s => isSuccessStatus(s.status)).map(s => s.latency);
  const successful = successLatencies.length;

  const totalLatency = latencies.reduce((a, b) => a + b, 0);
  const latency = calculateLatencyStats(latencies);

  const failures = context.failures ?? [];
  const issued = context.issued ?? total + failures.length;
  const wallClockMs = context.wallClockMs ?? 0;

  return {
    startedAt: context.startedAt ?? null,
    total,
    successful,
    failed: total - successful,
    issued,
    dropped: Math.max(0, issued - total),
    totalLatency,
    averageLatency: total > 0 ? totalLatency / total : 0,
    latency,
    success: calculateSuccessStats(successLatencies),
    throughput: totalLatency > 0 ? total / (totalLatency / 1000) : 0,
    wallClockThroughput: wallClockMs > 0 ? total / (wallClockMs / 1000) : null,
    statusCodes: countStatusCodes(samples),
    noResponse: groupFailures(failures),
  };
}
