import chalk from 'chalk';
import { isSuccessStatus } from './metrics.js';
import { OutputFormat, Report, StatusCodeShare } from './types.js';

export interface ReporterOptions {
  format: OutputFormat;
  url: string;
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

function formatLatency(ms: number): string {
  return ms.toFixed(2);
}

function formatStartedAt(startedAt: number | null): string | null {
  return startedAt === null ? null : new Date(startedAt).toISOString();
}

function sortedStatusCodes(report: Report): [number, StatusCodeShare][] {
  return [...report.statusCodes].sort(([a], [b]) => a - b);
}

export function renderReport(report: Report, options: ReporterOptions): string[] {
  switch (options.format) {
    case 'json':
      return renderJson(report, options.url);
    case 'csv':
      return renderCsv(report, options.url);
    default:
      return renderPretty(report, options.url);
  }
}

export function printReport(report: Report, options: ReporterOptions): void {
  for (const line of renderReport(report, options)) {
    console.log(line);
  }
}

export function renderPretty(report: Report, url: string): string[] {
  const lines: string[] = [];
  const rule = chalk.gray('══════════════════════════════════════');
  const wallClock = report.wallClockThroughput === null
    ? 'n/a'
    : `${report.wallClockThroughput.toFixed(2)} req/s`;

  lines.push('');
  lines.push(chalk.bold('Load Test Report'));
  lines.push(rule);
  lines.push(`${chalk.cyan('Target URL:')}    ${url}`);
  const startedAt = formatStartedAt(report.startedAt);
  if (startedAt) {
    lines.push(`${chalk.cyan('Started:')}       ${startedAt}`);
  }
  lines.push(`${chalk.cyan('Total Time:')}    ${formatDuration(report.totalLatency)}`);
  lines.push('');

  lines.push(chalk.bold('Requests:'));
  lines.push(`  Issued:       ${report.issued}`);
  lines.push(`  Completed:    ${report.total}`);
  lines.push(`  Successful:   ${chalk.green(report.successful)}`);
  lines.push(`  Failed:       ${chalk.red(report.failed)}`);
  if (report.dropped > 0) {
    lines.push(`  No response:  ${chalk.red(report.dropped)}`);
    for (const [kind, share] of report.noResponse) {
      lines.push(`    ${kind}:`.padEnd(16) + `${share.count} (avg ${formatLatency(share.avgLatency)}ms)`);
    }
  }
  lines.push('');

  if (report.total > 0) {
    lines.push(chalk.bold('Latency (ms):'));
    lines.push(`  Min:          ${formatLatency(report.latency.min)}`);
    lines.push(`  Avg:          ${formatLatency(report.averageLatency)}`);
    lines.push(`  p50:          ${formatLatency(report.latency.p50)}`);
    lines.push(`  p75:          ${formatLatency(report.latency.p75)}`);
    lines.push(`  p95:          ${formatLatency(report.latency.p95)}`);
    lines.push(`  p99:          ${formatLatency(report.latency.p99)}`);
    lines.push(`  Max:          ${formatLatency(report.latency.max)}`);
    lines.push('');

    lines.push(chalk.bold('Response Codes:'));
    for (const [status, share] of sortedStatusCodes(report)) {
      const colour = isSuccessStatus(status) ? chalk.green : chalk.red;
      lines.push(`  ${colour(status)}:          ${share.count} (${share.percentage.toFixed(2)}%)`);
    }
    lines.push('');

    lines.push(chalk.bold('Successful Requests (ms):'));
    lines.push(`  Min:          ${formatLatency(report.success.min)}`);
    lines.push(`  Avg:          ${formatLatency(report.success.avg)}`);
    lines.push(`  Max:          ${formatLatency(report.success.max)}`);
    lines.push('');
  }

  lines.push(`${chalk.cyan('Throughput:')}    ${chalk.bold(report.throughput.toFixed(2))} req/s (summed latency)`);
  lines.push(`${chalk.cyan('Wall clock:')}    ${wallClock}`);
  lines.push(rule);
  lines.push('');

  return lines;
}

export function renderJson(report: Report, url: string): string[] {
  const output = {
    url,
    started_at: formatStartedAt(report.startedAt),
    requests: {
      issued: report.issued,
      total: report.total,
      successful: report.successful,
      failed: report.failed,
      dropped: report.dropped,
    },
    latency_ms: {
      total: report.totalLatency,
      avg: report.averageLatency,
      min: report.latency.min,
      p50: report.latency.p50,
      p75: report.latency.p75,
      p95: report.latency.p95,
      p99: report.latency.p99,
      max: report.latency.max,
    },
    success_latency_ms: {
      min: report.success.min,
      avg: report.success.avg,
      max: report.success.max,
    },
    status_codes: Object.fromEntries(
      sortedStatusCodes(report).map(([status, share]) => [String(status), share])
    ),
    no_response: Object.fromEntries(
      [...report.noResponse].map(([kind, share]) => [kind, { count: share.count, avg_latency_ms: share.avgLatency }])
    ),
    throughput_rps: report.throughput,
    wall_clock_throughput_rps: report.wallClockThroughput,
  };

  return [JSON.stringify(output, null, 2)];
}

export function renderCsv(report: Report, url: string): string[] {
  const header = 'url,issued,total,successful,failed,dropped,total_ms,avg_ms,min_ms,p50_ms,p75_ms,p95_ms,p99_ms,max_ms,throughput_rps';
  const row = [
    url,
    report.issued,
    report.total,
    report.successful,
    report.failed,
    report.dropped,
    Math.round(report.totalLatency),
    report.averageLatency.toFixed(2),
    Math.round(report.latency.min),
    Math.round(report.latency.p50),
    Math.round(report.latency.p75),
    Math.round(report.latency.p95),
    Math.round(report.latency.p99),
    Math.round(report.latency.max),
    report.throughput.toFixed(2),
  ].join(',');

  return [header, row];
}
