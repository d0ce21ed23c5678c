import { config } from 'dotenv';
import { DEFAULT_USER_AGENT } from './http-client.js';
import { OutputFormat } from './types.js';

config();

const OUTPUT_FORMATS: readonly OutputFormat[] = ['pretty', 'json', 'csv'];

export interface LoadConfig {
  url?: string;
  method: string;
  concurrency: number;
  /** Seconds per request. */
  timeout: number;
  output: OutputFormat;
  userAgent: string;
}

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got '${raw}'`);
  }
  return value;
}

export function parseOutputFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find(f => f === value);
  if (!format) {
    throw new Error(`Unknown output format '${value}' (expected ${OUTPUT_FORMATS.join(', ')})`);
  }
  return format;
}

export function loadConfig(): LoadConfig {
  return {
    url: process.env.LOADBURST_URL || undefined,
    method: process.env.LOADBURST_METHOD || 'GET',
    concurrency: readNumber('LOADBURST_CONCURRENCY', 10),
    timeout: readNumber('LOADBURST_TIMEOUT', 30),
    output: parseOutputFormat(process.env.LOADBURST_OUTPUT || 'pretty'),
    userAgent: process.env.LOADBURST_USER_AGENT || DEFAULT_USER_AGENT,
  };
}
