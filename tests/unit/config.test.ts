/**
 * Unit Tests: environment defaults.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadConfig, parseOutputFormat } from '../../src/config.js';

const VARS = [
  'LOADBURST_URL',
  'LOADBURST_METHOD',
  'LOADBURST_CONCURRENCY',
  'LOADBURST_TIMEOUT',
  'LOADBURST_OUTPUT',
  'LOADBURST_USER_AGENT',
];

beforeEach(() => {
  for (const name of VARS) {
    vi.stubEnv(name, '');
  }
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('loadConfig', () => {
  it('falls back to the built-in defaults', () => {
    expect(loadConfig()).toEqual({
      url: undefined,
      method: 'GET',
      concurrency: 10,
      timeout: 30,
      output: 'pretty',
      userAgent: 'loadburst/1.0.0',
    });
  });

  it('reads overrides from the environment', () => {
    vi.stubEnv('LOADBURST_URL', 'http://example.test/');
    vi.stubEnv('LOADBURST_METHOD', 'post');
    vi.stubEnv('LOADBURST_CONCURRENCY', '250');
    vi.stubEnv('LOADBURST_TIMEOUT', '1.5');
    vi.stubEnv('LOADBURST_OUTPUT', 'json');
    vi.stubEnv('LOADBURST_USER_AGENT', 'checker/2.0');

    expect(loadConfig()).toEqual({
      url: 'http://example.test/',
      method: 'post',
      concurrency: 250,
      timeout: 1.5,
      output: 'json',
      userAgent: 'checker/2.0',
    });
  });

  it('rejects a non-numeric concurrency', () => {
    vi.stubEnv('LOADBURST_CONCURRENCY', 'lots');

    expect(() => loadConfig()).toThrow("LOADBURST_CONCURRENCY must be a number, got 'lots'");
  });

  it('rejects an unknown output format', () => {
    vi.stubEnv('LOADBURST_OUTPUT', 'xml');

    expect(() => loadConfig()).toThrow("Unknown output format 'xml' (expected pretty, json, csv)");
  });
});

describe('parseOutputFormat', () => {
  it('accepts the three formats', () => {
    expect(parseOutputFormat('pretty')).toBe('pretty');
    expect(parseOutputFormat('json')).toBe('json');
    expect(parseOutputFormat('csv')).toBe('csv');
  });
});
