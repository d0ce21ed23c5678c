/**
 * Unit Tests: newline-delimited sample persistence.
 */
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { formatSample, saveSamples } from '../../src/results-file.js';
import { sample } from '../helpers/mock-fetch.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'loadburst-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('formatSample', () => {
  it('renders a sample as one JSON object', () => {
    expect(formatSample(sample(12.5, 404, 3))).toBe(
      '{"worker":3,"status":404,"latency_ms":12.5,"timestamp":1700000000000}',
    );
  });
});

describe('saveSamples', () => {
  it('writes one line per sample', async () => {
    const path = join(dir, 'samples.jsonl');

    await saveSamples(path, [sample(10, 200, 0), sample(20, 500, 1)]);

    expect(await readFile(path, 'utf8')).toBe(
      '{"worker":0,"status":200,"latency_ms":10,"timestamp":1700000000000}\n' +
        '{"worker":1,"status":500,"latency_ms":20,"timestamp":1700000000000}\n',
    );
  });

  it('writes an empty file for an empty sample set', async () => {
    const path = join(dir, 'empty.jsonl');

    await saveSamples(path, []);

    expect(await readFile(path, 'utf8')).toBe('');
  });

  it('propagates write errors', async () => {
    await expect(saveSamples(join(dir, 'missing', 'samples.jsonl'), [])).rejects.toThrow();
  });
});
