import { writeFile } from 'node:fs/promises';
import { Sample } from './types.js';

export function formatSample(sample: Sample): string {
  return JSON.stringify({
    worker: sample.worker,
    status: sample.status,
    latency_ms: sample.latency,
    timestamp: sample.timestamp,
  });
}

/** Writes one line per sample. */
export async function saveSamples(path: string, samples: readonly Sample[]): Promise<void> {
  const content = samples.map(s => `${formatSample(s)}\n`).join('');
  await writeFile(path, content, 'utf8');
}
