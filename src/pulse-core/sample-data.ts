// ---------------------------------------------------------------------------
// Seeded sample history, served when the store cannot be read
// ---------------------------------------------------------------------------

import type { AnomalyRecord, RunRecord } from '@shared/types';
import { detectAnomaly } from './anomaly';

export interface SampleDataOptions {
  seed?: number;
  count?: number;
  now?: Date;
}

export interface SampleData {
  runs: RunRecord[];
  anomalies: AnomalyRecord[];
}

const HOUR_MS = 60 * 60 * 1000;
const SUCCESS_RATIO = 0.8;
const MIN_DURATION = 60;
const MAX_DURATION = 240;
const BASELINE_WINDOW = 10;

const BRANCHES = ['main', 'develop', 'feature/cache-layer', 'fix/flaky-login'] as const;
const AUTHORS = ['avery', 'jordan', 'sam', 'riley', 'casey'] as const;
const WORKFLOWS = ['CI', 'Deploy'] as const;

function mulberry32(seed: number) {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pick<T>(rng: () => number, items: readonly T[]): T {
  return items[Math.floor(rng() * items.length)];
}

function hex(rng: () => number, length: number): string {
  let out = '';
  for (let i = 0; i < length; i++) out += Math.floor(rng() * 16).toString(16);
  return out;
}

export function generateSampleData(options: SampleDataOptions = {}): SampleData {
  const { seed = 42, count = 20, now = new Date() } = options;
  const rng = mulberry32(seed);
  const end = now.getTime();

  const runs: RunRecord[] = [];
  for (let i = 0; i < count; i++) {
    const status = rng() < SUCCESS_RATIO ? 'success' : 'failure';
    const duration = MIN_DURATION + Math.floor(rng() * (MAX_DURATION - MIN_DURATION + 1));
    runs.push({
      id: `sample-${i + 1}`,
      status,
      duration,
      timestamp: new Date(end - (count - 1 - i) * HOUR_MS).toISOString(),
      branch: pick(rng, BRANCHES),
      commit: hex(rng, 7),
      author: pick(rng, AUTHORS),
      workflow: pick(rng, WORKFLOWS),
      url: null,
    });
  }

  const anomalies: AnomalyRecord[] = [];
  runs.forEach((run, i) => {
    const history = runs.slice(Math.max(0, i - BASELINE_WINDOW), i).map((r) => r.duration);
    const anomaly = detectAnomaly(run, history, new Date(run.timestamp));
    if (anomaly) {
      anomalies.push({ id: `sample-anomaly-${anomalies.length + 1}`, ...anomaly });
    }
  });

  // Newest first, matching what the store returns
  return { runs: runs.reverse(), anomalies: anomalies.reverse() };
}
