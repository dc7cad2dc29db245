// pulse-worker: polls GitHub Actions and records runs and anomalies.
//
// Started on its own (`npm run worker`); the API's /refresh route runs the
// same ingestion pass on demand.

import { config, describeConfig, isGitHubConfigured } from '@api/config';
import { db, pool } from '@db/connection';
import { DrizzleStore } from '@db/store';
import { GitHubClient } from './github-client';
import { createNotificationManager } from './notifications/index';
import { Poller } from './poller';

function main() {
  for (const line of describeConfig(config)) console.warn(`[POLL] ${line}`);

  if (!isGitHubConfigured(config)) {
    console.error('[POLL] GITHUB_TOKEN, GITHUB_USER and GITHUB_REPO are required');
    process.exit(1);
  }

  const poller = new Poller({
    github: new GitHubClient(config.github),
    store: new DrizzleStore(db),
    notifications: createNotificationManager(config),
    thresholds: config.thresholds,
    anomalyWindow: config.worker.anomalyWindow,
    historyLimit: config.dashboard.maxRuns,
    summaryIntervalHours: config.worker.summaryIntervalHours,
  });

  const intervalMs = config.worker.pollIntervalSeconds * 1000;
  poller.start(intervalMs);
  console.warn(`[POLL] Polling every ${config.worker.pollIntervalSeconds}s`);

  function shutdown(signal: string) {
    console.warn(`[POLL] ${signal} received, stopping`);
    poller.stop();
    pool.end().then(
      () => process.exit(0),
      () => process.exit(1),
    );
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main();
