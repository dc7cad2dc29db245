import { createServer } from 'http';
import { API_PREFIX } from '@shared/constants';
import { db, pool } from '@db/connection';
import { DrizzleStore } from '@db/store';
import { GitHubClient } from '@worker/github-client';
import { createNotificationManager } from '@worker/notifications/index';
import { createApp } from './app';
import { config, describeConfig, isGitHubConfigured } from './config';

const app = createApp({
  config,
  store: new DrizzleStore(db),
  notifications: createNotificationManager(config),
  runSource: isGitHubConfigured(config) ? new GitHubClient(config.github) : null,
});
const server = createServer(app);

function shutdown(signal: string) {
  console.warn(`[SERVER] ${signal} received, shutting down`);
  server.close(() => {
    pool.end().then(
      () => process.exit(0),
      () => process.exit(1),
    );
  });
  setTimeout(() => process.exit(1), 5000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

for (const line of describeConfig(config)) console.warn(`[SERVER] ${line}`);

server.listen(config.port, () => {
  console.warn(`[SERVER] Pipeline Pulse API on port ${config.port}`);
  console.warn(`[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`);
});

export { app, server };
