/**
 * Comparison API entry point
 */

import { Pool } from 'pg';
import {
  logger,
  loadConfig,
  createQueue,
  enableDefaultMetrics,
  QUEUE_NAMES,
  type ChangeSummary,
  type CompareContractJob,
} from '@contract-delta/shared';
import { createApp } from './lib/app';
import { PgComparisonStore } from './lib/db';

const config = loadConfig();

const pool = new Pool({
  connectionString: config.databaseUrl,
  max: 10,
  idleTimeoutMillis: 30000,
});

const queue = createQueue<CompareContractJob, ChangeSummary>(
  QUEUE_NAMES.COMPARE_CONTRACT,
  config
);

enableDefaultMetrics();

const app = createApp({
  store: new PgComparisonStore(pool),
  queue,
  config,
});

const server = app.listen(config.port, () => {
  logger.info('Comparison API listening', { port: config.port, dataRoot: config.dataRoot });
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await queue.close();
  await pool.end();
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((error: unknown) => {
    logger.error('Shutdown failed', error);
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
