/**
 * Comparison Worker
 *
 * Consumes the compare_contract queue, runs the comparison pipeline and
 * stores the outcome in Postgres.
 */

import { Job } from 'bullmq';
import { Pool } from 'pg';
import {
  logger,
  loadConfig,
  resolvePipelineSettings,
  createWorker,
  enableDefaultMetrics,
  serveMetrics,
  OpenAIModelClient,
  QUEUE_NAMES,
  type ChangeSummary,
  type CompareContractJob,
} from '@contract-delta/shared';
import { PgComparisonRepository } from './lib/db';
import { processCompareContract } from './lib/process';

const config = loadConfig();
const settings = resolvePipelineSettings(config);

const pool = new Pool({
  connectionString: config.databaseUrl,
  max: 20,
  idleTimeoutMillis: 30000,
});

const deps = {
  repository: new PgComparisonRepository(pool),
  client: new OpenAIModelClient({
    apiKey: settings.apiKey,
    baseUrl: settings.baseUrl,
    timeoutMs: settings.timeoutMs,
  }),
  settings,
};

// Expose /metrics for Prometheus
enableDefaultMetrics();
const metricsServer = serveMetrics(config.workerMetricsPort);

const worker = createWorker<CompareContractJob, ChangeSummary>(
  QUEUE_NAMES.COMPARE_CONTRACT,
  (job: Job<CompareContractJob, ChangeSummary>) => processCompareContract(job, deps),
  config
);

logger.info('Comparison worker started', {
  visionModel: settings.vision.model,
  fallbackModel: settings.visionFallback.model,
  textModel: settings.text.model,
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await pool.end();
  metricsServer.close();
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
