/**
 * Prometheus Metrics
 *
 * Metrics for model calls, pipeline stages, queue depth and HTTP traffic.
 */

import http from 'http';
import * as promClient from 'prom-client';
import { logger } from './logger';
import { getQueueMetrics, type QueueCountsSource } from './queues';

export const register = new promClient.Registry();

let defaultMetricsEnabled = false;

/**
 * Collect process metrics (CPU, memory, event loop). Only long-running
 * services call this.
 */
export function enableDefaultMetrics(): void {
  if (defaultMetricsEnabled) return;
  try {
    promClient.collectDefaultMetrics({ register });
    defaultMetricsEnabled = true;
  } catch (err) {
    logger.warn('Default Prometheus metrics collection skipped', {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

// ============================================================================
// Model Metrics
// ============================================================================

export const llmRequestsCounter = new promClient.Counter({
  name: 'contract_delta_llm_requests_total',
  help: 'Total number of LLM requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'contract_delta_llm_request_duration_seconds',
  help: 'Duration of LLM requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

export const pageExtractionsCounter = new promClient.Counter({
  name: 'contract_delta_page_extractions_total',
  help: 'Page extractions by the model that produced the text',
  labelNames: ['outcome'],
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const stageDurationHistogram = new promClient.Histogram({
  name: 'contract_delta_stage_duration_seconds',
  help: 'Duration of traced pipeline stages',
  labelNames: ['stage', 'status'],
  buckets: [0.5, 1, 2, 5, 10, 30, 60, 120, 300],
  registers: [register],
});

export const comparisonsCounter = new promClient.Counter({
  name: 'contract_delta_comparisons_total',
  help: 'Total number of contract comparisons run',
  labelNames: ['status'],
  registers: [register],
});

// ============================================================================
// Queue Metrics
// ============================================================================

export const queueDepthGauge = new promClient.Gauge({
  name: 'contract_delta_queue_depth',
  help: 'Current queue depth (waiting + active jobs)',
  labelNames: ['queue'],
  registers: [register],
});

export const jobDurationHistogram = new promClient.Histogram({
  name: 'contract_delta_job_duration_seconds',
  help: 'Duration of job processing in seconds',
  labelNames: ['queue', 'status'],
  buckets: [1, 5, 10, 30, 60, 120, 300, 600],
  registers: [register],
});

export const jobsProcessedCounter = new promClient.Counter({
  name: 'contract_delta_jobs_processed_total',
  help: 'Total number of jobs processed',
  labelNames: ['queue', 'status'],
  registers: [register],
});

export const backpressureRejectionsCounter = new promClient.Counter({
  name: 'contract_delta_backpressure_rejections_total',
  help: 'Total number of requests rejected due to backpressure',
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'contract_delta_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'contract_delta_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

// ============================================================================
// Database Metrics
// ============================================================================

export const dbQueryDurationHistogram = new promClient.Histogram({
  name: 'contract_delta_db_query_duration_seconds',
  help: 'Duration of database queries',
  labelNames: ['operation'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2],
  registers: [register],
});

/**
 * Report queue depth to Prometheus. Call before getMetrics() so scrapes
 * include current queue state.
 */
export async function reportQueueDepth(name: string, queue: QueueCountsSource): Promise<void> {
  try {
    const m = await getQueueMetrics(queue);
    queueDepthGauge.set({ queue: name }, m.waiting + m.active);
  } catch {
    queueDepthGauge.set({ queue: name }, -1);
  }
}

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Expose /metrics on its own port, for services without an HTTP server.
 */
export function serveMetrics(port: number): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url === '/metrics' && req.method === 'GET') {
      getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', getMetricsContentType());
          res.end(body);
        })
        .catch((err: unknown) => {
          logger.error('Metrics scrape failed', err);
          res.statusCode = 500;
          res.end();
        });
    } else {
      res.statusCode = 404;
      res.end();
    }
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
