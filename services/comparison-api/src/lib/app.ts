/**
 * Comparison API
 *
 * Accepts comparison requests, enqueues them for the comparison worker and
 * serves stored results.
 */

import path from 'path';
import express, {
  type ErrorRequestHandler,
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from 'express';
import { ulid } from 'ulid';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import {
  logger,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  reportQueueDepth,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  backpressureRejectionsCounter,
  checkBackpressure,
  QUEUE_NAMES,
  type CompareContractJob,
  type Config,
  type CreateComparisonRequest,
  type CreateComparisonResponse,
  type ErrorEnvelope,
  type QueueCountsSource,
} from '@contract-delta/shared';
import type { ComparisonStore } from './db';

/** The parts of the compare_contract queue the API uses. */
export interface ComparisonQueue extends QueueCountsSource {
  add(name: string, data: CompareContractJob, opts?: { jobId?: string }): Promise<unknown>;
}

export interface AppDeps {
  store: ComparisonStore;
  queue: ComparisonQueue;
  config: Pick<Config, 'dataRoot' | 'maxQueueDepthWarning' | 'maxQueueDepthReject'>;
}

function errorEnvelope(
  code: string,
  message: string,
  correlationId: string = getCorrelationId()
): ErrorEnvelope {
  return {
    error: {
      code,
      message,
      correlation_id: correlationId,
    },
  };
}

function isBodyParseError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    Reflect.get(error, 'type') === 'entity.parse.failed'
  );
}

/** Malformed JSON bodies get the same envelope as other invalid requests. */
const bodyParseErrorHandler: ErrorRequestHandler = (error: unknown, _req, res, next) => {
  if (!isBodyParseError(error)) {
    next(error);
    return;
  }
  const header = res.getHeader('X-Correlation-Id');
  res
    .status(400)
    .json(
      errorEnvelope(
        'invalid_request',
        'Request body must be valid JSON',
        typeof header === 'string' ? header : getCorrelationId()
      )
    );
};

/**
 * Resolve a folder against the data root, or null when it points outside it.
 */
export function resolveWithinRoot(dataRoot: string, folder: string): string | null {
  const root = path.resolve(dataRoot);
  const resolved = path.resolve(root, folder);
  if (resolved === root || resolved.startsWith(root + path.sep)) {
    return resolved;
  }
  return null;
}

function nonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function parseCreateRequest(body: unknown): CreateComparisonRequest | string {
  if (typeof body !== 'object' || body === null) {
    return 'Request body must be a JSON object';
  }
  const contractId: unknown = Reflect.get(body, 'contract_id');
  const originalFolder: unknown = Reflect.get(body, 'original_folder');
  const amendmentFolder: unknown = Reflect.get(body, 'amendment_folder');

  if (!nonEmptyString(contractId)) return 'contract_id is required';
  if (!nonEmptyString(originalFolder)) return 'original_folder is required';
  if (!nonEmptyString(amendmentFolder)) return 'amendment_folder is required';

  return {
    contract_id: contractId,
    original_folder: originalFolder,
    amendment_folder: amendmentFolder,
  };
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header.length > 0 ? header : ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const routePath: unknown = req.route?.path;
      const pathLabel = typeof routePath === 'string' ? routePath : req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path: pathLabel, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path: pathLabel,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  app.use(express.json());

  // Health check
  app.get('/health', async (_req: Request, res: Response) => {
    try {
      const backpressure = await checkBackpressure(deps.queue, deps.config);
      await deps.store.ping();

      res.json({
        status: 'healthy',
        service: 'comparison-api',
        queue_depth: backpressure.depth,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'comparison-api',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  // Metrics endpoint
  app.get('/metrics', async (_req: Request, res: Response) => {
    try {
      await reportQueueDepth(QUEUE_NAMES.COMPARE_CONTRACT, deps.queue);
      res.setHeader('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error('Metrics scrape failed', error);
      res.status(500).json(errorEnvelope('internal_error', 'Failed to collect metrics'));
    }
  });

  /**
   * POST /comparisons
   * Queues a comparison of an original contract and its amendment
   */
  app.post('/comparisons', async (req: Request, res: Response) => {
    const parsed = parseCreateRequest(req.body);
    if (typeof parsed === 'string') {
      res.status(400).json(errorEnvelope('invalid_request', parsed));
      return;
    }

    const originalFolder = resolveWithinRoot(deps.config.dataRoot, parsed.original_folder);
    const amendmentFolder = resolveWithinRoot(deps.config.dataRoot, parsed.amendment_folder);
    if (!originalFolder || !amendmentFolder) {
      res
        .status(400)
        .json(errorEnvelope('invalid_request', 'Folders must be inside the data root'));
      return;
    }

    try {
      const backpressure = await checkBackpressure(deps.queue, deps.config);

      if (backpressure.shouldReject) {
        backpressureRejectionsCounter.inc();
        logger.warn('Rejecting comparison due to backpressure', { depth: backpressure.depth });
        res
          .status(503)
          .json(
            errorEnvelope(
              'service_unavailable',
              `Queue depth ${backpressure.depth} exceeds limit, try again later`
            )
          );
        return;
      }

      if (backpressure.shouldWarn) {
        logger.warn('Queue depth above warning threshold', { depth: backpressure.depth });
      }

      const correlationId = getCorrelationId();
      const job: CompareContractJob = {
        correlation_id: correlationId,
        comparison_id: uuidv4(),
        contract_id: parsed.contract_id,
        original_folder: originalFolder,
        amendment_folder: amendmentFolder,
      };

      await deps.store.create({
        comparison_id: job.comparison_id,
        contract_id: job.contract_id,
        correlation_id: job.correlation_id,
        original_folder: job.original_folder,
        amendment_folder: job.amendment_folder,
      });

      try {
        await deps.queue.add(QUEUE_NAMES.COMPARE_CONTRACT, job, { jobId: job.comparison_id });
      } catch (error) {
        // The row must not stay queued for a job that does not exist
        await deps.store.fail(job.comparison_id, {
          code: 'enqueue_failed',
          message: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }

      logger.info('Comparison queued', {
        comparison_id: job.comparison_id,
        contract_id: job.contract_id,
      });

      const response: CreateComparisonResponse = {
        comparison_id: job.comparison_id,
        correlation_id: correlationId,
      };
      res.status(202).json(response);
    } catch (error) {
      logger.error('Failed to queue comparison', error);
      res.status(500).json(errorEnvelope('internal_error', 'Failed to queue comparison'));
    }
  });

  /**
   * GET /comparisons/:comparison_id
   * Returns the stored comparison
   */
  app.get('/comparisons/:comparison_id', async (req: Request, res: Response) => {
    const { comparison_id } = req.params;

    try {
      const record = isUuid(comparison_id) ? await deps.store.get(comparison_id) : null;

      if (!record) {
        res
          .status(404)
          .json(errorEnvelope('not_found', `Comparison ${comparison_id} not found`));
        return;
      }

      res.json(record);
    } catch (error) {
      logger.error('Failed to get comparison', error, { comparison_id });
      res.status(500).json(errorEnvelope('internal_error', 'Failed to retrieve comparison'));
    }
  });

  app.use(bodyParseErrorHandler);

  return app;
}
