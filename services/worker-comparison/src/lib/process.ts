/**
 * compare_contract job processing
 */

import {
  logger,
  runWithContextAsync,
  runComparison,
  isContractDeltaError,
  jobsProcessedCounter,
  jobDurationHistogram,
  QUEUE_NAMES,
  type ChangeSummary,
  type CompareContractJob,
  type ModelClient,
  type PipelineSettings,
} from '@contract-delta/shared';
import type { ComparisonFailure, ComparisonRepository } from './db';

/** The parts of a BullMQ job the processor reads. */
export interface CompareContractJobLike {
  id?: string;
  data: CompareContractJob;
  attemptsMade: number;
}

export interface ProcessDeps {
  repository: ComparisonRepository;
  client: ModelClient;
  settings: PipelineSettings;
}

export function describeFailure(error: unknown): ComparisonFailure {
  if (isContractDeltaError(error)) {
    return { code: error.code, message: error.message };
  }
  return {
    code: 'internal_error',
    message: error instanceof Error ? error.message : String(error),
  };
}

export async function processCompareContract(
  job: CompareContractJobLike,
  deps: ProcessDeps
): Promise<ChangeSummary> {
  const { correlation_id, comparison_id, contract_id, original_folder, amendment_folder } =
    job.data;

  return runWithContextAsync(
    { correlationId: correlation_id, contractId: contract_id, comparisonId: comparison_id },
    async () => {
      const startTime = Date.now();

      logger.info('Processing compare_contract', {
        jobId: job.id,
        attempt: job.attemptsMade + 1,
      });

      try {
        await deps.repository.markRunning(comparison_id);

        const result = await runComparison(
          {
            contractId: contract_id,
            originalFolder: original_folder,
            amendmentFolder: amendment_folder,
          },
          {
            client: deps.client,
            settings: deps.settings,
            onStageChange: (transition) => deps.repository.recordStage(comparison_id, transition),
          }
        );

        await deps.repository.complete(comparison_id, result.summary);

        const duration = (Date.now() - startTime) / 1000;
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.COMPARE_CONTRACT, status: 'success' });
        jobDurationHistogram.observe(
          { queue: QUEUE_NAMES.COMPARE_CONTRACT, status: 'success' },
          duration
        );

        logger.info('Comparison complete', {
          duration_seconds: duration,
          topics: result.summary.topics_touched.length,
        });

        return result.summary;
      } catch (error) {
        const duration = (Date.now() - startTime) / 1000;
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.COMPARE_CONTRACT, status: 'failed' });
        jobDurationHistogram.observe(
          { queue: QUEUE_NAMES.COMPARE_CONTRACT, status: 'failed' },
          duration
        );

        try {
          await deps.repository.fail(comparison_id, describeFailure(error));
        } catch (persistError) {
          logger.error('Failed to record comparison failure', persistError);
        }
        throw error;
      }
    }
  );
}
