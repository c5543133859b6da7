/**
 * Pipeline Runner
 *
 * START -> ORIGINAL_PARSED -> AMENDMENT_PARSED -> CONTEXTUALIZED -> SUMMARIZED
 *
 * Any stage failure moves the run to FAILED and the stage's error is
 * rethrown unchanged. A failed run is never resumed.
 */

import { getCorrelationId, runInChildContext } from '../context';
import { logger } from '../logger';
import { comparisonsCounter } from '../metrics';
import { withSpan } from '../tracing';
import type {
  ComparisonRequest,
  ComparisonResult,
  PipelineStage,
  StageTransition,
} from '../types';
import type { StageDeps } from './deps';
import { assembleDocument } from './document-assembler';
import { contextualize } from './contextualizer';
import { extractChanges } from './change-extractor';

export type StageObserver = (transition: StageTransition) => void | Promise<void>;

export interface RunnerDeps extends StageDeps {
  onStageChange?: StageObserver;
}

export async function runComparison(
  request: ComparisonRequest,
  deps: RunnerDeps
): Promise<ComparisonResult> {
  const { contractId } = request;

  return runInChildContext({ contractId }, () =>
    withSpan('comparison', { contractId }, async () => {
      const startTime = Date.now();
      const stages: StageTransition[] = [];

      const enter = async (stage: PipelineStage): Promise<void> => {
        const transition: StageTransition = { stage, at: new Date().toISOString() };
        stages.push(transition);
        logger.info('Pipeline stage reached', { stage });
        if (!deps.onStageChange) return;
        try {
          await deps.onStageChange(transition);
        } catch (error) {
          logger.warn('Stage observer failed', {
            stage,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      };

      await enter('START');

      try {
        const parse = (document: 'original' | 'amendment', folder: string): Promise<string> =>
          withSpan(
            'parse_full_contract',
            { contractId, document, folder },
            () => assembleDocument(folder, contractId, deps),
            (text) => ({ length: text.length })
          );

        const [originalText, amendmentText] = await Promise.all([
          parse('original', request.originalFolder),
          parse('amendment', request.amendmentFolder),
        ]);
        await enter('ORIGINAL_PARSED');
        await enter('AMENDMENT_PARSED');

        const contextualized = await withSpan(
          'contextualization_agent',
          { agent: 'contextualization', contractId },
          () => contextualize(originalText, amendmentText, contractId, deps)
        );
        await enter('CONTEXTUALIZED');

        const summary = await withSpan(
          'extraction_agent',
          { agent: 'extraction', contractId },
          () =>
            extractChanges(
              contextualized.original_excerpt,
              contextualized.amendment_text,
              contractId,
              deps
            )
        );
        await enter('SUMMARIZED');

        comparisonsCounter.inc({ status: 'success' });
        return {
          contract_id: contractId,
          correlation_id: getCorrelationId(),
          summary,
          contextualized,
          original_length: originalText.length,
          amendment_length: amendmentText.length,
          stages,
          duration_ms: Date.now() - startTime,
        };
      } catch (error) {
        comparisonsCounter.inc({ status: 'error' });
        await enter('FAILED');
        throw error;
      }
    })
  );
}
