/**
 * Change Extractor
 *
 * Produces the structured change summary from a contextualized pair.
 */

import { ChangeExtractionError } from '../errors';
import { logger } from '../logger';
import { decodeChangeSummary } from '../schemas';
import { CHANGE_EXTRACTION_TEMPLATE } from '../templates';
import type { ChangeSummary } from '../types';
import type { StageDeps } from './deps';
import { requestStructured } from './structured-call';

function fail(cause: unknown): ChangeExtractionError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new ChangeExtractionError(`Change extraction response rejected: ${reason}`, { cause });
}

export async function extractChanges(
  originalExcerpt: string,
  amendmentText: string,
  contractId: string,
  deps: StageDeps
): Promise<ChangeSummary> {
  const payload = await requestStructured(
    CHANGE_EXTRACTION_TEMPLATE,
    { original_excerpt: originalExcerpt, amendment_text: amendmentText },
    deps,
    fail
  );

  let summary: ChangeSummary;
  try {
    summary = decodeChangeSummary(payload);
  } catch (error) {
    throw fail(error);
  }

  logger.info('Changes extracted', {
    contractId,
    topics: summary.topics_touched.length,
    sections: summary.sections_changed.length,
  });
  return summary;
}
