/**
 * Contextualizer
 *
 * Aligns the amendment with the original contract and narrows the original
 * down to the text the amendment impacts.
 */

import { ContextualizationError } from '../errors';
import { logger } from '../logger';
import { decodeContextualizedPair } from '../schemas';
import { CONTEXTUALIZATION_TEMPLATE } from '../templates';
import type { ContextualizedPair } from '../types';
import type { StageDeps } from './deps';
import { requestStructured } from './structured-call';

function fail(cause: unknown): ContextualizationError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new ContextualizationError(`Contextualization response rejected: ${reason}`, { cause });
}

export async function contextualize(
  originalText: string,
  amendmentText: string,
  contractId: string,
  deps: StageDeps
): Promise<ContextualizedPair> {
  const payload = await requestStructured(
    CONTEXTUALIZATION_TEMPLATE,
    { original_text: originalText, amendment_text: amendmentText },
    deps,
    fail
  );

  let pair: ContextualizedPair;
  try {
    pair = decodeContextualizedPair(payload);
  } catch (error) {
    throw fail(error);
  }

  logger.info('Documents contextualized', {
    contractId,
    excerptLength: pair.original_excerpt.length,
    amendmentLength: pair.amendment_text.length,
  });
  return pair;
}
