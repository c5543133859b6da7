/**
 * Page Extractor
 *
 * Reads one page image with the primary vision model and escalates once to
 * the fallback model when the primary throws or answers with blank text.
 * Each page runs in its own `image_parsing` span.
 */

import { readFile } from 'fs/promises';
import { logger } from '../logger';
import { pageExtractionsCounter } from '../metrics';
import { EmptyModelResponseError, PageExtractionError, PageReadError } from '../errors';
import { buildVisionMessages } from '../llm/message-style';
import type { ModelTarget } from '../config';
import type { ModelClient } from '../llm/types';
import type { PageImage } from '../types';
import { PAGE_EXTRACTION_TEMPLATE } from '../templates';
import { withSpan } from '../tracing';
import type { StageDeps } from './deps';

export async function toDataUrl(image: PageImage): Promise<string> {
  let bytes: Buffer;
  try {
    bytes = await readFile(image.path);
  } catch (error) {
    throw new PageReadError(image.path, error);
  }
  return `data:${image.mimeType};base64,${bytes.toString('base64')}`;
}

async function readPage(client: ModelClient, target: ModelTarget, imageUrl: string): Promise<string> {
  const completion = await client.complete({
    model: target.model,
    messages: buildVisionMessages(target.style, PAGE_EXTRACTION_TEMPLATE.systemPrompt, imageUrl),
    temperature: 0,
  });
  return completion.content ?? '';
}

export function extractPage(image: PageImage, contractId: string, deps: StageDeps): Promise<string> {
  return withSpan(
    'image_parsing',
    { imagePath: image.path, contractId },
    () => readWithFallback(image, contractId, deps),
    (text) => ({ length: text.length })
  );
}

async function readWithFallback(
  image: PageImage,
  contractId: string,
  deps: StageDeps
): Promise<string> {
  const { vision, visionFallback } = deps.settings;
  const imageUrl = await toDataUrl(image);

  let primaryCause: unknown;
  try {
    const text = await readPage(deps.client, vision, imageUrl);
    if (text.trim().length > 0) {
      pageExtractionsCounter.inc({ outcome: 'primary' });
      return text;
    }
    primaryCause = new EmptyModelResponseError(vision.model);
  } catch (error) {
    primaryCause = error;
  }

  logger.warn('Primary vision model failed, trying fallback', {
    contractId,
    page: image.filename,
    primaryModel: vision.model,
    fallbackModel: visionFallback.model,
    error: primaryCause instanceof Error ? primaryCause.message : String(primaryCause),
  });

  try {
    const text = await readPage(deps.client, visionFallback, imageUrl);
    pageExtractionsCounter.inc({ outcome: 'fallback' });
    return text;
  } catch (fallbackCause) {
    pageExtractionsCounter.inc({ outcome: 'failed' });
    throw new PageExtractionError(
      image.path,
      vision.model,
      visionFallback.model,
      primaryCause,
      fallbackCause
    );
  }
}
