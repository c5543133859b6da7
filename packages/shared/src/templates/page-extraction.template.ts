/**
 * Page Extraction Template
 *
 * Vision prompt that turns one contract page image into plain text.
 */

import type { PromptTemplate } from './types';

export const PAGE_EXTRACTION_TEMPLATE: PromptTemplate = {
  stage: 'page_extraction',
  description: 'Contract page image to structured contract text',

  systemPrompt:
    'You are a legal, text from image, parser. From the following image, extract the ' +
    'structured contract text preserving headings, sections, clauses, numbering, and ' +
    'hierarchy. Only return the text from image, no other text or explanation is allowed.',
};
