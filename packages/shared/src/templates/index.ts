/**
 * Prompt Templates
 *
 * One template per model-backed stage:
 * 1. Page extraction: vision model reads a page image
 * 2. Contextualization: align amendment with the original
 * 3. Change extraction: structured change summary
 */

export type { PromptTemplate, TemplateStage } from './types';

export { PAGE_EXTRACTION_TEMPLATE } from './page-extraction.template';
export { CONTEXTUALIZATION_TEMPLATE } from './contextualization.template';
export { CHANGE_EXTRACTION_TEMPLATE } from './change-extraction.template';
