/**
 * Prompt Template Types
 *
 * Each model-backed pipeline stage is driven by one template.
 */

import type { ResponseSchema } from '../llm/types';

export type TemplateStage = 'page_extraction' | 'contextualization' | 'change_extraction';

export interface PromptTemplate {
  /** The pipeline stage this template drives */
  stage: TemplateStage;

  /** Human-readable description of what the stage produces */
  description: string;

  /** Fixed instruction, sent as a system message or folded into the user message */
  systemPrompt: string;

  /**
   * User prompt with `{{name}}` placeholders. Vision prompts have none: the
   * page image is the whole user message.
   */
  userPromptTemplate?: string;

  /** Structured-output contract sent with the request */
  responseSchema?: ResponseSchema;
}
