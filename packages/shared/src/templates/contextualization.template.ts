/**
 * Contextualization Template
 *
 * Aligns the amendment with the original contract and keeps only the part of
 * the original the amendment touches.
 */

import type { PromptTemplate } from './types';

export const CONTEXTUALIZATION_TEMPLATE: PromptTemplate = {
  stage: 'contextualization',
  description: 'Original excerpt impacted by the amendment, plus the amendment text',

  systemPrompt: `You are a senior legal contextualization agent. Contextualize the ORIGINAL CONTRACT and the AMENDMENT and identify structure, section alignment, and which sections correspond to each other.
Return a JSON object with the following fields, containing just the text impacted by the amendment and the amendment text:
- original_excerpt: text of the original contract, just the text impacted by the amendment
- amendment_text: text of the amendment`,

  userPromptTemplate: `ORIGINAL CONTRACT:
{{original_text}}

AMENDMENT:
{{amendment_text}}`,

  responseSchema: {
    name: 'contextualized_pair',
    strict: true,
    schema: {
      type: 'object',
      additionalProperties: false,
      required: ['original_excerpt', 'amendment_text'],
      properties: {
        original_excerpt: {
          type: 'string',
          description: 'Text of the original contract impacted by the amendment',
        },
        amendment_text: {
          type: 'string',
          description: 'Text of the amendment',
        },
      },
    },
  },
};
