/**
 * Change Extraction Template
 *
 * Summarizes what the amendment changes in the aligned original excerpt.
 */

import type { PromptTemplate } from './types';

const SECTION_LIST = {
  type: 'array',
  items: { type: 'string' },
};

export const CHANGE_EXTRACTION_TEMPLATE: PromptTemplate = {
  stage: 'change_extraction',
  description: 'Topics touched, sections changed and a per-section change log',

  systemPrompt: `You are a senior contract comparison analyst. Compare the ORIGINAL CONTRACT CONTENT and the AMENDMENT CONTENT and identify the topics touched, the sections changed and the summary of the change.
Return a JSON object with the following fields:
- topics_touched: list of topics touched in the amendment
- sections_changed: list of sections changed in the amendment
- added_sections: list of sections the amendment adds (empty list if none)
- removed_sections: list of sections the amendment removes (empty list if none)
- modified_sections: list of existing sections the amendment modifies (empty list if none)
- summary_of_the_change: summary of the change in the amendment with format Section X: -change_1 \n -change_2, ...`,

  userPromptTemplate: `ORIGINAL CONTRACT CONTENT:
{{original_excerpt}}

AMENDMENT CONTENT:
{{amendment_text}}`,

  responseSchema: {
    name: 'change_summary',
    strict: true,
    schema: {
      type: 'object',
      additionalProperties: false,
      required: [
        'topics_touched',
        'sections_changed',
        'added_sections',
        'removed_sections',
        'modified_sections',
        'summary_of_the_change',
      ],
      properties: {
        topics_touched: SECTION_LIST,
        sections_changed: SECTION_LIST,
        added_sections: SECTION_LIST,
        removed_sections: SECTION_LIST,
        modified_sections: SECTION_LIST,
        summary_of_the_change: { type: 'string' },
      },
    },
  },
};
