import type { PipelineSettings } from '../config';
import type { ModelClient } from '../llm/types';

/**
 * Collaborators every model-backed stage receives explicitly.
 */
export interface StageDeps {
  client: ModelClient;
  settings: PipelineSettings;
}
