/**
 * Shared TypeScript Types
 *
 * Types for the contract comparison pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Page Images
// ============================================================================

export type ImageExtension = 'png' | 'jpg' | 'jpeg' | 'gif' | 'bmp' | 'tiff' | 'webp';

/** One page of a contract, ordered by filename. */
export interface PageImage {
  readonly path: string;
  readonly filename: string;
  readonly mimeType: string;
}

// ============================================================================
// Stage Outputs
// ============================================================================

/**
 * Contextualizer output: the slice of the original impacted by the
 * amendment, plus the amendment text.
 */
export interface ContextualizedPair {
  readonly original_excerpt: string;
  readonly amendment_text: string;
}

/**
 * Terminal artifact of the pipeline.
 */
export interface ChangeSummary {
  readonly topics_touched: readonly string[];
  readonly sections_changed: readonly string[];
  readonly summary_of_the_change: string;
  readonly added_sections?: readonly string[];
  readonly removed_sections?: readonly string[];
  readonly modified_sections?: readonly string[];
}

// ============================================================================
// Pipeline State
// ============================================================================

export type PipelineStage =
  | 'START'
  | 'ORIGINAL_PARSED'
  | 'AMENDMENT_PARSED'
  | 'CONTEXTUALIZED'
  | 'SUMMARIZED'
  | 'FAILED';

export interface StageTransition {
  stage: PipelineStage;
  at: string;
}

export interface ComparisonRequest {
  contractId: string;
  originalFolder: string;
  amendmentFolder: string;
}

export interface ComparisonResult {
  contract_id: string;
  correlation_id: string;
  summary: ChangeSummary;
  contextualized: ContextualizedPair;
  original_length: number;
  amendment_length: number;
  stages: StageTransition[];
  duration_ms: number;
}

// ============================================================================
// Stored Comparisons
// ============================================================================

export type ComparisonStatus = 'queued' | 'running' | 'completed' | 'failed';

export interface ComparisonRecord {
  comparison_id: string;
  contract_id: string;
  correlation_id: string;
  status: ComparisonStatus;
  stage: PipelineStage;
  original_folder: string;
  amendment_folder: string;
  summary: ChangeSummary | null;
  error: { code: string; message: string } | null;
  created_at: string;
  updated_at: string;
}

// ============================================================================
// API
// ============================================================================

export interface CreateComparisonRequest {
  contract_id: string;
  original_folder: string;
  amendment_folder: string;
}

export interface CreateComparisonResponse {
  comparison_id: string;
  correlation_id: string;
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
