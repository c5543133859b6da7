/**
 * Error Taxonomy
 *
 * Only the page extractor recovers locally (via the fallback vision model).
 * Every other error here reaches the pipeline's caller as-is.
 */

export type ErrorCode =
  | 'page_extraction_failed'
  | 'page_read_failed'
  | 'empty_model_response'
  | 'schema_validation_failed'
  | 'contextualization_failed'
  | 'change_extraction_failed'
  | 'configuration_error'
  | 'usage_error';

export abstract class ContractDeltaError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * A model answered with empty or whitespace-only content.
 */
export class EmptyModelResponseError extends ContractDeltaError {
  readonly code = 'empty_model_response';

  constructor(readonly model: string) {
    super(`Empty response from model ${model}`);
  }
}

/**
 * Both the primary and the fallback vision model failed for one page.
 */
export class PageExtractionError extends ContractDeltaError {
  readonly code = 'page_extraction_failed';

  constructor(
    readonly imagePath: string,
    readonly primaryModel: string,
    readonly fallbackModel: string,
    readonly primaryCause: unknown,
    readonly fallbackCause: unknown
  ) {
    super(
      `Failed to extract text from ${imagePath}: primary model ${primaryModel} failed ` +
        `(${describeCause(primaryCause)}) and fallback model ${fallbackModel} failed ` +
        `(${describeCause(fallbackCause)})`,
      { cause: fallbackCause }
    );
  }
}

/**
 * A page image could not be read from disk.
 */
export class PageReadError extends ContractDeltaError {
  readonly code = 'page_read_failed';

  constructor(
    readonly imagePath: string,
    cause: unknown
  ) {
    super(`Failed to read page image ${imagePath}: ${describeCause(cause)}`, { cause });
  }
}

/**
 * A payload failed validation against one of the contract schemas.
 */
export class SchemaValidationError extends ContractDeltaError {
  readonly code = 'schema_validation_failed';

  constructor(
    readonly schemaName: string,
    readonly errors: string[]
  ) {
    super(`${schemaName} failed validation: ${errors.join('; ')}`);
  }
}

export class ContextualizationError extends ContractDeltaError {
  readonly code = 'contextualization_failed';
}

export class ChangeExtractionError extends ContractDeltaError {
  readonly code = 'change_extraction_failed';
}

export class ConfigurationError extends ContractDeltaError {
  readonly code = 'configuration_error';

  constructor(readonly missing: string[]) {
    super(`Missing required configuration: ${missing.join(', ')}`);
  }
}

export class UsageError extends ContractDeltaError {
  readonly code = 'usage_error';
}

export function isContractDeltaError(error: unknown): error is ContractDeltaError {
  return error instanceof ContractDeltaError;
}
