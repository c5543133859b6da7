/**
 * JSON Schema Validation
 *
 * Decode-then-validate boundary for model output and stored records. Every
 * payload is parsed as untyped JSON, checked against its schema in
 * docs/contracts/, and only then handed out as a frozen typed value.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020, { type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { logger } from './logger';
import { SchemaValidationError } from './errors';
import type { ChangeSummary, ComparisonRecord, ContextualizedPair } from './types';

const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});
addFormats(ajv);

export const SCHEMA_FILES = {
  contextualizedPair: 'contextualized_pair.schema.json',
  changeSummary: 'change_summary.schema.json',
  comparisonRecord: 'comparison_record.schema.json',
} as const;

function loadSchema(schemaName: string): SchemaObject {
  const possiblePaths = [
    // packages/shared/src
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // dist/packages/shared/src
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      return JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
    }
  }

  throw new Error(`Schema file not found: ${schemaName}`);
}

// Compiled lazily on first use
let contextualizedPairValidator: ValidateFunction<ContextualizedPair> | null = null;
let changeSummaryValidator: ValidateFunction<ChangeSummary> | null = null;
let comparisonRecordValidator: ValidateFunction<ComparisonRecord> | null = null;

function getContextualizedPairValidator(): ValidateFunction<ContextualizedPair> {
  if (!contextualizedPairValidator) {
    contextualizedPairValidator = ajv.compile<ContextualizedPair>(
      loadSchema(SCHEMA_FILES.contextualizedPair)
    );
  }
  return contextualizedPairValidator;
}

function getChangeSummaryValidator(): ValidateFunction<ChangeSummary> {
  if (!changeSummaryValidator) {
    changeSummaryValidator = ajv.compile<ChangeSummary>(loadSchema(SCHEMA_FILES.changeSummary));
  }
  return changeSummaryValidator;
}

function getComparisonRecordValidator(): ValidateFunction<ComparisonRecord> {
  if (!comparisonRecordValidator) {
    comparisonRecordValidator = ajv.compile<ComparisonRecord>(
      loadSchema(SCHEMA_FILES.comparisonRecord)
    );
  }
  return comparisonRecordValidator;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`);
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function check<T>(
  schemaName: string,
  validate: ValidateFunction<T>,
  data: unknown
): ValidationResult {
  if (validate(data)) {
    return { valid: true };
  }
  const errors = formatErrors(validate.errors);
  logger.warn(`${schemaName} validation failed`, { errors });
  return { valid: false, errors };
}

export function validateContextualizedPair(data: unknown): ValidationResult {
  return check('ContextualizedPair', getContextualizedPairValidator(), data);
}

export function validateChangeSummary(data: unknown): ValidationResult {
  return check('ChangeSummary', getChangeSummaryValidator(), data);
}

export function validateComparisonRecord(data: unknown): ValidationResult {
  return check('ComparisonRecord', getComparisonRecordValidator(), data);
}

// ============================================================================
// Decoders
// ============================================================================

/**
 * Parse model content as JSON. Throws the parser's SyntaxError untouched.
 */
export function parseJson(content: string): unknown {
  return JSON.parse(content);
}

function freezeList(items: readonly string[] | undefined): readonly string[] | undefined {
  return items === undefined ? undefined : Object.freeze([...items]);
}

export function decodeContextualizedPair(data: unknown): ContextualizedPair {
  const validate = getContextualizedPairValidator();
  if (!validate(data)) {
    throw new SchemaValidationError('ContextualizedPair', formatErrors(validate.errors));
  }
  return Object.freeze({
    original_excerpt: data.original_excerpt,
    amendment_text: data.amendment_text,
  });
}

export function decodeChangeSummary(data: unknown): ChangeSummary {
  const validate = getChangeSummaryValidator();
  if (!validate(data)) {
    throw new SchemaValidationError('ChangeSummary', formatErrors(validate.errors));
  }

  const summary: {
    -readonly [K in keyof ChangeSummary]: ChangeSummary[K];
  } = {
    topics_touched: Object.freeze([...data.topics_touched]),
    sections_changed: Object.freeze([...data.sections_changed]),
    summary_of_the_change: data.summary_of_the_change,
  };
  const added = freezeList(data.added_sections);
  const removed = freezeList(data.removed_sections);
  const modified = freezeList(data.modified_sections);
  if (added) summary.added_sections = added;
  if (removed) summary.removed_sections = removed;
  if (modified) summary.modified_sections = modified;

  return Object.freeze(summary);
}

export function decodeComparisonRecord(data: unknown): ComparisonRecord {
  const validate = getComparisonRecordValidator();
  if (!validate(data)) {
    throw new SchemaValidationError('ComparisonRecord', formatErrors(validate.errors));
  }
  return data;
}
