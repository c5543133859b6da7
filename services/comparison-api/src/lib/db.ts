/**
 * Database Operations
 *
 * Creates queued comparisons, marks ones that never reached the queue as
 * failed, and reads stored ones back.
 */

import { Pool } from 'pg';
import {
  logger,
  dbQueryDurationHistogram,
  decodeComparisonRecord,
  type ComparisonRecord,
} from '@contract-delta/shared';

export interface NewComparison {
  comparison_id: string;
  contract_id: string;
  correlation_id: string;
  original_folder: string;
  amendment_folder: string;
}

export interface ComparisonStoreFailure {
  code: string;
  message: string;
}

export interface ComparisonStore {
  create(comparison: NewComparison): Promise<void>;
  fail(comparisonId: string, failure: ComparisonStoreFailure): Promise<void>;
  get(comparisonId: string): Promise<ComparisonRecord | null>;
  ping(): Promise<void>;
}

type ComparisonRow = {
  comparison_id: string;
  contract_id: string;
  correlation_id: string;
  status: string;
  stage: string;
  original_folder: string;
  amendment_folder: string;
  summary: unknown;
  error_code: string | null;
  error_message: string | null;
  created_at: Date;
  updated_at: Date;
};

/**
 * Shape a row as the API record and validate it against
 * comparison_record.schema.json.
 */
export function toComparisonRecord(row: ComparisonRow): ComparisonRecord {
  return decodeComparisonRecord({
    comparison_id: row.comparison_id,
    contract_id: row.contract_id,
    correlation_id: row.correlation_id,
    status: row.status,
    stage: row.stage,
    original_folder: row.original_folder,
    amendment_folder: row.amendment_folder,
    summary: row.summary ?? null,
    error:
      row.error_code !== null
        ? { code: row.error_code, message: row.error_message ?? '' }
        : null,
    created_at: row.created_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
  });
}

export class PgComparisonStore implements ComparisonStore {
  constructor(private readonly pool: Pool) {}

  async create(comparison: NewComparison): Promise<void> {
    const startTime = Date.now();
    try {
      await this.pool.query(
        `INSERT INTO comparisons
           (comparison_id, contract_id, correlation_id, status, stage, original_folder, amendment_folder)
         VALUES ($1, $2, $3, 'queued', 'START', $4, $5)`,
        [
          comparison.comparison_id,
          comparison.contract_id,
          comparison.correlation_id,
          comparison.original_folder,
          comparison.amendment_folder,
        ]
      );
    } finally {
      dbQueryDurationHistogram.observe(
        { operation: 'create_comparison' },
        (Date.now() - startTime) / 1000
      );
    }
  }

  async fail(comparisonId: string, failure: ComparisonStoreFailure): Promise<void> {
    const startTime = Date.now();
    try {
      await this.pool.query(
        `UPDATE comparisons
            SET status = 'failed', stage = 'FAILED', error_code = $2, error_message = $3,
                updated_at = now()
          WHERE comparison_id = $1`,
        [comparisonId, failure.code, failure.message]
      );
    } finally {
      dbQueryDurationHistogram.observe(
        { operation: 'fail_comparison' },
        (Date.now() - startTime) / 1000
      );
    }
  }

  async get(comparisonId: string): Promise<ComparisonRecord | null> {
    const startTime = Date.now();
    try {
      const result = await this.pool.query<ComparisonRow>(
        `SELECT comparison_id, contract_id, correlation_id, status, stage,
                original_folder, amendment_folder, summary, error_code, error_message,
                created_at, updated_at
           FROM comparisons
          WHERE comparison_id = $1`,
        [comparisonId]
      );
      const row = result.rows[0];
      if (!row) {
        return null;
      }
      return toComparisonRecord(row);
    } catch (error) {
      logger.error('Failed to load comparison', error, { comparisonId });
      throw error;
    } finally {
      dbQueryDurationHistogram.observe(
        { operation: 'get_comparison' },
        (Date.now() - startTime) / 1000
      );
    }
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }
}
