/**
 * Database Operations
 *
 * Status and stage updates for stored comparisons, written as the pipeline
 * runs.
 */

import { Pool } from 'pg';
import {
  logger,
  dbQueryDurationHistogram,
  type ChangeSummary,
  type StageTransition,
} from '@contract-delta/shared';

export interface ComparisonFailure {
  code: string;
  message: string;
}

export interface ComparisonRepository {
  markRunning(comparisonId: string): Promise<void>;
  recordStage(comparisonId: string, transition: StageTransition): Promise<void>;
  complete(comparisonId: string, summary: ChangeSummary): Promise<void>;
  fail(comparisonId: string, failure: ComparisonFailure): Promise<void>;
}

export class PgComparisonRepository implements ComparisonRepository {
  constructor(private readonly pool: Pool) {}

  private async timed<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    try {
      return await fn();
    } catch (error) {
      logger.error('Database query failed', error, { operation });
      throw error;
    } finally {
      dbQueryDurationHistogram.observe({ operation }, (Date.now() - startTime) / 1000);
    }
  }

  async markRunning(comparisonId: string): Promise<void> {
    await this.timed('mark_running', () =>
      this.pool.query(
        `UPDATE comparisons SET status = 'running', updated_at = now() WHERE comparison_id = $1`,
        [comparisonId]
      )
    );
  }

  async recordStage(comparisonId: string, transition: StageTransition): Promise<void> {
    await this.timed('record_stage', async () => {
      const client = await this.pool.connect();
      try {
        await client.query('BEGIN');
        await client.query(
          `INSERT INTO comparison_stages (comparison_id, stage, reached_at) VALUES ($1, $2, $3)`,
          [comparisonId, transition.stage, transition.at]
        );
        await client.query(
          `UPDATE comparisons SET stage = $2, updated_at = now() WHERE comparison_id = $1`,
          [comparisonId, transition.stage]
        );
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      } finally {
        client.release();
      }
    });
  }

  async complete(comparisonId: string, summary: ChangeSummary): Promise<void> {
    await this.timed('complete', () =>
      this.pool.query(
        `UPDATE comparisons
            SET status = 'completed', summary = $2::jsonb, updated_at = now()
          WHERE comparison_id = $1`,
        [comparisonId, JSON.stringify(summary)]
      )
    );
  }

  async fail(comparisonId: string, failure: ComparisonFailure): Promise<void> {
    await this.timed('fail', () =>
      this.pool.query(
        `UPDATE comparisons
            SET status = 'failed', error_code = $2, error_message = $3, updated_at = now()
          WHERE comparison_id = $1`,
        [comparisonId, failure.code, failure.message]
      )
    );
  }
}
