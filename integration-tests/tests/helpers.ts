/**
 * Test Helpers
 *
 * In-process stand-ins for the model provider, Postgres and the BullMQ queue,
 * plus temporary page-image folders.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type {
  ChangeSummary,
  CompareContractJob,
  ComparisonRecord,
  ModelClient,
  ModelCompletion,
  ModelRequest,
  PipelineSettings,
  StageTransition,
} from '@contract-delta/shared';
import type { ComparisonFailure, ComparisonRepository } from '../../services/worker-comparison/src/lib/db';
import type {
  ComparisonStore,
  ComparisonStoreFailure,
  NewComparison,
} from '../../services/comparison-api/src/lib/db';
import type { ComparisonQueue } from '../../services/comparison-api/src/lib/app';

export const VISION_MODEL = 'openai/gpt-4o';
export const FALLBACK_MODEL = 'google/gemini-2.5-flash';
export const TEXT_MODEL = 'openai/gpt-4o-mini';

export function testSettings(overrides: Partial<PipelineSettings> = {}): PipelineSettings {
  return {
    apiKey: 'test-secret',
    baseUrl: 'http://localhost:0/v1',
    timeoutMs: 1000,
    pageConcurrency: 4,
    text: { model: TEXT_MODEL, style: 'openai' },
    vision: { model: VISION_MODEL, style: 'openai' },
    visionFallback: { model: FALLBACK_MODEL, style: 'systemless' },
    ...overrides,
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// Model stand-in
// ============================================================================

export type ModelHandler = (
  request: ModelRequest,
  index: number
) => string | null | Promise<string | null>;

/**
 * ModelClient that records every request and answers through a handler.
 * A handler that throws makes the call reject.
 */
export class ScriptedModelClient implements ModelClient {
  readonly requests: ModelRequest[] = [];

  constructor(private readonly handler: ModelHandler) {}

  async complete(request: ModelRequest): Promise<ModelCompletion> {
    const index = this.requests.length;
    this.requests.push(request);
    const content = await this.handler(request, index);
    return { content, model: request.model, requestId: `req_test_${index}` };
  }
}

/** The data URL of the image in a vision request, if any. */
export function imageUrlOf(request: ModelRequest): string | null {
  for (const message of request.messages) {
    if (typeof message.content === 'string') continue;
    for (const part of message.content) {
      if (part.type === 'image_url') return part.image_url.url;
    }
  }
  return null;
}

/**
 * Text stored in the page file a vision request carries. Test page files hold
 * plain text standing in for the image, so the fake model "reads" it back.
 */
export function pageContentOf(request: ModelRequest): string | null {
  const url = imageUrlOf(request);
  if (!url) return null;
  return Buffer.from(url.slice(url.indexOf('base64,') + 'base64,'.length), 'base64').toString(
    'utf-8'
  );
}

/** The user message text of a text-only request. */
export function userTextOf(request: ModelRequest): string {
  const user = request.messages.find((message) => message.role === 'user');
  return user && typeof user.content === 'string' ? user.content : '';
}

export type RequestKind = 'vision' | 'contextualization' | 'change_extraction';

export function kindOf(request: ModelRequest): RequestKind {
  if (imageUrlOf(request)) return 'vision';
  return request.responseSchema?.name === 'contextualized_pair'
    ? 'contextualization'
    : 'change_extraction';
}

// ============================================================================
// Page folders
// ============================================================================

const tempDirs: string[] = [];

/**
 * Create a temporary folder holding one file per entry.
 */
export async function makeFolder(files: Record<string, string>): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'contract-delta-'));
  tempDirs.push(dir);
  for (const [name, content] of Object.entries(files)) {
    await fs.writeFile(path.join(dir, name), content);
  }
  return dir;
}

export async function removeTempFolders(): Promise<void> {
  await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
}

// ============================================================================
// Persistence stand-ins
// ============================================================================

export type RepositoryCall =
  | { op: 'markRunning'; comparisonId: string }
  | { op: 'recordStage'; comparisonId: string; stage: StageTransition['stage'] }
  | { op: 'complete'; comparisonId: string; summary: ChangeSummary }
  | { op: 'fail'; comparisonId: string; failure: ComparisonFailure };

export class InMemoryComparisonRepository implements ComparisonRepository {
  readonly calls: RepositoryCall[] = [];
  failOnFail = false;

  async markRunning(comparisonId: string): Promise<void> {
    this.calls.push({ op: 'markRunning', comparisonId });
  }

  async recordStage(comparisonId: string, transition: StageTransition): Promise<void> {
    this.calls.push({ op: 'recordStage', comparisonId, stage: transition.stage });
  }

  async complete(comparisonId: string, summary: ChangeSummary): Promise<void> {
    this.calls.push({ op: 'complete', comparisonId, summary });
  }

  async fail(comparisonId: string, failure: ComparisonFailure): Promise<void> {
    if (this.failOnFail) {
      throw new Error('database unavailable');
    }
    this.calls.push({ op: 'fail', comparisonId, failure });
  }
}

export class InMemoryComparisonStore implements ComparisonStore {
  readonly records = new Map<string, ComparisonRecord>();
  healthy = true;

  async create(comparison: NewComparison): Promise<void> {
    const now = new Date().toISOString();
    this.records.set(comparison.comparison_id, {
      ...comparison,
      status: 'queued',
      stage: 'START',
      summary: null,
      error: null,
      created_at: now,
      updated_at: now,
    });
  }

  async fail(comparisonId: string, failure: ComparisonStoreFailure): Promise<void> {
    const record = this.records.get(comparisonId);
    if (!record) return;
    this.records.set(comparisonId, {
      ...record,
      status: 'failed',
      stage: 'FAILED',
      error: { ...failure },
      updated_at: new Date().toISOString(),
    });
  }

  async get(comparisonId: string): Promise<ComparisonRecord | null> {
    return this.records.get(comparisonId) ?? null;
  }

  async ping(): Promise<void> {
    if (!this.healthy) {
      throw new Error('connection refused');
    }
  }
}

export class FakeQueue implements ComparisonQueue {
  readonly jobs: Array<{ name: string; data: CompareContractJob; jobId?: string }> = [];
  waiting = 0;
  active = 0;
  addError: Error | null = null;

  async add(name: string, data: CompareContractJob, opts?: { jobId?: string }): Promise<unknown> {
    if (this.addError) {
      throw this.addError;
    }
    this.jobs.push({ name, data, jobId: opts?.jobId });
    return { id: opts?.jobId };
  }

  async getWaitingCount(): Promise<number> {
    return this.waiting;
  }

  async getActiveCount(): Promise<number> {
    return this.active;
  }

  async getCompletedCount(): Promise<number> {
    return 0;
  }

  async getFailedCount(): Promise<number> {
    return 0;
  }

  async getDelayedCount(): Promise<number> {
    return 0;
  }
}
