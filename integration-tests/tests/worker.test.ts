/**
 * Comparison Worker tests
 *
 * Job processing against an in-memory repository.
 */

import { PageExtractionError, type CompareContractJob } from '@contract-delta/shared';
import {
  describeFailure,
  processCompareContract,
} from '../../services/worker-comparison/src/lib/process';
import {
  InMemoryComparisonRepository,
  ScriptedModelClient,
  kindOf,
  makeFolder,
  pageContentOf,
  removeTempFolders,
  testSettings,
} from './helpers';

const SUMMARY = {
  topics_touched: ['Confidentiality'],
  sections_changed: ['Section 8'],
  summary_of_the_change: 'Section 8: -confidentiality term extended to five years',
};

const COMPARISON_ID = '6f1c2a43-5d2e-4c8b-9a57-0d1e2f3a4b5c';

async function job(): Promise<{ id: string; data: CompareContractJob; attemptsMade: number }> {
  return {
    id: COMPARISON_ID,
    attemptsMade: 0,
    data: {
      correlation_id: 'corr-worker-1',
      comparison_id: COMPARISON_ID,
      contract_id: 'nda-42',
      original_folder: await makeFolder({ 'p1.png': 'Section 8 Confidentiality: three years.' }),
      amendment_folder: await makeFolder({ 'p1.png': 'Section 8 is amended: five years.' }),
    },
  };
}

function pipelineClient(contextualization = '{"original_excerpt": "Section 8 Confidentiality: three years.", "amendment_text": "Section 8 is amended: five years."}'): ScriptedModelClient {
  return new ScriptedModelClient((request) => {
    switch (kindOf(request)) {
      case 'vision':
        return pageContentOf(request);
      case 'contextualization':
        return contextualization;
      case 'change_extraction':
        return JSON.stringify(SUMMARY);
    }
  });
}

describe('processCompareContract', () => {
  afterAll(removeTempFolders);

  it('marks the comparison running, records stages and stores the summary', async () => {
    const repository = new InMemoryComparisonRepository();

    const summary = await processCompareContract(await job(), {
      repository,
      client: pipelineClient(),
      settings: testSettings(),
    });

    expect(summary).toEqual(SUMMARY);
    expect(repository.calls.map((c) => (c.op === 'recordStage' ? c.stage : c.op))).toEqual([
      'markRunning',
      'START',
      'ORIGINAL_PARSED',
      'AMENDMENT_PARSED',
      'CONTEXTUALIZED',
      'SUMMARIZED',
      'complete',
    ]);
    expect(repository.calls.every((c) => c.comparisonId === COMPARISON_ID)).toBe(true);
  });

  it('stores the failure and rethrows it', async () => {
    const repository = new InMemoryComparisonRepository();
    const client = new ScriptedModelClient(() => {
      throw new Error('provider outage');
    });

    const error = await processCompareContract(await job(), {
      repository,
      client,
      settings: testSettings(),
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PageExtractionError);
    const last = repository.calls[repository.calls.length - 1];
    expect(last.op).toBe('fail');
    if (last.op !== 'fail' || !(error instanceof PageExtractionError)) return;
    expect(last.failure).toEqual({ code: 'page_extraction_failed', message: error.message });
    expect(repository.calls.map((c) => (c.op === 'recordStage' ? c.stage : c.op))).toEqual([
      'markRunning',
      'START',
      'FAILED',
      'fail',
    ]);
  });

  it('rethrows the pipeline error when the failure cannot be stored', async () => {
    const repository = new InMemoryComparisonRepository();
    repository.failOnFail = true;

    await expect(
      processCompareContract(await job(), {
        repository,
        client: pipelineClient('not json'),
        settings: testSettings(),
      })
    ).rejects.toThrow('Contextualization response rejected');
  });
});

describe('describeFailure', () => {
  it('uses the error code of pipeline errors', () => {
    const error = new PageExtractionError('/pages/p1.png', 'a', 'b', new Error('x'), new Error('y'));
    expect(describeFailure(error).code).toBe('page_extraction_failed');
  });

  it('falls back to internal_error', () => {
    expect(describeFailure(new Error('disk full'))).toEqual({
      code: 'internal_error',
      message: 'disk full',
    });
    expect(describeFailure('weird')).toEqual({ code: 'internal_error', message: 'weird' });
  });
});
