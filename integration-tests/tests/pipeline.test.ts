/**
 * Pipeline Runner tests
 *
 * End-to-end over temporary page folders with a scripted model.
 */

import {
  ContextualizationError,
  PageExtractionError,
  runComparison,
  runWithContextAsync,
  type ModelRequest,
  type PipelineStage,
  type StageTransition,
} from '@contract-delta/shared';
import {
  ScriptedModelClient,
  kindOf,
  makeFolder,
  pageContentOf,
  removeTempFolders,
  testSettings,
  userTextOf,
} from './helpers';

const ORIGINAL_PAGES = {
  '01.png': 'MASTER SERVICES AGREEMENT\nSection 4 - Fees\nFees are due monthly.\n',
  '02.png': 'Section 5 – Termination\nEither party may terminate with 30 days notice.',
};
const AMENDMENT_PAGES = {
  '01.png': 'AMENDMENT NO. 1\nSection 5 – Termination is amended: either party may terminate with 60 days notice.',
};

const ORIGINAL_TEXT = ORIGINAL_PAGES['01.png'] + ORIGINAL_PAGES['02.png'];
const AMENDMENT_TEXT = AMENDMENT_PAGES['01.png'];

const PAIR = {
  original_excerpt: 'Section 5 – Termination\nEither party may terminate with 30 days notice.',
  amendment_text: 'Section 5 – Termination is amended: either party may terminate with 60 days notice.',
};

const SUMMARY = {
  topics_touched: ['Termination'],
  sections_changed: ['Section 5 – Termination'],
  summary_of_the_change: 'Section 5: -notice period for termination extended from 30 days to 60 days',
  added_sections: [],
  removed_sections: [],
  modified_sections: ['Section 5 – Termination'],
};

type Overrides = Partial<Record<'contextualization' | 'change_extraction', (request: ModelRequest) => string>>;

function scriptedPipeline(overrides: Overrides = {}): ScriptedModelClient {
  return new ScriptedModelClient((request) => {
    const kind = kindOf(request);
    if (kind === 'vision') return pageContentOf(request);
    const override = overrides[kind];
    if (override) return override(request);
    return kind === 'contextualization' ? JSON.stringify(PAIR) : JSON.stringify(SUMMARY);
  });
}

async function folders(): Promise<{ originalFolder: string; amendmentFolder: string }> {
  return {
    originalFolder: await makeFolder(ORIGINAL_PAGES),
    amendmentFolder: await makeFolder(AMENDMENT_PAGES),
  };
}

describe('runComparison', () => {
  afterAll(removeTempFolders);

  it('summarizes the termination notice change', async () => {
    const client = scriptedPipeline();
    const observed: StageTransition[] = [];

    const result = await runComparison(
      { contractId: 'msa-001', ...(await folders()) },
      { client, settings: testSettings(), onStageChange: (t) => void observed.push(t) }
    );

    expect(result.summary).toEqual(SUMMARY);
    expect(result.contextualized).toEqual(PAIR);
    expect(result.contract_id).toBe('msa-001');
    expect(result.original_length).toBe(ORIGINAL_TEXT.length);
    expect(result.amendment_length).toBe(AMENDMENT_TEXT.length);

    const expectedStages: PipelineStage[] = [
      'START',
      'ORIGINAL_PARSED',
      'AMENDMENT_PARSED',
      'CONTEXTUALIZED',
      'SUMMARIZED',
    ];
    expect(result.stages.map((s) => s.stage)).toEqual(expectedStages);
    expect(observed.map((s) => s.stage)).toEqual(expectedStages);
  });

  it('contextualizes the full assembled documents', async () => {
    const client = scriptedPipeline();

    await runComparison({ contractId: 'msa-001', ...(await folders()) }, { client, settings: testSettings() });

    const contextualization = client.requests.filter((r) => kindOf(r) === 'contextualization');
    expect(contextualization).toHaveLength(1);
    expect(userTextOf(contextualization[0])).toBe(
      `ORIGINAL CONTRACT:\n${ORIGINAL_TEXT}\n\nAMENDMENT:\n${AMENDMENT_TEXT}`
    );
  });

  it('hands the contextualized pair to the change extractor unchanged', async () => {
    const client = scriptedPipeline();

    await runComparison({ contractId: 'msa-001', ...(await folders()) }, { client, settings: testSettings() });

    const extraction = client.requests.filter((r) => kindOf(r) === 'change_extraction');
    expect(extraction).toHaveLength(1);
    expect(userTextOf(extraction[0])).toBe(
      `ORIGINAL CONTRACT CONTENT:\n${PAIR.original_excerpt}\n\nAMENDMENT CONTENT:\n${PAIR.amendment_text}`
    );
  });

  it('reads every page of both documents', async () => {
    const client = scriptedPipeline();

    await runComparison({ contractId: 'msa-001', ...(await folders()) }, { client, settings: testSettings() });

    expect(client.requests.filter((r) => kindOf(r) === 'vision')).toHaveLength(3);
  });

  it('carries the caller correlation id', async () => {
    const client = scriptedPipeline();
    const request = { contractId: 'msa-001', ...(await folders()) };

    const result = await runWithContextAsync({ correlationId: 'corr-test-1' }, () =>
      runComparison(request, { client, settings: testSettings() })
    );

    expect(result.correlation_id).toBe('corr-test-1');
  });

  it('stops at FAILED when contextualization is rejected', async () => {
    const client = scriptedPipeline({ contextualization: () => '{"original_excerpt": "x"}' });
    const observed: PipelineStage[] = [];

    await expect(
      runComparison(
        { contractId: 'msa-001', ...(await folders()) },
        { client, settings: testSettings(), onStageChange: (t) => void observed.push(t.stage) }
      )
    ).rejects.toThrow(ContextualizationError);

    expect(observed).toEqual(['START', 'ORIGINAL_PARSED', 'AMENDMENT_PARSED', 'FAILED']);
    expect(client.requests.filter((r) => kindOf(r) === 'change_extraction')).toHaveLength(0);
  });

  it('stops at FAILED when a page cannot be read', async () => {
    const client = new ScriptedModelClient((request) => {
      if (kindOf(request) === 'vision') throw new Error('model unavailable');
      return null;
    });
    const observed: PipelineStage[] = [];

    await expect(
      runComparison(
        { contractId: 'msa-001', ...(await folders()) },
        { client, settings: testSettings(), onStageChange: (t) => void observed.push(t.stage) }
      )
    ).rejects.toThrow(PageExtractionError);

    expect(observed).toEqual(['START', 'FAILED']);
    expect(client.requests.filter((r) => kindOf(r) !== 'vision')).toHaveLength(0);
  });

  it('ignores a failing stage observer', async () => {
    const client = scriptedPipeline();

    const result = await runComparison(
      { contractId: 'msa-001', ...(await folders()) },
      {
        client,
        settings: testSettings(),
        onStageChange: () => {
          throw new Error('observer broke');
        },
      }
    );

    expect(result.summary).toEqual(SUMMARY);
  });
});
