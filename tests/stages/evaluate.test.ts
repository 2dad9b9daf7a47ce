import { describe, it, expect } from 'vitest';
import { EvaluateStage } from '../../src/stages/evaluate';
import { EVALUATION_SYSTEM_ROLE } from '../../src/prompts';
import { RunContext } from '../../src/state/run-context';
import { FakeLlmClient, FakePageFetcher } from '../helpers/fakes';
import { business, testConfig } from '../helpers/config';

const REPLY = 'ai_fit_category: High: strong match\nai_reasoning: Yes: match\nProspect score: 8';

describe('EvaluateStage', () => {
  it('stores the raw reply, the parsed fields and the prospect score', async () => {
    const client = new FakeLlmClient(() => REPLY);
    const records = [business()];

    const result = await new EvaluateStage(testConfig(), client, new FakePageFetcher()).runStage(
      records,
      new RunContext()
    );

    expect(result.records).toHaveLength(1);
    expect(result.records[0]).toMatchObject({
      aiEvaluationText: REPLY,
      aiFitCategory: 'High',
      aiReasoning: 'Yes: match',
      aiPeopleAssessment: 'Not enough data',
      aiRevenueAssessment: 'Unknown',
      aiProspectScore: 8,
    });
    expect(client.requests[0].systemRole).toBe(EVALUATION_SYSTEM_ROLE);
    expect(client.requests[0].maxTokens).toBe(500);
  });

  it('includes a plain-text excerpt of a known website in the prompt', async () => {
    const client = new FakeLlmClient(() => REPLY);
    const fetcher = new FakePageFetcher({
      'https://acme.test': '<html><script>track()</script><body><h1>About us</h1>\n\n<p>Precision parts</p></body></html>',
    });

    await new EvaluateStage(testConfig(), client, fetcher).runStage(
      [business({ website: 'https://acme.test' })],
      new RunContext()
    );

    expect(fetcher.fetched).toEqual(['https://acme.test']);
    expect(client.requests[0].prompt).toContain('Website excerpt (if any):\nAbout us Precision parts\n');
  });

  it('keeps a record whose evaluation failed, with failure defaults', async () => {
    const client = new FakeLlmClient(({ prompt }) => {
      if (prompt.includes('Broken Co')) {
        throw new Error('timeout');
      }
      return REPLY;
    });
    const records = [business({ placeId: 'x', name: 'Broken Co' }), business({ placeId: 'y' })];

    const result = await new EvaluateStage(testConfig(), client, new FakePageFetcher()).runStage(
      records,
      new RunContext()
    );

    expect(result.records.map((r) => r.placeId)).toEqual(['x', 'y']);
    expect(result.records[0]).toMatchObject({
      aiEvaluationText: 'Error: timeout',
      aiFitCategory: 'Unknown',
      aiReasoning: 'Evaluation failed',
      aiPeopleAssessment: 'Not available',
      aiRevenueAssessment: 'Unknown',
    });
    expect(result.records[1].aiFitCategory).toBe('High');
    expect(result.failed).toBe(1);
  });

  it('passes records beyond the cap through unevaluated', async () => {
    const config = testConfig();
    config.ai.evaluationCap = 1;
    const client = new FakeLlmClient(() => REPLY);

    const result = await new EvaluateStage(config, client, new FakePageFetcher()).runStage(
      [business({ placeId: 'a' }), business({ placeId: 'b' })],
      new RunContext()
    );

    expect(client.requests).toHaveLength(1);
    expect(result.records).toHaveLength(2);
    expect(result.records[1].aiFitCategory).toBeUndefined();
  });
});
