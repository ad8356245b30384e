import { afterEach, beforeEach, mock, test } from 'node:test';
import assert from 'node:assert/strict';

import { buildResearchContext, createBriefings, generateCategoryBriefing } from '../briefing.js';
import { MemoryStatusChannel } from '../status.js';
import type { ResearchContext, ResearchState } from '../types.js';
import { FakeCompletionBackend, promptOf } from './fakes.js';

beforeEach(() => {
  mock.method(console, 'error', () => {});
});

afterEach(() => {
  mock.restoreAll();
});

function makeContext(channel: MemoryStatusChannel): ResearchContext {
  return { company: 'Acme', industry: 'Robotics', hq_location: 'Berlin', status_channel: channel, job_id: 'job-1' };
}

const docs = {
  'https://acme.example.com': { title: 'Acme home', content: 'Acme builds warehouse robots.', evaluation: { overall_score: 9 } },
  'https://news.example.com/acme': { title: 'Acme raises', content: 'Acme raised a Series B.', evaluation: { overall_score: 4 } },
};

test('generates a briefing from the category template and ranked documents', async () => {
  const channel = new MemoryStatusChannel();
  const backend = new FakeCompletionBackend(() => '  * Acme builds warehouse robots  \n');

  const briefing = await generateCategoryBriefing(docs, 'company', makeContext(channel), { backend, model: 'test-model' });

  assert.deepEqual(briefing, { category: 'company', content: '* Acme builds warehouse robots' });
  assert.equal(backend.completeCalls.length, 1);

  const request = backend.completeCalls[0];
  assert.equal(request.model, 'test-model');
  assert.equal(request.messages.length, 1);
  assert.equal(request.messages[0].role, 'user');

  const prompt = promptOf(request);
  assert.ok(prompt.startsWith('Create a concise company briefing for Acme, a company in the Robotics industry.'));
  assert.ok(prompt.indexOf('Title: Acme home') < prompt.indexOf('Title: Acme raises'));

  assert.deepEqual(channel.events, [
    {
      job_id: 'job-1',
      status: 'briefing_start',
      message: 'Generating company briefing',
      result: { step: 'Briefing', category: 'company', total_docs: 2 },
    },
    {
      job_id: 'job-1',
      status: 'briefing_complete',
      message: 'Completed company briefing',
      result: { step: 'Briefing', category: 'company' },
    },
  ]);
});

test('returns empty content when the backend fails', async () => {
  const channel = new MemoryStatusChannel();
  const backend = new FakeCompletionBackend(() => {
    throw new Error('503 Service Unavailable');
  });

  const briefing = await generateCategoryBriefing(docs, 'financial', makeContext(channel), { backend, model: 'm' });

  assert.deepEqual(briefing, { category: 'financial', content: '' });
  assert.deepEqual(
    channel.events.map((e) => e.status),
    ['briefing_start']
  );
});

test('returns empty content for a blank response', async () => {
  const channel = new MemoryStatusChannel();
  const backend = new FakeCompletionBackend(() => '   \n ');

  const briefing = await generateCategoryBriefing(docs, 'revenue', makeContext(channel), { backend, model: 'm' });

  assert.equal(briefing.content, '');
  assert.deepEqual(
    channel.events.map((e) => e.status),
    ['briefing_start']
  );
});

test('falls back to the generic template for unknown categories', async () => {
  const backend = new FakeCompletionBackend(() => 'ok');

  const briefing = await generateCategoryBriefing(docs, 'esg', makeContext(new MemoryStatusChannel()), {
    backend,
    model: 'm',
  });

  assert.equal(briefing.category, 'esg');
  assert.ok(
    promptOf(backend.completeCalls[0]).startsWith(
      'Write a focused, insightful research briefing on Acme in the Robotics industry, based on the documents provided.'
    )
  );
});

test('uses template overrides with placeholders filled in', async () => {
  const backend = new FakeCompletionBackend(() => 'ok');

  await generateCategoryBriefing(docs, 'company', makeContext(new MemoryStatusChannel()), {
    backend,
    model: 'm',
    templates: { company: 'Profile {company} ({industry}, {hq_location}).' },
  });

  assert.ok(promptOf(backend.completeCalls[0]).startsWith('Profile Acme (Robotics, Berlin).\nAnalyze the following documents'));
});

test('keeps replacement patterns in names as literal text', async () => {
  const backend = new FakeCompletionBackend(() => 'ok');
  const context: ResearchContext = { company: 'Ca$$h R$&D', industry: "Pay$'ments", hq_location: '$`Berlin' };

  await generateCategoryBriefing(docs, 'company', context, {
    backend,
    model: 'm',
    templates: { company: 'Profile {company} ({industry}, {hq_location}).' },
  });

  assert.ok(
    promptOf(backend.completeCalls[0]).startsWith("Profile Ca$$h R$&D (Pay$'ments, $`Berlin).\nAnalyze the following documents")
  );
});

function makeState(overrides: Partial<ResearchState> = {}): ResearchState {
  return {
    company: 'Acme',
    industry: 'Robotics',
    job_id: 'job-1',
    messages: [],
    ...overrides,
  };
}

test('skips empty categories and generates the rest', async () => {
  const channel = new MemoryStatusChannel();
  const backend = new FakeCompletionBackend((request) =>
    promptOf(request).includes('Create a financial briefing') ? '* Raised $10M' : '* Builds robots'
  );
  const state = makeState({
    status_channel: channel,
    curated_company_data: { docA: { title: 'A', content: 'a', evaluation: { overall_score: 9 } } },
    curated_revenue_data: {},
    curated_financial_data: { docB: { title: 'B', content: 'b', evaluation: { overall_score: 5 } } },
    curated_industry_data: {},
  });

  await createBriefings(state, { backend, model: 'm' });

  assert.equal(backend.completeCalls.length, 2);
  assert.equal(state.revenue_briefing, '');
  assert.equal(state.industry_briefing, '');
  assert.equal(state.company_briefing, '* Builds robots');
  assert.equal(state.financial_briefing, '* Raised $10M');
  assert.deepEqual(state.briefings, { company: '* Builds robots', financial: '* Raised $10M' });

  assert.equal(channel.events[0].status, 'processing');
  assert.deepEqual(channel.events[0].result, { step: 'Briefing' });
  const started = channel.ofStatus('briefing_start').map((e) => e.result.category);
  assert.deepEqual(started.sort(), ['company', 'financial']);
});

test('runs at most two generations at once and waits for all of them', async () => {
  const backend = new FakeCompletionBackend(() => 'text');
  const oneDoc = { d: { title: 'D', content: 'd' } };
  const state = makeState({
    curated_company_data: oneDoc,
    curated_industry_data: oneDoc,
    curated_financial_data: [{ title: 'F', content: 'f' }],
    curated_revenue_data: oneDoc,
  });

  await createBriefings(state, { backend, model: 'm' });

  assert.equal(backend.maxInFlight, 2);
  assert.equal(backend.settled, 4);
  assert.equal(backend.inFlight, 0);
  assert.deepEqual(Object.keys(state.briefings ?? {}).sort(), ['company', 'financial', 'industry', 'revenue']);
});

test('honours a configured concurrency limit', async () => {
  const backend = new FakeCompletionBackend(() => 'text');
  const oneDoc = { d: { title: 'D', content: 'd' } };
  const state = makeState({
    curated_company_data: oneDoc,
    curated_industry_data: oneDoc,
    curated_financial_data: oneDoc,
    curated_revenue_data: oneDoc,
  });

  await createBriefings(state, { backend, model: 'm', concurrency: 1 });

  assert.equal(backend.maxInFlight, 1);
  assert.equal(backend.settled, 4);
});

test('one failed category does not affect the others', async () => {
  const backend = new FakeCompletionBackend((request) => {
    if (promptOf(request).includes('Create a financial briefing')) {
      throw new Error('timeout');
    }
    return 'fine';
  });
  const oneDoc = { d: { title: 'D', content: 'd' } };
  const state = makeState({
    curated_company_data: oneDoc,
    curated_industry_data: oneDoc,
    curated_financial_data: oneDoc,
    curated_revenue_data: oneDoc,
  });

  await createBriefings(state, { backend, model: 'm' });

  assert.equal(state.financial_briefing, '');
  assert.equal(state.company_briefing, 'fine');
  assert.equal(state.industry_briefing, 'fine');
  assert.equal(state.revenue_briefing, 'fine');
  assert.deepEqual(Object.keys(state.briefings ?? {}).sort(), ['company', 'industry', 'revenue']);
});

test('builds the context with defaults for missing metadata', () => {
  const context = buildResearchContext({ company: '', messages: [] });

  assert.equal(context.company, 'Unknown Company');
  assert.equal(context.industry, 'Unknown');
  assert.equal(context.hq_location, 'Unknown');
});

test('a category that fails before reaching the backend still waits for the others', async () => {
  const backend = new FakeCompletionBackend(() => 'text');
  const state = makeState({
    curated_company_data: {
      broken: {
        title: 'Broken',
        get content(): string {
          throw new Error('unreadable document');
        },
      },
    },
    curated_financial_data: { d: { title: 'D', content: 'd' } },
  });

  await createBriefings(state, { backend, model: 'm' });

  assert.equal(state.company_briefing, '');
  assert.equal(state.financial_briefing, 'text');
  assert.equal(backend.completeCalls.length, 1);
  assert.equal(backend.settled, 1);
  assert.equal(backend.inFlight, 0);
  assert.deepEqual(state.briefings, { financial: 'text' });
});
