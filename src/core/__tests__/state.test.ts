import { afterEach, beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { ConfigError } from '../config.js';
import { loadResearchState, parseResearchState, serializeResearchState } from '../state.js';
import { MemoryStatusChannel } from '../status.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'dossier-state-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

test('parses curated datasets in either shape', () => {
  const state = parseResearchState({
    company: 'Acme',
    industry: 'Robotics',
    curated_company_data: {
      'https://acme.example.com': {
        title: 'Acme',
        content: 'Robots.',
        raw_content: null,
        evaluation: { overall_score: '0.8', reason: 'relevant' },
        source: 'search',
      },
    },
    curated_financial_data: [{ title: 'Funding', content: 'Series A.', evaluation: { overall_score: 0.6 } }],
  });

  assert.equal(state.company, 'Acme');
  assert.deepEqual(state.messages, []);
  assert.deepEqual(state.curated_company_data, {
    'https://acme.example.com': {
      title: 'Acme',
      content: 'Robots.',
      raw_content: undefined,
      evaluation: { overall_score: '0.8', reason: 'relevant' },
      source: 'search',
    },
  });
  assert.deepEqual(state.curated_financial_data, [
    { title: 'Funding', content: 'Series A.', evaluation: { overall_score: 0.6 } },
  ]);
});

test('attaches the status channel', () => {
  const channel = new MemoryStatusChannel();

  const state = parseResearchState({ company: 'Acme', job_id: 'job-1' }, channel);

  assert.equal(state.status_channel, channel);
  assert.equal(state.job_id, 'job-1');
});

test('lists every problem in invalid input', () => {
  assert.throws(
    () => parseResearchState({ company: '', references: 'https://example.com' }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      const lines = error.message.split('\n');
      assert.equal(lines[0], 'Invalid research state:');
      assert.ok(lines.some((line) => line.startsWith('  - company: ')));
      assert.ok(lines.some((line) => line.startsWith('  - references: ')));
      return true;
    }
  );
});

test('loads state from a JSON file', async () => {
  const file = path.join(dir, 'state.json');
  await writeFile(file, JSON.stringify({ company: 'Acme', references: ['https://acme.example.com'] }));

  const state = await loadResearchState(file);

  assert.deepEqual(state.references, ['https://acme.example.com']);
});

test('rejects a file that is not JSON', async () => {
  const file = path.join(dir, 'state.json');
  await writeFile(file, 'company: Acme');

  await assert.rejects(loadResearchState(file), (error: unknown) => {
    assert.ok(error instanceof ConfigError);
    assert.ok(error.message.startsWith(`${file} is not valid JSON: `));
    return true;
  });
});

test('serializes without the status channel', () => {
  const state = parseResearchState({ company: 'Acme' }, new MemoryStatusChannel());
  state.report = '# Acme Research Report';

  assert.deepEqual(JSON.parse(serializeResearchState(state)), {
    company: 'Acme',
    messages: [],
    report: '# Acme Research Report',
  });
});
