import { afterEach, beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import {
  ConfigError,
  DEFAULT_BRIEFING_CONCURRENCY,
  DEFAULT_MAX_DOC_LENGTH,
  DEFAULT_MAX_PROMPT_LENGTH,
  isSettableKey,
  loadDossierConfig,
  maskSecret,
  parseSettingValue,
  saveDossierConfig,
} from '../config.js';

let dir: string;
let configPath: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'dossier-config-'));
  configPath = path.join(dir, 'config.json');
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

test('uses defaults when nothing is configured', async () => {
  const config = await loadDossierConfig({}, configPath);

  assert.deepEqual(config, {
    provider: 'openai',
    openaiApiKey: undefined,
    openaiBaseUrl: undefined,
    anthropicApiKey: undefined,
    briefingModel: 'gpt-4o-mini',
    editorModel: 'gpt-4o',
    briefingConcurrency: DEFAULT_BRIEFING_CONCURRENCY,
    maxDocLength: DEFAULT_MAX_DOC_LENGTH,
    maxPromptLength: DEFAULT_MAX_PROMPT_LENGTH,
    requestTimeoutMs: 600_000,
    templates: {},
  });
});

test('defaults to anthropic when only its key is present', async () => {
  const config = await loadDossierConfig({ ANTHROPIC_API_KEY: 'test-key' }, configPath);

  assert.equal(config.provider, 'anthropic');
  assert.equal(config.briefingModel, 'claude-sonnet-4-20250514');
  assert.equal(config.editorModel, 'claude-sonnet-4-20250514');
});

test('environment overrides the config file', async () => {
  await writeFile(
    configPath,
    JSON.stringify({
      provider: 'anthropic',
      anthropic_api_key: 'file-key',
      openai_api_key: 'file-openai-key',
      briefing_model: 'file-briefing',
      briefing_concurrency: 4,
      max_doc_length: 500,
      templates: { company: 'Profile {company}.' },
    })
  );

  const config = await loadDossierConfig(
    { DOSSIER_PROVIDER: 'openai', OPENAI_API_KEY: 'env-key', DOSSIER_BRIEFING_CONCURRENCY: '3' },
    configPath
  );

  assert.equal(config.provider, 'openai');
  assert.equal(config.openaiApiKey, 'env-key');
  assert.equal(config.anthropicApiKey, 'file-key');
  assert.equal(config.briefingModel, 'file-briefing');
  assert.equal(config.editorModel, 'gpt-4o');
  assert.equal(config.briefingConcurrency, 3);
  assert.equal(config.maxDocLength, 500);
  assert.deepEqual(config.templates, { company: 'Profile {company}.' });
});

test('rejects invalid environment values', async () => {
  await assert.rejects(loadDossierConfig({ DOSSIER_PROVIDER: 'cohere' }, configPath), ConfigError);
  await assert.rejects(loadDossierConfig({ DOSSIER_BRIEFING_CONCURRENCY: '0' }, configPath), {
    name: 'ConfigError',
    message: 'DOSSIER_BRIEFING_CONCURRENCY must be a positive integer (got "0")',
  });
});

test('rejects a malformed config file', async () => {
  await writeFile(configPath, '{ not json');
  await assert.rejects(loadDossierConfig({}, configPath), ConfigError);

  await writeFile(configPath, JSON.stringify({ briefing_concurrency: -1 }));
  await assert.rejects(loadDossierConfig({}, configPath), (error: unknown) => {
    assert.ok(error instanceof ConfigError);
    assert.ok(error.message.includes('  - briefing_concurrency: '));
    return true;
  });
});

test('saves settings merged into the existing file', async () => {
  await saveDossierConfig({ openai_api_key: 'test-key' }, configPath);
  await saveDossierConfig({ briefing_concurrency: 5 }, path.join(dir, 'config.json'));

  const saved: unknown = JSON.parse(await readFile(configPath, 'utf-8'));
  assert.deepEqual(saved, { version: 1, openai_api_key: 'test-key', briefing_concurrency: 5 });

  const config = await loadDossierConfig({}, configPath);
  assert.equal(config.briefingConcurrency, 5);
});

test('refuses to save an invalid setting', async () => {
  await assert.rejects(saveDossierConfig({ provider: 'cohere' }, configPath), ConfigError);
  await assert.rejects(readFile(configPath, 'utf-8'), { code: 'ENOENT' });
});

test('parses settable keys from the command line', () => {
  assert.equal(isSettableKey('editor_model'), true);
  assert.equal(isSettableKey('templates'), false);
  assert.equal(parseSettingValue('briefing_concurrency', '3'), 3);
  assert.equal(parseSettingValue('editor_model', 'gpt-4o'), 'gpt-4o');
});

test('masks secrets down to their last four characters', () => {
  assert.equal(maskSecret(undefined), '(not set)');
  assert.equal(maskSecret('short'), '****');
  assert.equal(maskSecret('test-secret-1234'), '****1234');
});
