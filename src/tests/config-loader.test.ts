import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'path';
import { loadConfig, readEnvConfig } from '../config/loader.js';
import { resolveDebounceMs, resolveEmbeddingOptions, resolveIndexingOptions, resolveStorePath } from '../config/resolver.js';
import { createTempRepo, writeRepoFile } from './helpers/test-repo.js';

test('env overrides project which overrides global', async (t) => {
  const home = await createTempRepo({
    'config.json': JSON.stringify({
      defaultProvider: 'openai',
      providers: { ollama: { host: 'http://global:11434', model: 'global-model' } },
      watch: { debounceMs: 500 }
    })
  });
  const project = await createTempRepo({
    '.codesift/config.json': JSON.stringify({
      providers: { ollama: { model: 'project-model' } },
      indexing: { ignore: ['fixtures/**'] }
    })
  });
  t.after(home.cleanup);
  t.after(project.cleanup);

  const env = { CODESIFT_HOME: home.root, CODESIFT_EMBEDDING_PROVIDER: 'Ollama', CODESIFT_OLLAMA_HOST: 'http://env:11434' };
  const config = loadConfig(project.root, env);

  assert.deepStrictEqual(config, {
    defaultProvider: 'ollama',
    providers: { ollama: { host: 'http://env:11434', model: 'project-model' } },
    watch: { debounceMs: 500 },
    indexing: { ignore: ['fixtures/**'] }
  });
  assert.equal(resolveDebounceMs(config), 500);
  assert.deepStrictEqual(resolveIndexingOptions(config).ignorePatterns, ['fixtures/**']);
});

test('an invalid config file is ignored', async (t) => {
  const home = await createTempRepo({ 'config.json': '{ not json' });
  const project = await createTempRepo({});
  t.after(home.cleanup);
  t.after(project.cleanup);
  await writeRepoFile(project.root, '.codesift/config.json', JSON.stringify({ watch: { debounceMs: -5 } }));

  assert.deepStrictEqual(loadConfig(project.root, { CODESIFT_HOME: home.root }), {});
});

test('environment values are validated', () => {
  const config = readEnvConfig({
    CODESIFT_EMBEDDING_PROVIDER: 'cohere',
    CODESIFT_EMBEDDING_DIMENSIONS: '256',
    CODESIFT_RATE_LIMIT_RPM: 'zero',
    CODESIFT_WATCH_DEBOUNCE_MS: '750',
    OPENAI_API_KEY: 'test-key'
  });

  assert.deepStrictEqual(config, {
    providers: {
      openai: { apiKey: 'test-key', dimensions: 256 },
      ollama: { dimensions: 256 }
    },
    watch: { debounceMs: 750 }
  });
});

test('resolved options fall back to defaults', () => {
  const embedding = resolveEmbeddingOptions({});
  assert.equal(embedding.provider, 'auto');
  assert.deepStrictEqual(embedding.ollama, { host: 'http://127.0.0.1:11434', model: 'nomic-embed-text', dimensions: 768 });
  assert.equal(embedding.openai.model, 'text-embedding-3-small');
  assert.equal(embedding.openai.dimensions, 1536);

  assert.deepStrictEqual(resolveIndexingOptions({}), {
    batchSize: 20,
    maxFileSize: 500_000,
    useTreeSitter: true,
    ignorePatterns: []
  });
  assert.equal(resolveDebounceMs({}), 2000);
  assert.equal(resolveDebounceMs({}, 10), 50);
  assert.equal(resolveStorePath({}, { CODESIFT_HOME: '/var/codesift' }), path.join('/var/codesift', 'index.db'));
  assert.equal(resolveStorePath({ storePath: '/data/index.db' }), '/data/index.db');
});
