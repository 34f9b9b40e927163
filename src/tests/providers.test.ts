import test from 'node:test';
import assert from 'node:assert/strict';
import { resolveEmbeddingOptions } from '../config/resolver.js';
import {
  EmbeddingProvider,
  MockEmbeddingProvider,
  OpenAIProvider,
  resolveEmbeddingProvider,
  sanitizeEmbeddingInputs
} from '../providers/index.js';
import { ProviderUnavailableError } from '../utils/error-utils.js';

const defaults = resolveEmbeddingOptions({});
const unreachable = async () => false;
const reachable = async () => true;

class ShortProvider extends EmbeddingProvider {
  getDimensions(): number {
    return 3;
  }
  getName(): string {
    return 'short';
  }
  getModelName(): string {
    return 'short-1';
  }
  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    return this.assertVectors(
      texts.map(() => [1, 2]),
      texts.length
    );
  }
}

test('mock vectors are deterministic, normalized and sized', async () => {
  const provider = new MockEmbeddingProvider({ dimensions: 8 });
  const [first, second] = await provider.generateEmbeddings(['alpha', 'beta']);
  const [again] = await provider.generateEmbeddings(['alpha']);

  assert.equal(first.length, 8);
  assert.deepStrictEqual(first, again);
  assert.notDeepStrictEqual(first, second);
  const magnitude = Math.sqrt(first.reduce((sum, value) => sum + value * value, 0));
  assert.ok(Math.abs(magnitude - 1) < 1e-9);
  assert.equal(provider.calls, 2);
  assert.deepStrictEqual(provider.embeddedTexts, ['alpha', 'beta', 'alpha']);
});

test('provider identity is name, model and dimensions', () => {
  assert.deepStrictEqual(new MockEmbeddingProvider().getIdentity(), { name: 'mock', model: 'mock', dimensions: 32 });
  assert.deepStrictEqual(new MockEmbeddingProvider({ name: 'ollama', model: 'm', dimensions: 4 }).getIdentity(), {
    name: 'ollama',
    model: 'm',
    dimensions: 4
  });
});

test('inputs are trimmed, blanks become a space and long text is cut', () => {
  assert.deepStrictEqual(sanitizeEmbeddingInputs(['  code  ', '\n\n', 'abcdef'], 4), ['code', ' ', 'abcd']);
});

test('vectors of the wrong size are rejected', async () => {
  await assert.rejects(new ShortProvider().generateEmbeddings(['x']), {
    message: 'short returned a 2-dimensional embedding at index 0; configured for 3'
  });
});

test('named providers resolve without probing', async () => {
  let probed = false;
  const probe = async () => {
    probed = true;
    return true;
  };

  assert.equal((await resolveEmbeddingProvider(' MOCK ', defaults, probe)).getName(), 'mock');
  assert.equal((await resolveEmbeddingProvider('openai', defaults, probe)).getName(), 'openai');
  const ollama = await resolveEmbeddingProvider('ollama', defaults, probe);
  assert.deepStrictEqual(ollama.getIdentity(), { name: 'ollama', model: 'nomic-embed-text', dimensions: 768 });
  assert.equal(probed, false);
});

test('unknown provider names are unavailable', async () => {
  await assert.rejects(resolveEmbeddingProvider('cohere', defaults, reachable), (error: unknown) => {
    assert.ok(error instanceof ProviderUnavailableError);
    assert.equal(error.code, 'provider_unavailable');
    assert.equal(error.message, 'Unknown embedding provider "cohere"');
    return true;
  });
});

test('auto prefers a local Ollama, then OpenAI with a key', async () => {
  assert.equal((await resolveEmbeddingProvider(undefined, defaults, reachable)).getName(), 'ollama');

  const withKey = resolveEmbeddingOptions({ providers: { openai: { apiKey: 'test-key' } } });
  const openai = await resolveEmbeddingProvider('auto', withKey, unreachable);
  assert.deepStrictEqual(openai.getIdentity(), { name: 'openai', model: 'text-embedding-3-small', dimensions: 1536 });

  await assert.rejects(resolveEmbeddingProvider('auto', defaults, unreachable), ProviderUnavailableError);
});

test('OpenAI without a key cannot initialize', async () => {
  const provider = new OpenAIProvider(defaults.openai);
  await assert.rejects(provider.init(), ProviderUnavailableError);
});
