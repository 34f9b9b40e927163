import type { EmbeddingOptions } from '../config/resolver.js';
import type { ProviderName } from '../config/types.js';
import { ProviderUnavailableError } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import type { RateLimiterOptions } from '../utils/rate-limiter.js';
import { EmbeddingProvider } from './base.js';
import { MockEmbeddingProvider } from './mock.js';
import { OllamaProvider, isOllamaReachable } from './ollama.js';
import { OpenAIProvider } from './openai.js';

export * from './base.js';
export * from './mock.js';
export * from './ollama.js';
export * from './openai.js';

function limitsFrom(options: EmbeddingOptions): RateLimiterOptions {
  return { rpm: options.rpm ?? null, tpm: options.tpm ?? null };
}

/**
 * Factory for one named embedding provider.
 *
 * @param providerName - 'openai' | 'ollama' | 'mock'
 */
export function createEmbeddingProvider(providerName: ProviderName, options: EmbeddingOptions): EmbeddingProvider {
  switch (providerName) {
    case 'mock':
      return new MockEmbeddingProvider();
    case 'ollama':
      return new OllamaProvider(options.ollama, limitsFrom(options));
    case 'openai':
      return new OpenAIProvider(options.openai, limitsFrom(options));
  }
}

export type OllamaProbe = (host: string) => Promise<boolean>;

/**
 * Pick the provider for `name` (falling back to `options.provider`). `auto` prefers a
 * local Ollama server, then OpenAI when a key is configured.
 */
export async function resolveEmbeddingProvider(
  name: string | undefined,
  options: EmbeddingOptions,
  probe: OllamaProbe = isOllamaReachable
): Promise<EmbeddingProvider> {
  const selection = name?.trim().toLowerCase() || options.provider;

  switch (selection) {
    case 'openai':
    case 'ollama':
    case 'mock':
      return createEmbeddingProvider(selection, options);
    case 'auto':
      break;
    default:
      throw new ProviderUnavailableError(`Unknown embedding provider "${selection}"`);
  }

  if (await probe(options.ollama.host)) {
    log.debug('Auto-selected Ollama', { host: options.ollama.host });
    return createEmbeddingProvider('ollama', options);
  }
  if (options.openai.apiKey) {
    log.debug('Auto-selected OpenAI');
    return createEmbeddingProvider('openai', options);
  }

  throw new ProviderUnavailableError(
    `No embedding provider available: Ollama did not answer at ${options.ollama.host} and no OpenAI API key is set. ` +
      'Start Ollama (ollama serve) or set OPENAI_API_KEY.'
  );
}
