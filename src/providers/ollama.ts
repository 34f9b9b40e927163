import type { Ollama } from 'ollama';
import { EMBEDDING_CONSTANTS } from '../config/constants.js';
import type { OllamaOptions } from '../config/resolver.js';
import { ProviderUnavailableError, getErrorMessage, isConnectionError } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import { RateLimiter, type RateLimiterOptions } from '../utils/rate-limiter.js';
import { EmbeddingProvider, estimateTokens, sanitizeEmbeddingInputs } from './base.js';

function isContextLengthError(error: unknown): boolean {
  return getErrorMessage(error).toLowerCase().includes('context length');
}

async function createClient(host: string): Promise<Ollama> {
  try {
    const module = await import('ollama');
    return new module.Ollama({ host });
  } catch (error) {
    throw new ProviderUnavailableError('The ollama client library could not be loaded', { cause: error });
  }
}

/**
 * True when an Ollama server answers at `host` within `timeoutMs`
 */
export async function isOllamaReachable(
  host: string = EMBEDDING_CONSTANTS.OLLAMA_DEFAULT_HOST,
  timeoutMs: number = EMBEDDING_CONSTANTS.OLLAMA_PROBE_TIMEOUT_MS
): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  try {
    const client = await createClient(host);
    const timeout = new Promise<false>(resolve => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    return await Promise.race([client.list().then(() => true), timeout]);
  } catch (error) {
    log.debug('Ollama probe failed', { host, error: getErrorMessage(error) });
    return false;
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export class OllamaProvider extends EmbeddingProvider {
  private ollama: Ollama | null = null;
  private readonly host: string;
  private readonly model: string;
  private readonly dimensions: number;
  rateLimiter: RateLimiter;

  constructor(options: OllamaOptions, limits: RateLimiterOptions = {}) {
    super();
    this.host = options.host;
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.rateLimiter = new RateLimiter(limits);
  }

  async init(): Promise<void> {
    if (!this.ollama) {
      this.ollama = await createClient(this.host);
    }
  }

  getDimensions(): number {
    return this.dimensions;
  }

  getName(): string {
    return 'ollama';
  }

  getModelName(): string {
    return this.model;
  }

  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    await this.init();
    if (texts.length === 0) return [];

    const input = sanitizeEmbeddingInputs(texts);
    try {
      let embeddings: number[][];
      try {
        embeddings = await this.embed(input);
      } catch (error) {
        if (!isContextLengthError(error)) throw error;
        log.debug('Ollama context length exceeded, embedding one input at a time', { items: input.length });
        embeddings = [];
        for (const text of input) {
          embeddings.push(await this.embedWithShrinking(text));
        }
      }
      return this.assertVectors(embeddings, input.length);
    } catch (error) {
      if (isConnectionError(error)) {
        throw new ProviderUnavailableError(`Ollama is not reachable at ${this.host}: ${getErrorMessage(error)}`, {
          cause: error
        });
      }
      throw error;
    }
  }

  /**
   * Halve the input until the model accepts it, never below the minimum length
   */
  private async embedWithShrinking(text: string): Promise<number[]> {
    let limit = text.length;
    for (;;) {
      try {
        const [embedding] = await this.embed([text.slice(0, limit)]);
        return embedding;
      } catch (error) {
        if (!isContextLengthError(error) || limit <= EMBEDDING_CONSTANTS.MIN_INPUT_CHARS) throw error;
        limit = Math.max(EMBEDDING_CONSTANTS.MIN_INPUT_CHARS, Math.floor(limit / 2));
      }
    }
  }

  private async embed(input: string[]): Promise<number[][]> {
    const client = this.ollama;
    if (!client) {
      throw new ProviderUnavailableError('Ollama client failed to initialize');
    }
    const estimated = input.reduce((sum, text) => sum + estimateTokens(text), 0);
    const response = await this.rateLimiter.execute(() => client.embed({ model: this.model, input }), estimated);
    if (!response.embeddings.length) {
      throw new Error(`Ollama returned no embeddings for model '${this.model}'. Pull it with: ollama pull ${this.model}`);
    }
    return response.embeddings;
  }
}
