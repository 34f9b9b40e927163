import { APIConnectionError, OpenAI } from 'openai';
import type { OpenAIOptions } from '../config/resolver.js';
import { ProviderUnavailableError, getErrorMessage, getErrorStatus, isConnectionError } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import { RateLimiter, type RateLimiterOptions } from '../utils/rate-limiter.js';
import { EmbeddingProvider, estimateTokens, sanitizeEmbeddingInputs } from './base.js';

export class OpenAIProvider extends EmbeddingProvider {
  private openai: OpenAI | null = null;
  private readonly model: string;
  private readonly apiKey?: string;
  private readonly baseUrl?: string;
  private readonly dimensions: number;
  rateLimiter: RateLimiter;

  constructor(options: OpenAIOptions, limits: RateLimiterOptions = {}) {
    super();
    this.model = options.model;
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl;
    this.dimensions = options.dimensions;
    this.rateLimiter = new RateLimiter(limits);
  }

  init(): Promise<void> {
    if (!this.openai) {
      if (!this.apiKey) {
        return Promise.reject(
          new ProviderUnavailableError('OpenAI API key is not configured (set OPENAI_API_KEY or CODESIFT_OPENAI_API_KEY)')
        );
      }
      // Retries are owned by the rate limiter
      this.openai = new OpenAI({ apiKey: this.apiKey, baseURL: this.baseUrl, maxRetries: 0 });
    }
    return Promise.resolve();
  }

  getDimensions(): number {
    return this.dimensions;
  }

  getName(): string {
    return 'openai';
  }

  getModelName(): string {
    return this.model;
  }

  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    await this.init();
    const client = this.openai;
    if (!client) {
      throw new ProviderUnavailableError('OpenAI client failed to initialize');
    }
    if (texts.length === 0) return [];

    const input = sanitizeEmbeddingInputs(texts);
    const estimated = input.reduce((sum, text) => sum + estimateTokens(text), 0);

    try {
      const embeddings = await this.rateLimiter.execute(async () => {
        const response = await client.embeddings.create({
          model: this.model,
          input,
          // Only the v3 models accept a reduced output size
          ...(this.model.startsWith('text-embedding-3') ? { dimensions: this.dimensions } : {})
        });

        if (!Array.isArray(response.data)) {
          throw new Error(`Invalid API response: expected data array, got ${typeof response.data}`);
        }
        return [...response.data].sort((a, b) => a.index - b.index).map(item => item.embedding);
      }, estimated);

      log.debug('OpenAI batch embedded', { items: input.length, estimatedTokens: estimated });
      return this.assertVectors(embeddings, input.length);
    } catch (error) {
      if (error instanceof APIConnectionError || isConnectionError(error)) {
        throw new ProviderUnavailableError(`OpenAI is unreachable: ${getErrorMessage(error)}`, { cause: error });
      }
      log.debug('OpenAI embedding failed', { status: getErrorStatus(error), error: getErrorMessage(error) });
      throw error;
    }
  }
}
