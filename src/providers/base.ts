import { EMBEDDING_CONSTANTS } from '../config/constants.js';
import type { ProviderIdentity } from '../utils/error-utils.js';
import type { RateLimiter } from '../utils/rate-limiter.js';

export abstract class EmbeddingProvider {
  abstract getDimensions(): number;
  /** Stable identifier stored with the collection: `openai`, `ollama`, `mock` */
  abstract getName(): string;
  abstract getModelName(): string;

  /**
   * Embed a batch in as few calls as the backend allows. The result has one vector
   * per input, in input order.
   */
  abstract generateEmbeddings(texts: string[]): Promise<number[][]>;

  rateLimiter?: RateLimiter;

  /**
   * Connect or validate credentials. Throws ProviderUnavailableError when the
   * backend cannot be used.
   */
  init(): Promise<void> {
    return Promise.resolve();
  }

  async generateEmbedding(text: string): Promise<number[]> {
    const [embedding] = await this.generateEmbeddings([text]);
    return embedding;
  }

  getIdentity(): ProviderIdentity {
    return {
      name: this.getName(),
      model: this.getModelName(),
      dimensions: this.getDimensions()
    };
  }

  protected assertVectors(vectors: number[][], expected: number): number[][] {
    if (vectors.length !== expected) {
      throw new Error(`${this.getName()} returned ${vectors.length} embeddings but expected ${expected}`);
    }
    const dimensions = this.getDimensions();
    vectors.forEach((vector, index) => {
      if (vector.length !== dimensions) {
        throw new Error(
          `${this.getName()} returned a ${vector.length}-dimensional embedding at index ${index}; ` +
            `configured for ${dimensions}`
        );
      }
    });
    return vectors;
  }
}

// Estimate tokens from text (4 chars ≈ 1 token)
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Trim each input, replace empty ones with a single space and cut to the character limit
 */
export function sanitizeEmbeddingInputs(
  texts: readonly string[],
  maxChars: number = EMBEDDING_CONSTANTS.MAX_INPUT_CHARS
): string[] {
  return texts.map(text => (text.trim() || ' ').slice(0, maxChars));
}
