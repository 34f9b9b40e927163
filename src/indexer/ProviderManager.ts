import type { EmbeddingOptions } from '../config/resolver.js';
import { resolveEmbeddingProvider, type EmbeddingProvider } from '../providers/index.js';
import { log } from '../utils/logger.js';

/**
 * Manages the lifecycle of the embedding provider for a watch session.
 * The provider is resolved and initialized once and reused across updates.
 */
export class ProviderManager {
  private providerInstance: EmbeddingProvider | null = null;
  private initPromise: Promise<EmbeddingProvider> | null = null;
  private initErrorLogged = false;

  constructor(
    private readonly providerName: string | undefined,
    private readonly options: EmbeddingOptions
  ) {}

  /**
   * Get or create the provider. Concurrent callers share one initialization; a
   * failed one is retried on the next call.
   */
  async getProvider(): Promise<EmbeddingProvider> {
    if (this.providerInstance) {
      return this.providerInstance;
    }

    if (!this.initPromise) {
      this.initPromise = this.initializeProvider();
    }

    try {
      return await this.initPromise;
    } catch (error) {
      this.initPromise = null;
      if (!this.initErrorLogged) {
        log.error('Watch provider initialization failed', error);
        this.initErrorLogged = true;
      }
      throw error;
    }
  }

  private async initializeProvider(): Promise<EmbeddingProvider> {
    const instance = await resolveEmbeddingProvider(this.providerName, this.options);
    await instance.init();
    this.providerInstance = instance;
    this.initErrorLogged = false;
    return instance;
  }

  cleanup(): void {
    this.providerInstance = null;
    this.initPromise = null;
    this.initErrorLogged = false;
  }
}
