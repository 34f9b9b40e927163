export type ProviderName = 'openai' | 'ollama' | 'mock';

export type ProviderSelection = ProviderName | 'auto';

export interface OpenAIProviderConfig {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  dimensions?: number;
}

export interface OllamaProviderConfig {
  host?: string;
  model?: string;
  dimensions?: number;
}

export interface RateLimitConfig {
  rpm?: number;
  tpm?: number;
}

export interface IndexingConfig {
  batchSize?: number;
  maxFileSize?: number;
  useTreeSitter?: boolean;
  /** Extra .gitignore-style patterns */
  ignore?: string[];
}

export interface WatchConfig {
  debounceMs?: number;
}

export interface CodesiftConfig {
  defaultProvider?: ProviderSelection;
  providers?: {
    openai?: OpenAIProviderConfig;
    ollama?: OllamaProviderConfig;
  };
  rateLimit?: RateLimitConfig;
  /** SQLite file holding every project's collection */
  storePath?: string;
  indexing?: IndexingConfig;
  watch?: WatchConfig;
}
