/**
 * Centralized configuration constants for codesift
 *
 * Tunables for chunking, indexing, watching and provider retries live here so the
 * rest of the code never carries bare numbers.
 */

/**
 * Chunk boundary detection
 */
export const CHUNKING_CONSTANTS = {
  /** Files with at most this many lines become a single chunk */
  SMALL_FILE_LINES: 30,

  /** Sliding-window fallback: lines per window */
  WINDOW_LINES: 50,

  /** Sliding-window fallback: lines between window starts (10-line overlap) */
  STRIDE_LINES: 40,

  /** Span names for the regions around declarations */
  HEADER_SYMBOL: '(imports)',
  TRAILING_SYMBOL: '(trailing)',
} as const;

/**
 * Parsing and Tree-sitter Configuration
 */
export const PARSING_CONSTANTS = {
  /** Sources longer than this are fed to the parser through a read callback */
  SIZE_THRESHOLD: 30_000,

  /** Characters handed to the parser per read callback */
  CHUNK_SIZE: 30_000,
} as const;

/**
 * Indexing Configuration
 */
export const INDEXING_CONSTANTS = {
  /** Chunks accumulated before a batch is embedded and upserted */
  EMBED_BATCH_SIZE: 20,

  /** Files above this many bytes are never indexed */
  MAX_FILE_SIZE_BYTES: 500_000,

  /** Hex characters kept from the path digest in chunk ids and collection names */
  DIGEST_LENGTH: 12,

  /** Characters kept from the project directory name in collection names */
  COLLECTION_BASENAME_LENGTH: 30,

  /** Hex characters kept from the content digest */
  FINGERPRINT_LENGTH: 16,
} as const;

/**
 * File Watcher Configuration
 */
export const WATCHER_CONSTANTS = {
  /** Default debounce interval in milliseconds */
  DEFAULT_DEBOUNCE_MS: 2000,

  /** Minimum debounce interval in milliseconds */
  MIN_DEBOUNCE_MS: 50,

  /** Stability threshold for file write detection */
  STABILITY_THRESHOLD_MS: 100,

  /** Poll interval for file stability check */
  POLL_INTERVAL_MS: 50,
} as const;

/**
 * Retry behaviour for embedding calls
 */
export const RETRY_CONSTANTS = {
  /** Total attempts per request, the first one included */
  MAX_ATTEMPTS: 3,

  /** Delay before the first retry; doubled for each further one */
  INITIAL_DELAY_MS: 1000,

  /** Upper bound for a single backoff delay */
  MAX_DELAY_MS: 20_000,

  /** HTTP statuses treated as transient */
  RETRYABLE_STATUSES: [429, 500, 502, 503, 504] as const,

  /** Maximum queue size to prevent unbounded growth */
  DEFAULT_MAX_QUEUE_SIZE: 10_000,

  /** Delay buffer added to rate limit calculations */
  DELAY_BUFFER_MS: 100,
} as const;

/**
 * Embedding provider defaults
 */
export const EMBEDDING_CONSTANTS = {
  /** Inputs are cut to this many characters before embedding */
  MAX_INPUT_CHARS: 6000,

  /** Ollama context-length fallback never truncates below this */
  MIN_INPUT_CHARS: 500,

  /** How long auto-detection waits for a local Ollama server */
  OLLAMA_PROBE_TIMEOUT_MS: 2000,

  OLLAMA_DEFAULT_HOST: 'http://127.0.0.1:11434',
  OLLAMA_DEFAULT_MODEL: 'nomic-embed-text',
  OLLAMA_DEFAULT_DIMENSIONS: 768,

  OPENAI_DEFAULT_MODEL: 'text-embedding-3-small',
  OPENAI_DEFAULT_DIMENSIONS: 1536,

  MOCK_DEFAULT_DIMENSIONS: 32,
} as const;
