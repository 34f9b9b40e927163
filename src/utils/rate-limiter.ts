import { setTimeout as delay } from 'timers/promises';
import { RETRY_CONSTANTS } from '../config/constants.js';
import { getErrorMessage, getErrorStatus, isRetryableError } from './error-utils.js';
import { log } from './logger.js';

interface QueueItem {
  /** Runs the request and settles the caller's promise on success */
  call: () => Promise<void>;
  fail: (error: unknown) => void;
  attempt: number;
  estimatedTokens: number;
}

export interface RateLimiterOptions {
  /** Requests per minute; null disables the limit */
  rpm?: number | null;
  /** Tokens per minute, estimated by the caller; null disables the limit */
  tpm?: number | null;
  maxQueueSize?: number;
  /** Total attempts per request, the first one included */
  maxAttempts?: number;
  initialRetryDelayMs?: number;
  maxRetryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RateLimiterStats {
  rpm: number | null;
  tpm: number | null;
  queueLength: number;
  requestsInLastMinute: number;
  tokensInLastMinute: number;
  retries: number;
}

const WINDOW_MS = 60_000;

/**
 * Serializes provider calls, keeps them under per-minute limits and retries
 * transient failures (429, 5xx, dropped sockets) with exponential backoff.
 */
export class RateLimiter {
  private readonly rpm: number | null;
  private readonly tpm: number | null;
  private readonly maxQueueSize: number;
  private readonly maxAttempts: number;
  private readonly initialRetryDelayMs: number;
  private readonly maxRetryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private queue: QueueItem[] = [];
  private processing = false;
  private requestTimes: number[] = [];
  private tokenUsage: Array<{ time: number; tokens: number }> = [];
  private retries = 0;

  constructor(options: RateLimiterOptions = {}) {
    this.rpm = options.rpm ?? null;
    this.tpm = options.tpm ?? null;
    this.maxQueueSize = options.maxQueueSize ?? RETRY_CONSTANTS.DEFAULT_MAX_QUEUE_SIZE;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? RETRY_CONSTANTS.MAX_ATTEMPTS);
    this.initialRetryDelayMs = options.initialRetryDelayMs ?? RETRY_CONSTANTS.INITIAL_DELAY_MS;
    this.maxRetryDelayMs = options.maxRetryDelayMs ?? RETRY_CONSTANTS.MAX_DELAY_MS;
    this.sleep = options.sleep ?? (ms => delay(ms));
  }

  execute<T>(fn: () => Promise<T>, estimatedTokens = 0): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      if (this.queue.length >= this.maxQueueSize) {
        reject(new Error(`Rate limiter queue is full (${this.maxQueueSize} items)`));
        return;
      }

      this.queue.push({
        call: async () => {
          resolve(await fn());
        },
        fail: reject,
        attempt: 1,
        estimatedTokens
      });
      this.processQueue().catch(error => {
        log.error('Rate limiter queue failed', error);
      });
    });
  }

  /**
   * Backoff before retry number `attempt` (1-based): initial * 2^(attempt-1), with jitter
   */
  getRetryDelay(attempt: number): number {
    const base = this.initialRetryDelayMs * 2 ** (attempt - 1);
    const jitter = base * 0.1 * Math.random();
    return Math.min(this.maxRetryDelayMs, Math.round(base + jitter));
  }

  private async processQueue(): Promise<void> {
    if (this.processing) return;
    this.processing = true;

    try {
      while (this.queue.length > 0) {
        const item = this.queue[0];

        let wait = this.getDelayUntilNextSlot(item.estimatedTokens);
        while (wait > 0) {
          await this.sleep(wait);
          wait = this.getDelayUntilNextSlot(item.estimatedTokens);
        }

        this.queue.shift();
        this.recordRequest(item.estimatedTokens);

        try {
          await item.call();
        } catch (error) {
          if (isRetryableError(error) && item.attempt < this.maxAttempts) {
            const retryDelay = this.getRetryDelay(item.attempt);
            this.retries++;
            log.warn('Transient provider error, retrying', {
              status: getErrorStatus(error),
              attempt: item.attempt,
              maxAttempts: this.maxAttempts,
              delayMs: retryDelay,
              error: getErrorMessage(error)
            });
            await this.sleep(retryDelay);
            this.queue.unshift({ ...item, attempt: item.attempt + 1 });
          } else {
            item.fail(error);
          }
        }
      }
    } finally {
      this.processing = false;
    }
  }

  private prune(now: number): void {
    const windowStart = now - WINDOW_MS;
    this.requestTimes = this.requestTimes.filter(time => time > windowStart);
    this.tokenUsage = this.tokenUsage.filter(entry => entry.time > windowStart);
  }

  private recordRequest(tokens: number): void {
    const now = Date.now();
    if (this.rpm !== null) this.requestTimes.push(now);
    if (this.tpm !== null && tokens > 0) this.tokenUsage.push({ time: now, tokens });
  }

  private getDelayUntilNextSlot(estimatedTokens: number): number {
    const now = Date.now();
    this.prune(now);
    let wait = 0;

    if (this.rpm !== null && this.requestTimes.length >= this.rpm) {
      wait = Math.max(wait, WINDOW_MS - (now - this.requestTimes[0]));
    }

    if (this.tpm !== null && estimatedTokens > 0 && this.tokenUsage.length > 0) {
      const used = this.tokenUsage.reduce((sum, entry) => sum + entry.tokens, 0);
      if (used + estimatedTokens > this.tpm) {
        wait = Math.max(wait, WINDOW_MS - (now - this.tokenUsage[0].time));
      }
    }

    return wait > 0 ? wait + RETRY_CONSTANTS.DELAY_BUFFER_MS : 0;
  }

  getStats(): RateLimiterStats {
    this.prune(Date.now());
    return {
      rpm: this.rpm,
      tpm: this.tpm,
      queueLength: this.queue.length,
      requestsInLastMinute: this.requestTimes.length,
      tokensInLastMinute: this.tokenUsage.reduce((sum, entry) => sum + entry.tokens, 0),
      retries: this.retries
    };
  }
}
