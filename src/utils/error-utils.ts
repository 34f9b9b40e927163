/**
 * Error types and helpers for safe error handling with proper TypeScript types
 */

import { RETRY_CONSTANTS } from '../config/constants.js';

export type CodesiftErrorCode =
  | 'not_a_directory'
  | 'provider_unavailable'
  | 'provider_mismatch'
  | 'store_error';

/**
 * Base class for errors that abort a whole operation
 */
export class CodesiftError extends Error {
  constructor(
    readonly code: CodesiftErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotADirectoryError extends CodesiftError {
  constructor(readonly path: string) {
    super('not_a_directory', `Not a directory: ${path}`);
  }
}

export class ProviderUnavailableError extends CodesiftError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('provider_unavailable', message, options);
  }
}

export interface ProviderIdentity {
  name: string;
  model: string;
  dimensions: number;
}

export class ProviderMismatchError extends CodesiftError {
  constructor(
    readonly indexed: ProviderIdentity,
    readonly active: ProviderIdentity
  ) {
    super(
      'provider_mismatch',
      `Project was indexed with ${indexed.name} (${indexed.model}, ${indexed.dimensions} dims) ` +
        `but the active provider is ${active.name} (${active.model}, ${active.dimensions} dims). ` +
        'Run a full rebuild to switch providers.'
    );
  }
}

export class StoreError extends CodesiftError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('store_error', message, options);
  }
}

// Helper type for error-like objects
export interface ErrorLike {
  message?: unknown;
  status?: unknown;
  statusCode?: unknown;
  status_code?: unknown;
  code?: unknown;
  cause?: unknown;
  [key: string]: unknown;
}

export function isErrorLike(value: unknown): value is ErrorLike {
  return typeof value === 'object' && value !== null;
}

/**
 * Safely get a property from an unknown value
 */
export function safeGetProperty(obj: unknown, key: string): unknown {
  if (obj && typeof obj === 'object' && key in obj) {
    const value: unknown = Reflect.get(obj, key);
    return value;
  }
  return undefined;
}

export function getErrorMessage(error: unknown): string {
  if (isErrorLike(error) && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function getErrorStatus(error: unknown): number | undefined {
  if (!isErrorLike(error)) return undefined;
  if (typeof error.status === 'number') return error.status;
  if (typeof error.statusCode === 'number') return error.statusCode;
  if (typeof error.status_code === 'number') return error.status_code;
  return undefined;
}

/**
 * System error code (ECONNREFUSED, ...) of the error or of its cause chain
 */
export function getErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 4 && isErrorLike(current); depth++) {
    if (typeof current.code === 'string') return current.code;
    current = current.cause;
  }
  return undefined;
}

const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH']);
const TRANSIENT_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'UND_ERR_SOCKET']);

/**
 * The service cannot be reached or refuses our credentials; retrying will not help
 */
export function isConnectionError(error: unknown): boolean {
  if (error instanceof ProviderUnavailableError) return true;

  const status = getErrorStatus(error);
  if (status === 401 || status === 403) return true;
  if (status !== undefined) return false;

  const code = getErrorCode(error);
  if (code && CONNECTION_CODES.has(code)) return true;

  const message = getErrorMessage(error).toLowerCase();
  return message.includes('fetch failed') || message.includes('connection error');
}

/**
 * Rate limiting, 5xx responses and dropped sockets
 */
export function isRetryableError(error: unknown): boolean {
  const status = getErrorStatus(error);
  if (status !== undefined) {
    return RETRY_CONSTANTS.RETRYABLE_STATUSES.some(retryable => retryable === status);
  }

  const code = getErrorCode(error);
  if (code && TRANSIENT_CODES.has(code)) return true;

  const message = getErrorMessage(error).toLowerCase();
  return message.includes('rate limit') || message.includes('too many requests');
}
