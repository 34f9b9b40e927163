/**
 * Structured logging for codesift
 *
 * Log lines go to stderr so that `print()` output on stdout stays machine readable.
 * Level and quiet mode come from CODESIFT_LOG_LEVEL / CODESIFT_QUIET.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogValue = string | number | boolean | null | undefined | LogValue[] | { [key: string]: LogValue };

export interface LogMetadata {
  [key: string]: LogValue;
}

const REDACTION_TEXT = '[REDACTED]';

const SECRET_VALUE_PATTERNS: RegExp[] = [
  /sk-[a-zA-Z0-9_-]{16,}/g, // OpenAI style keys
  /gh[pousr]_[A-Za-z0-9]{20,}/g, // GitHub tokens
  /eyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{5,}\.[A-Za-z0-9_-]{5,}/g, // JWT
  /Bearer\s+[A-Za-z0-9._-]{20,}/gi,
  /AKIA[0-9A-Z]{16}/g, // AWS access key id
  /(?:api|secret|token|password)[\s:=]+[A-Za-z0-9._-]{8,}/gi
];

const DEFAULT_ENV_NAMES = ['OPENAI_API_KEY', 'CODESIFT_OPENAI_API_KEY', 'OLLAMA_API_KEY'];

const SENSITIVE_TOKENS = new Set([
  'token',
  'secret',
  'password',
  'passwd',
  'authorization',
  'bearer',
  'cookie',
  'apikey'
]);

const SENSITIVE_PAIRS: Array<[string, string]> = [
  ['api', 'key'],
  ['client', 'secret'],
  ['access', 'token'],
  ['refresh', 'token']
];

interface RedactionContext {
  envNames: string[];
  sensitiveKeys: Set<string>;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function parseConfiguredList(raw?: string): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

function normalizeKeyName(key: string): string {
  return key
    .replace(/([a-z])([A-Z])/g, '$1_$2')
    .replace(/[^a-zA-Z0-9]+/g, '_')
    .replace(/_{2,}/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
}

function buildRedactionContext(): RedactionContext {
  const envNames = [...DEFAULT_ENV_NAMES, ...parseConfiguredList(process.env.CODESIFT_REDACT_ENV_VARS)];
  const customKeys = parseConfiguredList(process.env.CODESIFT_REDACT_KEYS);

  return {
    envNames,
    sensitiveKeys: new Set([...envNames, ...customKeys].map(normalizeKeyName))
  };
}

function isSensitiveKey(key: string, context: RedactionContext): boolean {
  const normalized = normalizeKeyName(key);
  if (context.sensitiveKeys.has(normalized)) return true;

  const tokens = normalized.split('_').filter(Boolean);
  if (SENSITIVE_PAIRS.some(([first, second]) => tokens.includes(first) && tokens.includes(second))) {
    return true;
  }
  return tokens.some(token => SENSITIVE_TOKENS.has(token));
}

function redactString(value: string, context: RedactionContext): string {
  let redacted = value;

  for (const envName of context.envNames) {
    const assignment = new RegExp(`\\b${escapeRegExp(envName)}\\s*=\\s*([^\\s;]+)`, 'gi');
    redacted = redacted.replace(assignment, `${envName}=${REDACTION_TEXT}`);
  }

  for (const pattern of SECRET_VALUE_PATTERNS) {
    pattern.lastIndex = 0;
    redacted = redacted.replace(pattern, REDACTION_TEXT);
  }

  return redacted;
}

function redactValue(value: LogValue, context: RedactionContext): LogValue {
  if (typeof value === 'string') return redactString(value, context);
  if (Array.isArray(value)) return value.map(item => redactValue(item, context));
  if (value !== null && typeof value === 'object') {
    const result: { [key: string]: LogValue } = {};
    for (const [key, child] of Object.entries(value)) {
      result[key] = isSensitiveKey(key, context) ? REDACTION_TEXT : redactValue(child, context);
    }
    return result;
  }
  return value;
}

export function redactLogData(message: string, meta?: LogMetadata): { message: string; meta?: LogMetadata } {
  const context = buildRedactionContext();
  const safeMessage = redactString(message, context);
  if (!meta) return { message: safeMessage };

  const safeMeta: LogMetadata = {};
  for (const [key, value] of Object.entries(meta)) {
    safeMeta[key] = isSensitiveKey(key, context) ? REDACTION_TEXT : redactValue(value, context);
  }
  return { message: safeMessage, meta: safeMeta };
}

export function parseLogLevel(level: string | undefined, fallback: LogLevel): LogLevel {
  switch (level?.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return fallback;
  }
}

class Logger {
  private level: LogLevel;
  private quiet: boolean;

  constructor() {
    this.quiet = process.env.CODESIFT_QUIET === 'true';
    this.level = parseLogLevel(process.env.CODESIFT_LOG_LEVEL, this.quiet ? LogLevel.ERROR : LogLevel.INFO);
  }

  private write(level: LogLevel, label: string, message: string, meta?: LogMetadata): void {
    if (level < this.level) return;

    const { message: safeMessage, meta: safeMeta } = redactLogData(message, meta);
    const prefix = `[${new Date().toISOString()}] [${label}]`;
    const suffix = safeMeta && Object.keys(safeMeta).length > 0 ? ` ${JSON.stringify(safeMeta)}` : '';
    process.stderr.write(`${prefix} ${safeMessage}${suffix}\n`);
  }

  debug(message: string, meta?: LogMetadata): void {
    this.write(LogLevel.DEBUG, 'DEBUG', message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    this.write(LogLevel.INFO, 'INFO', message, meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.write(LogLevel.WARN, 'WARN', message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMetadata): void {
    const errorMeta: LogMetadata = {
      ...meta,
      ...(error instanceof Error
        ? { errorMessage: error.message, errorName: error.name, errorStack: error.stack }
        : error === undefined
          ? {}
          : { error: String(error) })
    };
    this.write(LogLevel.ERROR, 'ERROR', message, errorMeta);
  }

  isQuiet(): boolean {
    return this.quiet;
  }

  /**
   * Quiet mode keeps warnings and errors only
   */
  setQuiet(quiet: boolean): void {
    this.quiet = quiet;
    if (quiet && this.level < LogLevel.WARN) {
      this.level = LogLevel.WARN;
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

export const logger = new Logger();

/**
 * User-facing CLI output, never filtered by level
 */
export function print(message: string): void {
  process.stdout.write(`${message}\n`);
}

export const log = {
  debug: (message: string, meta?: LogMetadata) => logger.debug(message, meta),
  info: (message: string, meta?: LogMetadata) => logger.info(message, meta),
  warn: (message: string, meta?: LogMetadata) => logger.warn(message, meta),
  error: (message: string, error?: unknown, meta?: LogMetadata) => logger.error(message, error, meta),
  isQuiet: () => logger.isQuiet(),
  setQuiet: (quiet: boolean) => logger.setQuiet(quiet),
  setLevel: (level: LogLevel) => logger.setLevel(level),
};
