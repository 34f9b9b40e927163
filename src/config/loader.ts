import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { getErrorMessage } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import type { CodesiftConfig, ProviderSelection } from './types.js';

const CONFIG_DIR_NAME = '.codesift';
const CONFIG_FILE_NAME = 'config.json';

const positiveInt = z.number().int().positive();

const CodesiftConfigSchema: z.ZodType<CodesiftConfig> = z.object({
  defaultProvider: z.enum(['auto', 'openai', 'ollama', 'mock']).optional(),
  providers: z
    .object({
      openai: z
        .object({
          apiKey: z.string().optional(),
          model: z.string().optional(),
          baseUrl: z.string().url().optional(),
          dimensions: positiveInt.optional()
        })
        .optional(),
      ollama: z
        .object({
          host: z.string().optional(),
          model: z.string().optional(),
          dimensions: positiveInt.optional()
        })
        .optional()
    })
    .optional(),
  rateLimit: z
    .object({
      rpm: positiveInt.optional(),
      tpm: positiveInt.optional()
    })
    .optional(),
  storePath: z.string().min(1).optional(),
  indexing: z
    .object({
      batchSize: positiveInt.optional(),
      maxFileSize: positiveInt.optional(),
      useTreeSitter: z.boolean().optional(),
      ignore: z.array(z.string()).optional()
    })
    .optional(),
  watch: z
    .object({
      debounceMs: positiveInt.optional()
    })
    .optional()
});

/**
 * Directory for global config and the default store: $CODESIFT_HOME or ~/.codesift
 */
export function getCodesiftHome(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.CODESIFT_HOME;
  return override ? path.resolve(override) : path.join(os.homedir(), CONFIG_DIR_NAME);
}

export function getGlobalConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getCodesiftHome(env), CONFIG_FILE_NAME);
}

export function getProjectConfigPath(basePath = '.'): string {
  return path.join(path.resolve(basePath), CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

/**
 * Parse and validate one config file. Missing files give null; unreadable or
 * invalid ones are logged and ignored.
 * @readonly Never modifies files
 */
function readConfigFile(configPath: string, scope: 'global' | 'project'): CodesiftConfig | null {
  if (!fs.existsSync(configPath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    log.warn(`Failed to read ${scope} config`, { path: configPath, error: getErrorMessage(error) });
    return null;
  }

  const parsed = CodesiftConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    log.warn(`Ignoring invalid ${scope} config`, { path: configPath, issues });
    return null;
  }
  return parsed.data;
}

export function readGlobalConfig(env: NodeJS.ProcessEnv = process.env): CodesiftConfig | null {
  return readConfigFile(getGlobalConfigPath(env), 'global');
}

export function readProjectConfig(basePath = '.'): CodesiftConfig | null {
  return readConfigFile(getProjectConfigPath(basePath), 'project');
}

function readInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (!raw) return undefined;
  const parsed = parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    log.warn('Ignoring non-positive integer environment value', { variable: name });
    return undefined;
  }
  return parsed;
}

function isProviderSelection(value: string): value is ProviderSelection {
  return value === 'auto' || value === 'openai' || value === 'ollama' || value === 'mock';
}

/**
 * Read configuration from environment variables
 * @readonly Never modifies files or environment
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): CodesiftConfig {
  const config: CodesiftConfig = {};

  const provider = env.CODESIFT_EMBEDDING_PROVIDER?.trim().toLowerCase();
  if (provider) {
    if (isProviderSelection(provider)) {
      config.defaultProvider = provider;
    } else {
      log.warn('Ignoring unknown embedding provider', { variable: 'CODESIFT_EMBEDDING_PROVIDER', value: provider });
    }
  }

  const apiKey = env.CODESIFT_OPENAI_API_KEY || env.OPENAI_API_KEY;
  if (apiKey) {
    config.providers = config.providers || {};
    config.providers.openai = { ...config.providers.openai, apiKey };
  }

  if (env.CODESIFT_OPENAI_BASE_URL) {
    config.providers = config.providers || {};
    config.providers.openai = { ...config.providers.openai, baseUrl: env.CODESIFT_OPENAI_BASE_URL };
  }

  if (env.CODESIFT_OPENAI_MODEL) {
    config.providers = config.providers || {};
    config.providers.openai = { ...config.providers.openai, model: env.CODESIFT_OPENAI_MODEL };
  }

  if (env.CODESIFT_OLLAMA_HOST) {
    config.providers = config.providers || {};
    config.providers.ollama = { ...config.providers.ollama, host: env.CODESIFT_OLLAMA_HOST };
  }

  if (env.CODESIFT_OLLAMA_MODEL) {
    config.providers = config.providers || {};
    config.providers.ollama = { ...config.providers.ollama, model: env.CODESIFT_OLLAMA_MODEL };
  }

  // Dimensions apply to whichever provider ends up active
  const dimensions = readInt(env, 'CODESIFT_EMBEDDING_DIMENSIONS');
  if (dimensions) {
    config.providers = config.providers || {};
    config.providers.openai = { ...config.providers.openai, dimensions };
    config.providers.ollama = { ...config.providers.ollama, dimensions };
  }

  const rpm = readInt(env, 'CODESIFT_RATE_LIMIT_RPM');
  if (rpm) {
    config.rateLimit = { ...config.rateLimit, rpm };
  }

  const tpm = readInt(env, 'CODESIFT_RATE_LIMIT_TPM');
  if (tpm) {
    config.rateLimit = { ...config.rateLimit, tpm };
  }

  if (env.CODESIFT_STORE_PATH) {
    config.storePath = env.CODESIFT_STORE_PATH;
  }

  const debounceMs = readInt(env, 'CODESIFT_WATCH_DEBOUNCE_MS');
  if (debounceMs) {
    config.watch = { debounceMs };
  }

  const batchSize = readInt(env, 'CODESIFT_BATCH_SIZE');
  if (batchSize) {
    config.indexing = { ...config.indexing, batchSize };
  }

  const maxFileSize = readInt(env, 'CODESIFT_MAX_FILE_SIZE');
  if (maxFileSize) {
    config.indexing = { ...config.indexing, maxFileSize };
  }

  return config;
}

/**
 * Deep merge configuration objects
 * Later configs override earlier ones
 */
export function deepMerge(...configs: (CodesiftConfig | null)[]): CodesiftConfig {
  const result: CodesiftConfig = {};

  for (const config of configs) {
    if (!config) continue;

    if (config.defaultProvider) {
      result.defaultProvider = config.defaultProvider;
    }

    if (config.storePath) {
      result.storePath = config.storePath;
    }

    if (config.providers) {
      result.providers = result.providers || {};

      if (config.providers.openai) {
        result.providers.openai = {
          ...result.providers.openai,
          ...config.providers.openai
        };
      }

      if (config.providers.ollama) {
        result.providers.ollama = {
          ...result.providers.ollama,
          ...config.providers.ollama
        };
      }
    }

    if (config.rateLimit) {
      result.rateLimit = {
        ...result.rateLimit,
        ...config.rateLimit
      };
    }

    if (config.indexing) {
      result.indexing = {
        ...result.indexing,
        ...config.indexing
      };
    }

    if (config.watch) {
      result.watch = {
        ...result.watch,
        ...config.watch
      };
    }
  }

  return result;
}

/**
 * Load merged configuration from all sources
 * Priority: env > project > global
 *
 * @readonly Never modifies config files
 */
export function loadConfig(basePath = '.', env: NodeJS.ProcessEnv = process.env): CodesiftConfig {
  return deepMerge(readGlobalConfig(env), readProjectConfig(basePath), readEnvConfig(env));
}
