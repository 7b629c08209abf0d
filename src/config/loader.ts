/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (passed directly)
 * 2. Environment variables (CHATSTRATA_*)
 * 3. Project config file (./chatstrata.config.json)
 * 4. User config file (~/.chatstrata/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { errorMessage } from '../utils/errors.js';
import { isRecord } from '../utils/guards.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-loader');

/** External config file structure */
export interface ExternalConfig {
  index?: {
    /** Qdrant base URL */
    url?: string;
    apiKey?: string;
    collection?: string;
    timeoutMs?: number;
    denseVector?: string;
    sparseVector?: string;
  };
  embedding?: {
    /** Embedding server base URL */
    url?: string;
    model?: string;
    timeoutMs?: number;
  };
  input?: {
    /** Size ceiling for export and collection files. Default: 500 */
    maxFileSizeMb?: number;
  };
  retrieval?: {
    defaultLimit?: number;
    /** MMR lambda: weight of relevance against diversity. Default: 0.5 */
    mmrLambda?: number;
    defaultGroupSize?: number;
  };
  server?: {
    port?: number;
  };
  collection?: {
    /** Intern interpretation objects when saving. Default: true */
    deduplicateInterpretations?: boolean;
    /** Keep raw source metadata on chunks. Default: false */
    includeRawMetadata?: boolean;
  };
}

export type ResolvedConfig = { [K in keyof ExternalConfig]-?: NonNullable<ExternalConfig[K]> };

/** Default external config values */
const EXTERNAL_DEFAULTS: ResolvedConfig = {
  index: {
    url: 'http://localhost:6333',
    collection: 'conversations',
    timeoutMs: 30_000,
    denseVector: 'dense',
    sparseVector: 'sparse',
  },
  embedding: {
    url: 'http://localhost:8000',
    model: 'BAAI/bge-m3',
    timeoutMs: 60_000,
  },
  input: {
    maxFileSizeMb: 500,
  },
  retrieval: {
    defaultLimit: 10,
    mmrLambda: 0.5,
    defaultGroupSize: 3,
  },
  server: {
    port: 8000,
  },
  collection: {
    deduplicateInterpretations: true,
    includeRawMetadata: false,
  },
};

/**
 * Expand a leading `~` to the home directory.
 */
export function resolvePath(path: string): string {
  if (path.startsWith('~')) {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
    return path.replace('~', home);
  }
  return path;
}

/**
 * Load config from a JSON file.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(resolvedPath, 'utf-8'));
    if (!isRecord(parsed)) {
      log.warn(`Config file ${path} is not a JSON object`);
      return null;
    }
    return parsed as ExternalConfig;
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, { error: errorMessage(error) });
    return null;
  }
}

function envString(name: string): string | undefined {
  const value = process.env[name];
  return value ? value : undefined;
}

function envInt(name: string): number | undefined {
  const value = envString(name);
  return value === undefined ? undefined : parseInt(value, 10);
}

function envFloat(name: string): number | undefined {
  const value = envString(name);
  return value === undefined ? undefined : parseFloat(value);
}

function envBool(name: string): boolean | undefined {
  const value = envString(name);
  return value === undefined ? undefined : value === 'true';
}

/** Copy of `values` without its undefined entries. */
function defined<T extends object>(values: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(values) as (keyof T)[]) {
    if (values[key] !== undefined) {
      result[key] = values[key];
    }
  }
  return result;
}

function section<T extends object>(values: T): Partial<T> | undefined {
  const result = defined(values);
  return Object.keys(result).length > 0 ? result : undefined;
}

/**
 * Load config from environment variables.
 * Variables are prefixed with CHATSTRATA_ and use underscores for nesting.
 * Examples:
 *   CHATSTRATA_INDEX_URL=http://qdrant:6333
 *   CHATSTRATA_RETRIEVAL_MMR_LAMBDA=0.7
 *   CHATSTRATA_INPUT_MAX_FILE_SIZE_MB=100
 */
function loadEnvConfig(): ExternalConfig {
  return {
    index: section({
      url: envString('CHATSTRATA_INDEX_URL'),
      apiKey: envString('CHATSTRATA_INDEX_API_KEY'),
      collection: envString('CHATSTRATA_INDEX_COLLECTION'),
      timeoutMs: envInt('CHATSTRATA_INDEX_TIMEOUT_MS'),
      denseVector: envString('CHATSTRATA_INDEX_DENSE_VECTOR'),
      sparseVector: envString('CHATSTRATA_INDEX_SPARSE_VECTOR'),
    }),
    embedding: section({
      url: envString('CHATSTRATA_EMBEDDING_URL'),
      model: envString('CHATSTRATA_EMBEDDING_MODEL'),
      timeoutMs: envInt('CHATSTRATA_EMBEDDING_TIMEOUT_MS'),
    }),
    input: section({
      maxFileSizeMb: envFloat('CHATSTRATA_INPUT_MAX_FILE_SIZE_MB'),
    }),
    retrieval: section({
      defaultLimit: envInt('CHATSTRATA_RETRIEVAL_DEFAULT_LIMIT'),
      mmrLambda: envFloat('CHATSTRATA_RETRIEVAL_MMR_LAMBDA'),
      defaultGroupSize: envInt('CHATSTRATA_RETRIEVAL_DEFAULT_GROUP_SIZE'),
    }),
    server: section({
      port: envInt('CHATSTRATA_SERVER_PORT'),
    }),
    collection: section({
      deduplicateInterpretations: envBool('CHATSTRATA_COLLECTION_DEDUPLICATE_INTERPRETATIONS'),
      includeRawMetadata: envBool('CHATSTRATA_COLLECTION_INCLUDE_RAW_METADATA'),
    }),
  };
}

function mergeSection<T extends object>(target: T, source: T | undefined): T {
  return isRecord(source) ? { ...target, ...defined(source) } : target;
}

/**
 * Deep merge two config objects, with source overriding target.
 */
function deepMerge(target: ResolvedConfig, source: ExternalConfig): ResolvedConfig {
  return {
    index: mergeSection(target.index, source.index),
    embedding: mergeSection(target.embedding, source.embedding),
    input: mergeSection(target.input, source.input),
    retrieval: mergeSection(target.retrieval, source.retrieval),
    server: mergeSection(target.server, source.server),
    collection: mergeSection(target.collection, source.collection),
  };
}

function checkPositiveInt(errors: string[], field: string, value: unknown): void {
  if (value === undefined) return;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    errors.push(`${field} must be a positive integer`);
  }
}

function checkString(errors: string[], field: string, value: unknown): void {
  if (value === undefined) return;
  if (typeof value !== 'string' || value.trim() === '') {
    errors.push(`${field} must be a non-empty string`);
  }
}

function checkUrl(errors: string[], field: string, value: unknown): void {
  if (value === undefined) return;
  if (typeof value !== 'string' || !URL.canParse(value)) {
    errors.push(`${field} must be a valid URL`);
  }
}

/**
 * Validate the external config structure.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  const errors: string[] = [];

  // Index
  checkUrl(errors, 'index.url', config.index?.url);
  checkString(errors, 'index.collection', config.index?.collection);
  checkPositiveInt(errors, 'index.timeoutMs', config.index?.timeoutMs);
  checkString(errors, 'index.denseVector', config.index?.denseVector);
  checkString(errors, 'index.sparseVector', config.index?.sparseVector);

  // Embedding
  checkUrl(errors, 'embedding.url', config.embedding?.url);
  checkPositiveInt(errors, 'embedding.timeoutMs', config.embedding?.timeoutMs);

  // Input
  const maxFileSizeMb = config.input?.maxFileSizeMb;
  if (maxFileSizeMb !== undefined && !(typeof maxFileSizeMb === 'number' && maxFileSizeMb > 0)) {
    errors.push('input.maxFileSizeMb must be greater than 0');
  }

  // Retrieval
  const limit = config.retrieval?.defaultLimit;
  checkPositiveInt(errors, 'retrieval.defaultLimit', limit);
  if (typeof limit === 'number' && limit > 100) {
    errors.push('retrieval.defaultLimit must be at most 100');
  }
  const lambda = config.retrieval?.mmrLambda;
  if (lambda !== undefined && !(typeof lambda === 'number' && lambda >= 0 && lambda <= 1)) {
    errors.push('retrieval.mmrLambda must be between 0 and 1 (inclusive)');
  }
  const groupSize = config.retrieval?.defaultGroupSize;
  checkPositiveInt(errors, 'retrieval.defaultGroupSize', groupSize);
  if (typeof groupSize === 'number' && groupSize > 10) {
    errors.push('retrieval.defaultGroupSize must be at most 10');
  }

  // Server
  const port = config.server?.port;
  if (
    port !== undefined &&
    !(typeof port === 'number' && Number.isInteger(port) && port >= 0 && port <= 65535)
  ) {
    errors.push('server.port must be an integer between 0 and 65535');
  }

  return errors;
}

export interface LoadConfigOptions {
  /** CLI overrides (highest priority) */
  cliOverrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
}

/**
 * Load configuration with priority-based resolution.
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfig {
  let config: ResolvedConfig = { ...EXTERNAL_DEFAULTS };

  // 4. User config file
  if (!options.skipUserConfig) {
    const userConfigPath = options.userConfigPath ?? '~/.chatstrata/config.json';
    const userConfig = loadConfigFile(userConfigPath);
    if (userConfig) {
      config = deepMerge(config, userConfig);
    }
  }

  // 3. Project config file
  if (!options.skipProjectConfig) {
    const projectConfigPath =
      options.projectConfigPath ?? join(process.cwd(), 'chatstrata.config.json');
    const projectConfig = loadConfigFile(projectConfigPath);
    if (projectConfig) {
      config = deepMerge(config, projectConfig);
    }
  }

  // 2. Environment variables
  if (!options.skipEnv) {
    config = deepMerge(config, loadEnvConfig());
  }

  // 1. CLI overrides
  if (options.cliOverrides) {
    config = deepMerge(config, options.cliOverrides);
  }

  return config;
}

// Re-export for convenience
export { EXTERNAL_DEFAULTS };
