/**
 * Tests for config/loader.ts: defaults, file and env sources, priority, validation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  EXTERNAL_DEFAULTS,
  loadConfig,
  resolvePath,
  validateExternalConfig,
} from '../../src/config/loader.js';
import type { ExternalConfig } from '../../src/config/loader.js';

const PREFIX = 'CHATSTRATA_';

describe('loadConfig', () => {
  const savedEnv = { ...process.env };
  let dir: string;

  function clearEnv(): void {
    for (const key of Object.keys(process.env)) {
      if (key.startsWith(PREFIX)) {
        delete process.env[key];
      }
    }
  }

  function writeConfig(name: string, config: unknown): string {
    const path = join(dir, name);
    writeFileSync(path, typeof config === 'string' ? config : JSON.stringify(config));
    return path;
  }

  beforeEach(() => {
    clearEnv();
    dir = mkdtempSync(join(tmpdir(), 'config-test-'));
  });

  afterEach(() => {
    clearEnv();
    for (const [key, value] of Object.entries(savedEnv)) {
      if (key.startsWith(PREFIX) && value !== undefined) {
        process.env[key] = value;
      }
    }
    rmSync(dir, { recursive: true, force: true });
  });

  describe('defaults', () => {
    it('returns all default values when no config sources exist', () => {
      const config = loadConfig({ skipEnv: true, skipProjectConfig: true, skipUserConfig: true });

      expect(config).toEqual(EXTERNAL_DEFAULTS);
      expect(config.index.url).toBe('http://localhost:6333');
      expect(config.index.collection).toBe('conversations');
      expect(config.embedding.model).toBe('BAAI/bge-m3');
      expect(config.input.maxFileSizeMb).toBe(500);
      expect(config.retrieval.defaultLimit).toBe(10);
      expect(config.retrieval.mmrLambda).toBe(0.5);
      expect(config.server.port).toBe(8000);
      expect(config.collection.deduplicateInterpretations).toBe(true);
    });

    it('defaults are valid', () => {
      expect(validateExternalConfig(EXTERNAL_DEFAULTS)).toEqual([]);
    });
  });

  describe('environment variable overrides', () => {
    it('reads strings, numbers and booleans', () => {
      process.env.CHATSTRATA_INDEX_URL = 'http://qdrant:6333';
      process.env.CHATSTRATA_INDEX_API_KEY = 'test-secret';
      process.env.CHATSTRATA_RETRIEVAL_MMR_LAMBDA = '0.7';
      process.env.CHATSTRATA_RETRIEVAL_DEFAULT_LIMIT = '25';
      process.env.CHATSTRATA_INPUT_MAX_FILE_SIZE_MB = '1.5';
      process.env.CHATSTRATA_COLLECTION_DEDUPLICATE_INTERPRETATIONS = 'false';

      const config = loadConfig({ skipProjectConfig: true, skipUserConfig: true });

      expect(config.index.url).toBe('http://qdrant:6333');
      expect(config.index.apiKey).toBe('test-secret');
      expect(config.index.collection).toBe('conversations');
      expect(config.retrieval.mmrLambda).toBe(0.7);
      expect(config.retrieval.defaultLimit).toBe(25);
      expect(config.input.maxFileSizeMb).toBe(1.5);
      expect(config.collection.deduplicateInterpretations).toBe(false);
    });

    it('ignores empty values', () => {
      process.env.CHATSTRATA_INDEX_COLLECTION = '';

      const config = loadConfig({ skipProjectConfig: true, skipUserConfig: true });

      expect(config.index.collection).toBe('conversations');
    });

    it('is skipped with skipEnv', () => {
      process.env.CHATSTRATA_SERVER_PORT = '9000';

      const config = loadConfig({ skipEnv: true, skipProjectConfig: true, skipUserConfig: true });

      expect(config.server.port).toBe(8000);
    });
  });

  describe('config files', () => {
    it('merges a project file section by section', () => {
      const projectConfigPath = writeConfig('project.json', {
        index: { collection: 'chats' },
        retrieval: { defaultGroupSize: 5 },
      });

      const config = loadConfig({ skipEnv: true, skipUserConfig: true, projectConfigPath });

      expect(config.index.collection).toBe('chats');
      expect(config.index.url).toBe('http://localhost:6333');
      expect(config.retrieval.defaultGroupSize).toBe(5);
      expect(config.retrieval.defaultLimit).toBe(10);
    });

    it('ignores missing, invalid and non-object files', () => {
      const broken = writeConfig('broken.json', '{ "index": ');
      const list = writeConfig('list.json', [1, 2]);

      expect(
        loadConfig({ skipEnv: true, projectConfigPath: broken, userConfigPath: list }),
      ).toEqual(EXTERNAL_DEFAULTS);
      expect(
        loadConfig({
          skipEnv: true,
          projectConfigPath: join(dir, 'missing.json'),
          userConfigPath: join(dir, 'missing-too.json'),
        }),
      ).toEqual(EXTERNAL_DEFAULTS);
    });
  });

  describe('priority', () => {
    it('applies user file, project file, env, then CLI overrides', () => {
      const userConfigPath = writeConfig('user.json', {
        index: { collection: 'from-user', timeoutMs: 1000 },
        server: { port: 1111 },
        embedding: { model: 'user-model' },
      });
      const projectConfigPath = writeConfig('project.json', {
        index: { collection: 'from-project' },
        server: { port: 2222 },
      });
      process.env.CHATSTRATA_SERVER_PORT = '3333';
      process.env.CHATSTRATA_EMBEDDING_MODEL = 'env-model';

      const cliOverrides: ExternalConfig = { embedding: { model: 'cli-model' } };
      const config = loadConfig({ userConfigPath, projectConfigPath, cliOverrides });

      expect(config.index.timeoutMs).toBe(1000);
      expect(config.index.collection).toBe('from-project');
      expect(config.server.port).toBe(3333);
      expect(config.embedding.model).toBe('cli-model');
    });

    it('does not let undefined overrides erase values', () => {
      const config = loadConfig({
        skipEnv: true,
        skipProjectConfig: true,
        skipUserConfig: true,
        cliOverrides: { server: { port: undefined } },
      });

      expect(config.server.port).toBe(8000);
    });
  });
});

describe('resolvePath', () => {
  const savedHome = process.env.HOME;

  afterEach(() => {
    process.env.HOME = savedHome;
  });

  it('expands a leading tilde', () => {
    process.env.HOME = '/home/tester';

    expect(resolvePath('~/.chatstrata/config.json')).toBe('/home/tester/.chatstrata/config.json');
  });

  it('leaves other paths alone', () => {
    expect(resolvePath('/etc/chatstrata.json')).toBe('/etc/chatstrata.json');
  });
});

describe('validateExternalConfig', () => {
  it('accepts an empty config', () => {
    expect(validateExternalConfig({})).toEqual([]);
  });

  it('reports every invalid field', () => {
    const errors = validateExternalConfig({
      index: { url: 'not a url', collection: ' ', timeoutMs: 0, denseVector: '' },
      embedding: { url: 'also bad', timeoutMs: 1.5 },
      input: { maxFileSizeMb: 0 },
      retrieval: { defaultLimit: 101, mmrLambda: 1.2, defaultGroupSize: 11 },
      server: { port: 70000 },
    });

    expect(errors).toEqual([
      'index.url must be a valid URL',
      'index.collection must be a non-empty string',
      'index.timeoutMs must be a positive integer',
      'index.denseVector must be a non-empty string',
      'embedding.url must be a valid URL',
      'embedding.timeoutMs must be a positive integer',
      'input.maxFileSizeMb must be greater than 0',
      'retrieval.defaultLimit must be at most 100',
      'retrieval.mmrLambda must be between 0 and 1 (inclusive)',
      'retrieval.defaultGroupSize must be at most 10',
      'server.port must be an integer between 0 and 65535',
    ]);
  });

  it('rejects a non-integer limit', () => {
    expect(validateExternalConfig({ retrieval: { defaultLimit: 2.5 } })).toEqual([
      'retrieval.defaultLimit must be a positive integer',
    ]);
  });

  it('accepts the bounds', () => {
    expect(
      validateExternalConfig({
        retrieval: { defaultLimit: 100, mmrLambda: 0, defaultGroupSize: 10 },
        server: { port: 0 },
      }),
    ).toEqual([]);
  });
});
