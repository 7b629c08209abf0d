/**
 * Tests for the shared CLI helpers.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  flagValue,
  hasFlag,
  intFlag,
  loadChunks,
  positionals,
  reportFailure,
  usageError,
} from '../../src/cli/utils.js';
import { EXTERNAL_DEFAULTS } from '../../src/config/loader.js';
import { ChunkCollection } from '../../src/parser/collection.js';
import { ConfigError, ExternalServiceError, InvalidFilterError } from '../../src/utils/errors.js';
import { makeChunk } from '../helpers/fakes.js';
import { fixturePath } from '../helpers/fixtures.js';

describe('flag helpers', () => {
  const args = ['report.json', '--output', 'out.json', '--compact', '--limit', '5', 'extra'];

  it('reads flag values', () => {
    expect(flagValue(args, 'output')).toBe('out.json');
    expect(flagValue(args, 'missing')).toBeUndefined();
    expect(flagValue(['--output'], 'output')).toBeUndefined();
  });

  it('detects boolean flags', () => {
    expect(hasFlag(args, 'compact')).toBe(true);
    expect(hasFlag(args, 'json')).toBe(false);
  });

  it('parses integer flags', () => {
    expect(intFlag(args, 'limit')).toBe(5);
    expect(intFlag(args, 'missing')).toBeUndefined();
    expect(intFlag(['--limit', 'ten'], 'limit')).toBeNaN();
  });

  it('skips flags and their values when collecting positionals', () => {
    expect(positionals(args, ['output', 'limit'])).toEqual(['report.json', 'extra']);
    expect(positionals(args)).toEqual(['report.json', 'out.json', '5', 'extra']);
  });
});

describe('usageError', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the message and usage, then exits with code 2', () => {
    usageError('File required', 'chatstrata stats <file>');

    expect(console.error).toHaveBeenCalledWith('Error: File required');
    expect(console.log).toHaveBeenCalledWith('Usage: chatstrata stats <file>');
    expect(process.exit).toHaveBeenCalledWith(2);
  });
});

describe('reportFailure', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('exits with code 3 for configuration errors', () => {
    const code = reportFailure(new ConfigError('index.url is required', 'CONFIG_INVALID'));

    expect(code).toBe(3);
    expect(console.error).toHaveBeenCalledWith(
      'ConfigError [CONFIG_INVALID]: index.url is required',
    );
  });

  it('exits with code 4 when a service is unreachable', () => {
    const error = new ExternalServiceError('index down', 'INDEX_REQUEST_FAILED', 'index');

    expect(reportFailure(error)).toBe(4);
  });

  it('exits with code 1 for other errors', () => {
    expect(reportFailure(new InvalidFilterError('limit must be positive', 'limit'))).toBe(1);
    expect(reportFailure(new Error('boom'))).toBe(1);
    expect(console.error).toHaveBeenLastCalledWith('Error: boom');
  });
});

describe('loadChunks', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'cli-utils-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads a saved collection', async () => {
    const path = join(dir, 'saved.json');
    await new ChunkCollection([makeChunk({ chunkId: 'saved-1' })]).saveToFile(path);

    const collection = await loadChunks(path, EXTERNAL_DEFAULTS);

    expect(collection.chunks.map((c) => c.chunkId)).toEqual(['saved-1']);
  });

  it('normalizes a raw export without raw metadata by default', async () => {
    const collection = await loadChunks(fixturePath('paired-turn-export.json'), EXTERNAL_DEFAULTS);

    expect(collection.size).toBe(2);
    expect(collection.chunks[0].platform).toBe('claude');
    expect(collection.chunks[0].rawMetadata).toEqual({});
  });
});
