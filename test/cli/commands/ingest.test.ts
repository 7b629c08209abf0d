/**
 * Tests for the ingest CLI command handler.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

vi.mock('../../../src/config/loader.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../src/config/loader.js')>()),
  loadConfig: vi.fn(),
}));

vi.mock('../../../src/services.js', () => ({
  createServices: vi.fn(),
}));

import { ingestCommand } from '../../../src/cli/commands/ingest.js';
import { EXTERNAL_DEFAULTS, loadConfig } from '../../../src/config/loader.js';
import { ChunkCollection } from '../../../src/parser/collection.js';
import { SearchDispatcher } from '../../../src/retrieval/dispatcher.js';
import { createServices } from '../../../src/services.js';
import { FakeEmbeddingService, FakeIndexService, makeChunk } from '../../helpers/fakes.js';
import { fixturePath } from '../../helpers/fixtures.js';

const mockLoadConfig = vi.mocked(loadConfig);
const mockCreateServices = vi.mocked(createServices);

describe('ingestCommand', () => {
  let dir: string;
  let index: FakeIndexService;
  let embedder: FakeEmbeddingService;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    mockLoadConfig.mockReturnValue(EXTERNAL_DEFAULTS);

    index = new FakeIndexService();
    embedder = new FakeEmbeddingService();
    mockCreateServices.mockReturnValue({
      index,
      embedder,
      dispatcher: new SearchDispatcher({ index, embedder }),
    });
    dir = mkdtempSync(join(tmpdir(), 'ingest-cmd-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('embeds and uploads an export', async () => {
    const input = fixturePath('tree-export.json');

    await ingestCommand.handler([input]);

    expect(console.log).toHaveBeenCalledWith(`Loaded 2 chunks from ${input}`);
    expect(console.log).toHaveBeenCalledWith('Ingestion complete: 2 points uploaded.');
    expect(mockCreateServices).toHaveBeenCalledWith(EXTERNAL_DEFAULTS);
    expect(embedder.loaded).toBe(true);
    expect(index.upserted).toHaveLength(2);
    expect(process.stdout.write).toHaveBeenCalledWith('\r  Embedded 2/2');
    expect(process.stdout.write).toHaveBeenLastCalledWith('\n');
  });

  it('reports progress per batch', async () => {
    await ingestCommand.handler([fixturePath('tree-export.json'), '--batch-size', '1']);

    expect(process.stdout.write).toHaveBeenCalledWith('\r  Embedded 1/2');
    expect(process.stdout.write).toHaveBeenCalledWith('\r  Embedded 2/2');
  });

  it('reports chunks skipped for lack of text', async () => {
    const path = join(dir, 'saved.json');
    await new ChunkCollection([
      makeChunk({ chunkId: 'full' }),
      makeChunk({
        chunkId: 'empty',
        conversationTitle: 'Untitled',
        userMessage: '',
        assistantMessage: '',
      }),
    ]).saveToFile(path);

    await ingestCommand.handler([path, '--mode', 'minimal']);

    expect(console.log).toHaveBeenCalledWith('Ingestion complete: 1 points uploaded.');
    expect(console.log).toHaveBeenCalledWith('  Skipped 1 chunks with no embedding text.');
  });

  it('exits with code 2 without a file', async () => {
    await ingestCommand.handler([]);

    expect(console.error).toHaveBeenCalledWith('Error: File required');
    expect(process.exit).toHaveBeenCalledWith(2);
    expect(mockCreateServices).not.toHaveBeenCalled();
  });

  it('rejects an unknown mode', async () => {
    await ingestCommand.handler([fixturePath('tree-export.json'), '--mode', 'verbose']);

    expect(console.error).toHaveBeenCalledWith(
      'Error: Unknown mode: verbose (expected balanced, user_focused, minimal, full)',
    );
    expect(process.exit).toHaveBeenCalledWith(2);
  });

  it('rejects a non-positive batch size', async () => {
    await ingestCommand.handler([fixturePath('tree-export.json'), '--batch-size', '0']);

    expect(console.error).toHaveBeenCalledWith('Error: --batch-size must be a positive integer');
    expect(process.exit).toHaveBeenCalledWith(2);
  });
});
