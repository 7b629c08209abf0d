/**
 * Tests for the merge CLI command handler.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

vi.mock('../../../src/config/loader.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../src/config/loader.js')>()),
  loadConfig: vi.fn(),
}));

import { mergeCommand } from '../../../src/cli/commands/merge.js';
import { EXTERNAL_DEFAULTS, loadConfig } from '../../../src/config/loader.js';
import { ChunkCollection } from '../../../src/parser/collection.js';
import { makeChunk } from '../../helpers/fakes.js';
import { fixturePath } from '../../helpers/fixtures.js';

const mockLoadConfig = vi.mocked(loadConfig);

describe('mergeCommand', () => {
  let dir: string;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
    mockLoadConfig.mockReturnValue(EXTERNAL_DEFAULTS);
    dir = mkdtempSync(join(tmpdir(), 'merge-cmd-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('merges a raw export with a saved collection', async () => {
    const saved = join(dir, 'claude.chunks.json');
    await new ChunkCollection([
      makeChunk({ chunkId: 'c-1', platform: 'claude', conversationId: 'claude-1' }),
      makeChunk({ chunkId: 'c-2', platform: 'claude', conversationId: 'claude-1' }),
    ]).saveToFile(saved);
    const tree = fixturePath('tree-export.json');
    const output = join(dir, 'merged.json');

    await mergeCommand.handler([tree, saved, '--output', output]);

    const lines = vi.mocked(console.log).mock.calls.map((call) => call[0]);
    expect(lines).toEqual([
      `  ${tree}: 2 chunks`,
      `  ${saved}: 2 chunks`,
      'Merged 2 files: 4 chunks',
      '  chatgpt: 2',
      '  claude: 2',
      `Saved to ${output}`,
    ]);

    const merged = await ChunkCollection.loadFromFile(output);
    expect(merged.chunks.map((c) => c.chunkId).slice(2)).toEqual(['c-1', 'c-2']);
  });

  it('exits with code 2 without inputs', async () => {
    await mergeCommand.handler(['--output', join(dir, 'out.json')]);

    expect(console.error).toHaveBeenCalledWith('Error: At least one input file required');
    expect(process.exit).toHaveBeenCalledWith(2);
  });

  it('exits with code 2 without --output', async () => {
    await mergeCommand.handler([fixturePath('tree-export.json')]);

    expect(console.error).toHaveBeenCalledWith('Error: --output required');
    expect(process.exit).toHaveBeenCalledWith(2);
  });
});
