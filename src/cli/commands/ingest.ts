import type { Command } from '../types.js';
import { flagValue, intFlag, loadChunks, loadCliConfig, positionals, usageError } from '../utils.js';
import { EMBEDDING_TEXT_MODES, isEmbeddingTextMode } from '../../parser/embedding-text.js';

const USAGE = 'chatstrata ingest <file> [--mode <balanced|user_focused|minimal|full>] [--batch-size <n>]';

export const ingestCommand: Command = {
  name: 'ingest',
  description: 'Embed a collection or export and upload it to the index',
  usage: USAGE,
  handler: async (args) => {
    const [input] = positionals(args, ['mode', 'batch-size']);
    if (!input) {
      usageError('File required', USAGE);
      return;
    }

    const mode = flagValue(args, 'mode') ?? 'balanced';
    if (!isEmbeddingTextMode(mode)) {
      usageError(`Unknown mode: ${mode} (expected ${EMBEDDING_TEXT_MODES.join(', ')})`, USAGE);
      return;
    }
    const batchSize = intFlag(args, 'batch-size');
    if (batchSize !== undefined && !(batchSize > 0)) {
      usageError('--batch-size must be a positive integer', USAGE);
      return;
    }

    const config = loadCliConfig();
    const collection = await loadChunks(input, config);
    console.log(`Loaded ${collection.size} chunks from ${input}`);

    const { createServices } = await import('../../services.js');
    const { ingestCollection } = await import('../../ingest/ingest-collection.js');
    const { index, embedder } = createServices(config);
    await embedder.load();

    const result = await ingestCollection(
      collection,
      { index, embedder },
      {
        mode,
        batchSize,
        progressCallback: ({ done, total }) => {
          process.stdout.write(`\r  Embedded ${done}/${total}`);
        },
      },
    );
    process.stdout.write('\n');

    console.log(`Ingestion complete: ${result.uploaded} points uploaded.`);
    if (result.skipped > 0) {
      console.log(`  Skipped ${result.skipped} chunks with no embedding text.`);
    }
  },
};
