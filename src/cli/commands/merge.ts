import type { Command } from '../types.js';
import { flagValue, hasFlag, loadChunks, loadCliConfig, positionals, usageError } from '../utils.js';
import { ChunkCollection } from '../../parser/collection.js';

const USAGE = 'chatstrata merge <file...> --output <file> [--no-dedup] [--compact]';

export const mergeCommand: Command = {
  name: 'merge',
  description: 'Combine exports and collection files into one collection',
  usage: USAGE,
  handler: async (args) => {
    const inputs = positionals(args, ['output']);
    const output = flagValue(args, 'output');
    if (inputs.length === 0) {
      usageError('At least one input file required', USAGE);
      return;
    }
    if (!output) {
      usageError('--output required', USAGE);
      return;
    }

    const config = loadCliConfig();

    const parts: ChunkCollection[] = [];
    for (const input of inputs) {
      const part = await loadChunks(input, config);
      console.log(`  ${input}: ${part.size} chunks`);
      parts.push(part);
    }

    const merged = ChunkCollection.merge(...parts);
    const persisted = await merged.saveToFile(output, {
      deduplicate: hasFlag(args, 'no-dedup') ? false : config.collection.deduplicateInterpretations,
      pretty: !hasFlag(args, 'compact'),
    });

    console.log(`Merged ${inputs.length} files: ${persisted.metadata.totalChunks} chunks`);
    for (const [platform, count] of Object.entries(merged.platformCounts())) {
      console.log(`  ${platform}: ${count}`);
    }
    console.log(`Saved to ${output}`);
  },
};
