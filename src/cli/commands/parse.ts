import type { Command } from '../types.js';
import { flagValue, hasFlag, loadCliConfig, positionals, usageError } from '../utils.js';
import { isPlatform, PLATFORMS } from '../../parser/types.js';
import { platformLabel } from '../../parser/chunk.js';
import { defaultRegistry } from '../../parser/registry.js';

const USAGE =
  'chatstrata parse <export.json> [--output <file>] [--platform <name>] [--raw-metadata] [--no-dedup] [--compact]';

/** `conversations.json` becomes `conversations.chunks.json`. */
export function defaultOutputPath(input: string): string {
  return input.replace(/(\.json)?$/i, '.chunks.json');
}

export const parseCommand: Command = {
  name: 'parse',
  description: 'Normalize a chat export into a chunk collection file',
  usage: USAGE,
  handler: async (args) => {
    const [input] = positionals(args, ['output', 'platform']);
    if (!input) {
      usageError('Export file required', USAGE);
      return;
    }

    const platform = flagValue(args, 'platform');
    if (platform !== undefined && !isPlatform(platform)) {
      usageError(`Unknown platform: ${platform} (expected ${PLATFORMS.join(', ')})`, USAGE);
      return;
    }

    const config = loadCliConfig();
    const { normalizer, collection } = await defaultRegistry().parseFile(input, {
      platform,
      includeRawMetadata: hasFlag(args, 'raw-metadata') || config.collection.includeRawMetadata,
      maxFileSizeMb: config.input.maxFileSizeMb,
    });

    const output = flagValue(args, 'output') ?? defaultOutputPath(input);
    const persisted = await collection.saveToFile(output, {
      deduplicate: hasFlag(args, 'no-dedup') ? false : config.collection.deduplicateInterpretations,
      pretty: !hasFlag(args, 'compact'),
    });

    console.log(`Detected format: ${platformLabel(normalizer.platform)}`);
    console.log(`Chunks: ${persisted.metadata.totalChunks}`);
    console.log(`Conversations: ${collection.conversationCount()}`);
    console.log(`Unique interpretations: ${persisted.metadata.uniqueInterpretations}`);
    if (persisted.metadata.deduplicationSavings !== null) {
      console.log(`Deduplication savings: ${persisted.metadata.deduplicationSavings}`);
    }
    console.log(`Saved to ${output}`);
  },
};
