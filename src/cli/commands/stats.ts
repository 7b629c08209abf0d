import type { Command } from '../types.js';
import { hasFlag, loadCliConfig, positionals, usageError } from '../utils.js';
import { ChunkCollection } from '../../parser/collection.js';
import { platformLabel } from '../../parser/chunk.js';
import { loadJsonFile } from '../../parser/input-loader.js';
import { defaultRegistry } from '../../parser/registry.js';
import type { DateRange, ExportSummary } from '../../parser/types.js';
import { isRecord } from '../../utils/guards.js';

const USAGE = 'chatstrata stats <file> [--json]';

function formatRange(range: DateRange): string {
  if (!range.earliest || !range.latest) return 'n/a';
  return `${range.earliest.slice(0, 10)} to ${range.latest.slice(0, 10)}`;
}

function printCollection(collection: ChunkCollection): void {
  console.log('Collection Statistics:');
  console.log(`  Chunks: ${collection.size}`);
  console.log(`  Conversations: ${collection.conversationCount()}`);
  console.log(`  Date range: ${formatRange(collection.dateRange())}`);
  for (const [platform, stats] of Object.entries(collection.platformStats())) {
    console.log('');
    console.log(`  ${platform}:`);
    console.log(`    Chunks: ${stats.chunkCount}`);
    console.log(`    Conversations: ${stats.conversationCount}`);
    console.log(`    Date range: ${formatRange(stats.dateRange)}`);
    console.log(`    With interpretations: ${stats.withInterpretations}`);
    console.log(`    With tool usage: ${stats.withToolUsage}`);
  }
}

function printSummary(summary: ExportSummary): void {
  console.log(`${platformLabel(summary.platform)} export (${summary.exportType}):`);
  console.log(`  Items: ${summary.totalItems}`);
  for (const [name, count] of Object.entries(summary.counts)) {
    console.log(`  ${name}: ${count}`);
  }
  console.log(`  Date range: ${formatRange(summary.dateRange)}`);
  if (summary.models.length > 0) {
    console.log(`  Models: ${summary.models.join(', ')}`);
  }
}

export const statsCommand: Command = {
  name: 'stats',
  description: 'Describe an export or a collection file',
  usage: USAGE,
  handler: async (args) => {
    const [input] = positionals(args);
    if (!input) {
      usageError('File required', USAGE);
      return;
    }

    const config = loadCliConfig();
    const json = hasFlag(args, 'json');
    const { data, extension } = await loadJsonFile(input, {
      maxFileSizeMb: config.input.maxFileSizeMb,
    });

    if (isRecord(data) && Array.isArray(data.chunks)) {
      const collection = ChunkCollection.deserialize(data);
      if (json) {
        console.log(
          JSON.stringify(
            {
              totalChunks: collection.size,
              conversations: collection.conversationCount(),
              dateRange: collection.dateRange(),
              platforms: collection.platformStats(),
            },
            null,
            2,
          ),
        );
      } else {
        printCollection(collection);
      }
      return;
    }

    const summary = defaultRegistry().detectData(data, extension, input).describeExport(data);
    if (json) {
      console.log(JSON.stringify(summary, null, 2));
    } else {
      printSummary(summary);
    }
  },
};
