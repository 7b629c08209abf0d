import type { Command } from '../types.js';
import { flagValue, hasFlag, intFlag, loadCliConfig, positionals, usageError } from '../utils.js';
import type { SearchFilters, SearchOutcome, SearchResult } from '../../retrieval/types.js';
import { parseIdList, parseSearchMode } from '../../server/params.js';

const USAGE =
  'chatstrata search <query> [--mode <hybrid|recommend|order_by|mmr|groups>] [--limit <n>] ' +
  '[--platform <name>] [--interpretations] [--from <date>] [--to <date>] [--metadata <key:value>] ' +
  '[--positive <ids>] [--negative <ids>] [--order-by <field>] [--asc] [--diversity <0-1>] ' +
  '[--group-by <field>] [--group-size <n>] [--json]';

const VALUE_FLAGS = [
  'mode',
  'limit',
  'platform',
  'from',
  'to',
  'metadata',
  'positive',
  'negative',
  'order-by',
  'diversity',
  'group-by',
  'group-size',
];

export function filtersFromArgs(args: string[]): SearchFilters {
  const diversity = flagValue(args, 'diversity');
  return {
    mode: parseSearchMode(flagValue(args, 'mode')),
    limit: intFlag(args, 'limit'),
    platform: flagValue(args, 'platform'),
    withInterpretations: hasFlag(args, 'interpretations'),
    dateFrom: flagValue(args, 'from'),
    dateTo: flagValue(args, 'to'),
    metadataFilter: flagValue(args, 'metadata'),
    positiveIds: parseIdList(flagValue(args, 'positive')),
    negativeIds: parseIdList(flagValue(args, 'negative')),
    orderByField: flagValue(args, 'order-by'),
    orderDirection: hasFlag(args, 'asc') ? 'asc' : 'desc',
    mmrDiversity: diversity === undefined ? undefined : parseFloat(diversity),
    groupBy: flagValue(args, 'group-by'),
    groupSize: intFlag(args, 'group-size'),
  };
}

function truncate(text: string, max: number): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max - 3)}...` : flat;
}

function printResult(result: SearchResult, indent = ''): void {
  const date = result.timestamp ? result.timestamp.slice(0, 10) : 'undated';
  console.log(
    `${indent}${result.id}. [${result.score}] ${result.conversationTitle} (${result.platform}, ${date})`,
  );
  console.log(`${indent}   id: ${result.pointId}`);
  if (result.userMessage) console.log(`${indent}   Q: ${truncate(result.userMessage, 120)}`);
  if (result.assistantMessage) {
    console.log(`${indent}   A: ${truncate(result.assistantMessage, 200)}`);
  }
}

function printOutcome(outcome: SearchOutcome): void {
  if (outcome.kind === 'groups') {
    console.log(`${outcome.groups.length} groups (${outcome.executionTimeMs}ms)`);
    for (const group of outcome.groups) {
      console.log('');
      console.log(`${group.groupKey}:`);
      for (const hit of group.hits) printResult(hit, '  ');
    }
    return;
  }
  console.log(`${outcome.results.length} results, ${outcome.mode} (${outcome.executionTimeMs}ms)`);
  for (const result of outcome.results) {
    console.log('');
    printResult(result);
  }
}

export const searchCommand: Command = {
  name: 'search',
  description: 'Search the indexed conversations',
  usage: USAGE,
  handler: async (args) => {
    const query = positionals(args, VALUE_FLAGS).join(' ');
    const filters = filtersFromArgs(args);
    if (!query && filters.mode !== 'recommend') {
      usageError('Query required', USAGE);
      return;
    }

    const { createServices } = await import('../../services.js');
    const { dispatcher } = createServices(loadCliConfig());
    const outcome = await dispatcher.search(query, filters);

    if (hasFlag(args, 'json')) {
      console.log(JSON.stringify(outcome, null, 2));
    } else {
      printOutcome(outcome);
    }
  },
};
