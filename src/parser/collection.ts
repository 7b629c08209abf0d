/**
 * Ordered collection of normalized chunks.
 *
 * Collections from different platforms merge by concatenation; conversation ids
 * are not reconciled across platforms.
 *
 * Persisted form interns identical `aiInterpretations` into a shared table:
 *
 * ```json
 * {
 *   "chunks": [{ "chunkId": "...", "aiInterpretationRef": "interp_0", ... }],
 *   "interpretations": { "interp_0": { "user_context_message_data": { ... } } },
 *   "metadata": { "totalChunks": 1, "platforms": { "chatgpt": 1 }, ... }
 * }
 * ```
 */

import { writeFile } from 'node:fs/promises';
import { hasInterpretations } from './chunk.js';
import { loadJsonFile, type LoadInputOptions } from './input-loader.js';
import {
  isPlatform,
  type Chunk,
  type DateRange,
  type Interpretations,
  type Platform,
} from './types.js';
import { MalformedInputError } from '../utils/errors.js';
import { asArray, asNumber, asRecord, asString, isRecord, type JsonRecord } from '../utils/guards.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('collection');

export interface PlatformStats {
  chunkCount: number;
  conversationCount: number;
  dateRange: DateRange;
  withInterpretations: number;
  withToolUsage: number;
}

export interface CollectionMetadata {
  totalChunks: number;
  platforms: Record<string, number>;
  dateRange: DateRange;
  createdAt: string;
  uniqueInterpretations: number;
  /** Share of interpretation payloads removed by interning, e.g. "66.7%" */
  deduplicationSavings: string | null;
}

/** A chunk as written to disk. */
export type PersistedChunk = Omit<Chunk, 'aiInterpretations'> & {
  aiInterpretations?: Interpretations;
  aiInterpretationRef?: string;
};

export interface PersistedCollection {
  chunks: PersistedChunk[];
  interpretations: Record<string, Interpretations>;
  metadata: CollectionMetadata;
}

export interface SerializeOptions {
  /** Intern identical interpretations. Default: true */
  deduplicate?: boolean;
  /** Clock for `metadata.createdAt` */
  now?: Date;
}

export interface SaveOptions extends SerializeOptions {
  /** Indent the JSON output. Default: true */
  pretty?: boolean;
}

function timeOf(timestamp: string): number {
  return Date.parse(timestamp);
}

export class ChunkCollection implements Iterable<Chunk> {
  private readonly items: Chunk[] = [];

  constructor(chunks: Iterable<Chunk> = []) {
    for (const chunk of chunks) {
      this.items.push(chunk);
    }
  }

  /**
   * Concatenate collections in order.
   */
  static merge(...collections: ChunkCollection[]): ChunkCollection {
    const merged = new ChunkCollection();
    for (const collection of collections) {
      merged.addAll(collection);
    }
    return merged;
  }

  get size(): number {
    return this.items.length;
  }

  get chunks(): readonly Chunk[] {
    return this.items;
  }

  [Symbol.iterator](): Iterator<Chunk> {
    return this.items[Symbol.iterator]();
  }

  add(chunk: Chunk): void {
    this.items.push(chunk);
  }

  addAll(chunks: Iterable<Chunk>): void {
    for (const chunk of chunks) {
      this.items.push(chunk);
    }
  }

  /** Platforms present, in first-seen order. */
  platforms(): Platform[] {
    return [...new Set(this.items.map((c) => c.platform))];
  }

  platformCounts(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const chunk of this.items) {
      counts[chunk.platform] = (counts[chunk.platform] ?? 0) + 1;
    }
    return counts;
  }

  conversationCount(platform?: Platform): number {
    return new Set(this.select(platform).map((c) => c.conversationId)).size;
  }

  /**
   * Earliest and latest timestamps; chunks without one are ignored.
   */
  dateRange(platform?: Platform): DateRange {
    let earliest: string | null = null;
    let latest: string | null = null;

    for (const chunk of this.select(platform)) {
      const ts = chunk.timestamp;
      if (ts === null || Number.isNaN(timeOf(ts))) continue;
      if (earliest === null || timeOf(ts) < timeOf(earliest)) earliest = ts;
      if (latest === null || timeOf(ts) > timeOf(latest)) latest = ts;
    }

    return { earliest, latest };
  }

  platformStats(): Partial<Record<Platform, PlatformStats>> {
    const stats: Partial<Record<Platform, PlatformStats>> = {};
    for (const platform of this.platforms()) {
      const chunks = this.select(platform);
      stats[platform] = {
        chunkCount: chunks.length,
        conversationCount: this.conversationCount(platform),
        dateRange: this.dateRange(platform),
        withInterpretations: chunks.filter(hasInterpretations).length,
        withToolUsage: chunks.filter((c) => c.toolUsage.length > 0).length,
      };
    }
    return stats;
  }

  private select(platform?: Platform): Chunk[] {
    return platform ? this.items.filter((c) => c.platform === platform) : this.items;
  }

  /**
   * Build the persisted form.
   */
  serialize(options: SerializeOptions = {}): PersistedCollection {
    const deduplicate = options.deduplicate ?? true;
    const interpretations: Record<string, Interpretations> = {};
    const refsByKey = new Map<string, string>();
    let withInterpretations = 0;

    const chunks = this.items.map((chunk): PersistedChunk => {
      const { aiInterpretations, ...rest } = chunk;
      if (!deduplicate || Object.keys(aiInterpretations).length === 0) {
        return { ...rest, aiInterpretations };
      }

      withInterpretations++;
      const key = JSON.stringify(aiInterpretations);
      let ref = refsByKey.get(key);
      if (ref === undefined) {
        ref = `interp_${refsByKey.size}`;
        refsByKey.set(key, ref);
        interpretations[ref] = aiInterpretations;
      }
      return { ...rest, aiInterpretationRef: ref };
    });

    const unique = refsByKey.size;
    const savings =
      withInterpretations > 0
        ? `${((1 - unique / withInterpretations) * 100).toFixed(1)}%`
        : null;

    return {
      chunks,
      interpretations,
      metadata: {
        totalChunks: this.items.length,
        platforms: this.platformCounts(),
        dateRange: this.dateRange(),
        createdAt: (options.now ?? new Date()).toISOString(),
        uniqueInterpretations: unique,
        deduplicationSavings: savings,
      },
    };
  }

  /**
   * Rebuild a collection from its persisted form, resolving interpretation refs.
   */
  static deserialize(data: unknown): ChunkCollection {
    if (!isRecord(data) || !Array.isArray(data.chunks)) {
      throw new MalformedInputError('Collection must be an object with a "chunks" array');
    }

    const table = asRecord(data.interpretations);
    const collection = new ChunkCollection();

    data.chunks.forEach((raw, index) => {
      if (!isRecord(raw)) {
        throw new MalformedInputError(`Chunk ${index} is not an object`);
      }
      collection.add(chunkFromRecord(raw, table, index));
    });

    return collection;
  }

  async saveToFile(path: string, options: SaveOptions = {}): Promise<PersistedCollection> {
    const persisted = this.serialize(options);
    const pretty = options.pretty ?? true;
    await writeFile(path, JSON.stringify(persisted, null, pretty ? 2 : undefined), 'utf-8');
    log.info('Saved collection', {
      path,
      chunks: persisted.metadata.totalChunks,
      uniqueInterpretations: persisted.metadata.uniqueInterpretations,
    });
    return persisted;
  }

  static async loadFromFile(path: string, options: LoadInputOptions = {}): Promise<ChunkCollection> {
    const input = await loadJsonFile(path, options);
    const collection = ChunkCollection.deserialize(input.data);
    log.debug('Loaded collection', { path, chunks: collection.size });
    return collection;
  }
}

function resolveInterpretations(raw: JsonRecord, table: JsonRecord, index: number): Interpretations {
  const ref = asString(raw.aiInterpretationRef);
  if (ref === undefined) {
    return asRecord(raw.aiInterpretations);
  }
  const resolved = table[ref];
  if (!isRecord(resolved)) {
    throw new MalformedInputError(
      `Chunk ${index} references unknown interpretation ${ref}`,
      'UNKNOWN_INTERPRETATION_REF',
    );
  }
  return structuredClone(resolved);
}

function nullableString(value: unknown): string | null {
  return asString(value) ?? null;
}

function chunkFromRecord(raw: JsonRecord, table: JsonRecord, index: number): Chunk {
  const chunkId = asString(raw.chunkId);
  const conversationId = asString(raw.conversationId);
  if (chunkId === undefined || conversationId === undefined) {
    throw new MalformedInputError(`Chunk ${index} is missing chunkId or conversationId`);
  }
  if (!isPlatform(raw.platform)) {
    throw new MalformedInputError(`Chunk ${index} has unknown platform ${String(raw.platform)}`);
  }

  return {
    chunkId,
    conversationId,
    platform: raw.platform,
    timestamp: nullableString(raw.timestamp),
    conversationStart: nullableString(raw.conversationStart),
    userMessage: nullableString(raw.userMessage),
    assistantMessage: nullableString(raw.assistantMessage),
    userMessageType: nullableString(raw.userMessageType),
    assistantMessageType: nullableString(raw.assistantMessageType),
    aiInterpretations: resolveInterpretations(raw, table, index),
    systemContext: asRecord(raw.systemContext),
    toolUsage: asArray(raw.toolUsage).filter(isRecord),
    turnNumber: asNumber(raw.turnNumber) ?? 0,
    hasBranches: raw.hasBranches === true,
    conversationTitle: asString(raw.conversationTitle) ?? 'Untitled',
    assistantModel: nullableString(raw.assistantModel),
    rawMetadata: asRecord(raw.rawMetadata),
  };
}
