/**
 * Normalizer for flat, alternating-turn exports (Claude `conversations.json`).
 *
 * A human turn followed directly by an assistant turn becomes one chunk;
 * turns that break the alternation are skipped.
 */

import { randomUUID } from 'node:crypto';
import { ChunkCollection } from './collection.js';
import { createChunk } from './chunk.js';
import { DateRangeTracker, type ExportNormalizer } from './normalizer.js';
import type {
  Chunk,
  ExportSummary,
  Interpretations,
  NormalizeOptions,
  SystemContext,
  ToolUsageRecord,
} from './types.js';
import { asArray, asRecord, asString, isRecord, type JsonRecord } from '../utils/guards.js';
import { createLogger } from '../utils/logger.js';
import { toIsoTimestamp } from '../utils/time.js';

const log = createLogger('normalizer', { platform: 'claude' });

const TURN_LIST_FIELDS = ['chat_messages', 'messages', 'turns', 'exchanges'] as const;
const CONTENT_FIELDS = ['content', 'text', 'message', 'body'] as const;
const TIMESTAMP_FIELDS = ['created_at', 'timestamp', 'create_time', 'date', 'time'] as const;

const HUMAN_ROLES = new Set(['human', 'user']);
const ASSISTANT_ROLES = new Set(['assistant', 'ai', 'model']);

export type TurnRole = 'human' | 'assistant' | 'other';

export function turnRole(turn: JsonRecord): TurnRole {
  const role = (asString(turn.sender) ?? asString(turn.role) ?? '').toLowerCase();
  if (HUMAN_ROLES.has(role)) return 'human';
  if (ASSISTANT_ROLES.has(role)) return 'assistant';
  return 'other';
}

function blockText(block: unknown): string {
  if (typeof block === 'string') return block;
  if (isRecord(block) && typeof block.text === 'string') return block.text;
  return '';
}

/**
 * Text of a turn, or null when it has none.
 *
 * Content is a string or a list of blocks; block texts are joined with newlines.
 * A block list without text (tool calls only) falls through to the next field.
 */
export function extractTurnText(turn: JsonRecord): string | null {
  for (const field of CONTENT_FIELDS) {
    const value = turn[field];
    let text = '';
    if (typeof value === 'string') {
      text = value;
    } else if (Array.isArray(value)) {
      text = value
        .map(blockText)
        .filter((t) => t !== '')
        .join('\n');
    }
    text = text.trim();
    if (text !== '') return text;
  }
  return null;
}

/**
 * First parsable timestamp among the known fields.
 */
export function extractTurnTimestamp(turn: JsonRecord): string | null {
  for (const field of TIMESTAMP_FIELDS) {
    if (!(field in turn)) continue;
    const parsed = toIsoTimestamp(turn[field]);
    if (parsed !== null) return parsed;
  }
  return null;
}

function turnsOf(conversation: JsonRecord): unknown[] {
  for (const field of TURN_LIST_FIELDS) {
    const turns = conversation[field];
    if (Array.isArray(turns) && turns.length > 0) return turns;
  }
  return [];
}

function contentBlocks(turn: JsonRecord): JsonRecord[] {
  return asArray(turn.content).filter(isRecord);
}

/**
 * Conversations in an export: a list, a `{ conversations }` wrapper, or one conversation.
 */
export function conversationsOf(data: unknown): JsonRecord[] {
  if (Array.isArray(data)) return data.filter(isRecord);
  if (isRecord(data)) {
    if (Array.isArray(data.conversations)) return data.conversations.filter(isRecord);
    return [data];
  }
  return [];
}

function hasTurnList(record: JsonRecord): boolean {
  return TURN_LIST_FIELDS.some((field) => Array.isArray(record[field]));
}

export class PairedTurnExportNormalizer implements ExportNormalizer {
  readonly platform = 'claude' as const;

  validate(data: unknown): boolean {
    if (Array.isArray(data)) {
      if (data.length === 0) return true;
      const first: unknown = data[0];
      return isRecord(first) && hasTurnList(first);
    }
    if (isRecord(data)) {
      return Array.isArray(data.conversations) || hasTurnList(data);
    }
    return false;
  }

  parseExport(data: unknown, options: NormalizeOptions = {}): ChunkCollection {
    const collection = new ChunkCollection();
    for (const conversation of conversationsOf(data)) {
      collection.addAll(this.pairTurns(conversation, options));
    }
    log.debug('Parsed paired-turn export', { chunks: collection.size });
    return collection;
  }

  /**
   * Greedily pair each human turn with the assistant turn right after it.
   */
  pairTurns(conversation: JsonRecord, options: NormalizeOptions = {}): Chunk[] {
    const includeRaw = options.includeRawMetadata ?? true;
    const conversationId =
      asString(conversation.uuid) ?? asString(conversation.id) ?? randomUUID();
    const title = asString(conversation.name) || asString(conversation.title) || 'Untitled';
    const conversationStart = extractTurnTimestamp(conversation);

    const turns = turnsOf(conversation).filter(isRecord);
    const chunks: Chunk[] = [];
    let turnNumber = 0;
    let i = 0;

    while (i < turns.length) {
      const user = turns[i];
      const assistant = turns[i + 1];
      if (turnRole(user) !== 'human' || assistant === undefined || turnRole(assistant) !== 'assistant') {
        i++;
        continue;
      }
      i += 2;

      const userText = extractTurnText(user);
      const assistantText = extractTurnText(assistant);
      if (userText === null || assistantText === null) continue;

      chunks.push(
        createChunk({
          conversationId,
          platform: this.platform,
          timestamp: extractTurnTimestamp(user),
          conversationStart,
          userMessage: userText,
          userMessageType: asString(user.type) ?? 'text',
          assistantMessage: assistantText,
          assistantMessageType: asString(assistant.type) ?? 'text',
          assistantModel: asString(asRecord(assistant.metadata).model) ?? null,
          aiInterpretations: this.extractInterpretations(assistant),
          systemContext: this.extractSystemContext(user),
          toolUsage: this.extractToolUsage(assistant),
          turnNumber,
          conversationTitle: title,
          rawMetadata: includeRaw ? { user_raw: user, assistant_raw: assistant } : {},
        }),
      );
      turnNumber++;
    }

    return chunks;
  }

  /**
   * Reasoning traces and user modeling attached to an assistant turn.
   */
  extractInterpretations(message: unknown): Interpretations {
    if (!isRecord(message)) return {};
    const interpretations: Interpretations = {};
    const metadata = asRecord(message.metadata);

    const thinkingBlocks = contentBlocks(message)
      .filter((block) => block.type === 'thinking')
      .map((block) => asString(block.thinking) ?? '')
      .filter((t) => t !== '');
    if (message.thinking !== undefined) {
      interpretations.thinking = message.thinking;
    } else if (thinkingBlocks.length > 0) {
      interpretations.thinking = thinkingBlocks.join('\n');
    }

    if (metadata.reasoning !== undefined) interpretations.reasoning = metadata.reasoning;
    if (metadata.user_model !== undefined) interpretations.user_model = metadata.user_model;

    return interpretations;
  }

  extractSystemContext(message: unknown): SystemContext {
    if (!isRecord(message)) return {};
    const context: SystemContext = {};
    if (message.role === 'system') {
      context.system_prompt = extractTurnText(message) ?? '';
    }
    const metadata = asRecord(message.metadata);
    if (metadata.system_instructions !== undefined) {
      context.system_instructions = metadata.system_instructions;
    }
    return context;
  }

  /** `tool_use` blocks of an assistant turn. */
  extractToolUsage(message: JsonRecord): ToolUsageRecord[] {
    return contentBlocks(message)
      .filter((block) => block.type === 'tool_use')
      .map((block) => ({ tool_name: asString(block.name) ?? 'unknown', input: block.input ?? null }));
  }

  describeExport(data: unknown): ExportSummary {
    const conversations = conversationsOf(data);
    const range = new DateRangeTracker();
    let messages = 0;

    for (const conversation of conversations) {
      range.add(extractTurnTimestamp(conversation));
      for (const turn of turnsOf(conversation)) {
        if (!isRecord(turn)) continue;
        messages++;
        range.add(extractTurnTimestamp(turn));
      }
    }

    return {
      platform: this.platform,
      exportType: 'conversations',
      totalItems: conversations.length,
      counts: { conversations: conversations.length, messages },
      dateRange: range.toRange(),
      models: [],
    };
  }
}

