/**
 * Normalizer for tree-structured exports (ChatGPT `conversations.json`).
 *
 * Each conversation stores its messages as a `mapping` of node id to
 * `{ message, parent, children }`. Regenerated answers and edited prompts
 * appear as sibling children, so the tree is walked depth-first along every
 * branch and the resulting message sequence is folded into user/assistant chunks.
 */

import { ChunkCollection } from './collection.js';
import { createChunk, isValidChunk } from './chunk.js';
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

const log = createLogger('normalizer', { platform: 'chatgpt' });

/** One message taken out of the tree, in traversal order. */
export interface TreeMessage {
  nodeId: string;
  role: string;
  authorName: string | null;
  content: string;
  contentType: string;
  timestamp: string | null;
  metadata: JsonRecord;
  /** Number of continuations below this node */
  childCount: number;
}

/**
 * Id of the node without a parent, or undefined when every node has one.
 */
export function findRoot(mapping: JsonRecord): string | undefined {
  for (const [id, node] of Object.entries(mapping)) {
    if (isRecord(node) && (node.parent === null || node.parent === undefined)) {
      return id;
    }
  }
  return undefined;
}

/**
 * Text of a message's `content` block, trimmed.
 */
export function extractContent(content: JsonRecord): string {
  const parts = asArray(content.parts);
  const contentType = asString(content.content_type);

  let text: string;
  if (contentType === 'multimodal_text') {
    text = parts
      .map((part) => {
        if (typeof part === 'string') return part;
        if (isRecord(part) && typeof part.text === 'string') return part.text;
        return '';
      })
      .join('');
  } else if (parts.length > 0) {
    text = parts.filter((part): part is string => typeof part === 'string' && part !== '').join('\n');
  } else {
    text = asString(content.text) ?? '';
  }

  return text.trim();
}

function toTreeMessage(nodeId: string, node: JsonRecord): TreeMessage | null {
  const message = node.message;
  if (!isRecord(message)) return null;

  const author = asRecord(message.author);
  const role = asString(author.role);
  if (role === undefined) return null;

  const content = asRecord(message.content);

  return {
    nodeId,
    role,
    authorName: asString(author.name) ?? null,
    content: extractContent(content),
    contentType: asString(content.content_type) ?? 'text',
    timestamp: toIsoTimestamp(message.create_time),
    metadata: asRecord(message.metadata),
    childCount: asArray(node.children).length,
  };
}

/**
 * Walk the tree depth-first from the root, following every child in order.
 *
 * Uses an explicit stack and a visited set, so cycles and deep trees terminate.
 */
export function flattenTree(mapping: JsonRecord): TreeMessage[] {
  const rootId = findRoot(mapping);
  if (rootId === undefined) return [];

  const messages: TreeMessage[] = [];
  const visited = new Set<string>();
  const stack: string[] = [rootId];

  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || visited.has(id)) continue;
    visited.add(id);

    const node = mapping[id];
    if (!isRecord(node)) continue;

    const message = toTreeMessage(id, node);
    if (message) messages.push(message);

    // Reverse so the first child is popped first
    const children = asArray(node.children).filter((c): c is string => typeof c === 'string');
    for (let i = children.length - 1; i >= 0; i--) {
      if (!visited.has(children[i])) stack.push(children[i]);
    }
  }

  return messages;
}

interface ConversationMeta {
  conversationId: string;
  title: string;
  conversationStart: string | null;
}

export class TreeExportNormalizer implements ExportNormalizer {
  readonly platform = 'chatgpt' as const;

  validate(data: unknown): boolean {
    if (!Array.isArray(data)) return false;
    if (data.length === 0) return true;

    const first: unknown = data[0];
    if (!isRecord(first) || !isRecord(first.mapping)) return false;

    const nodes = Object.values(first.mapping);
    if (nodes.length === 0) return true;
    return nodes.some((node) => isRecord(node) && ('children' in node || 'parent' in node));
  }

  parseExport(data: unknown, options: NormalizeOptions = {}): ChunkCollection {
    const collection = new ChunkCollection();

    asArray(data).forEach((conversation, index) => {
      if (!isRecord(conversation) || !isRecord(conversation.mapping)) {
        log.warn('Skipping conversation without a mapping', { index });
        return;
      }
      const meta: ConversationMeta = {
        conversationId:
          asString(conversation.conversation_id) ?? asString(conversation.id) ?? `conversation_${index}`,
        title: asString(conversation.title) || 'Untitled',
        conversationStart: toIsoTimestamp(conversation.create_time),
      };
      collection.addAll(this.foldMessages(flattenTree(conversation.mapping), meta, options));
    });

    log.debug('Parsed tree export', { chunks: collection.size });
    return collection;
  }

  /**
   * Fold a flattened message sequence into chunks.
   *
   * System text and the user-context side channel persist across chunks;
   * tool records and the pending user message reset at every assistant message.
   */
  foldMessages(
    messages: TreeMessage[],
    meta: ConversationMeta,
    options: NormalizeOptions = {},
  ): Chunk[] {
    const includeRaw = options.includeRawMetadata ?? true;
    const chunks: Chunk[] = [];
    const systemInterpretations: string[] = [];
    let userContext: Interpretations = {};
    let tools: ToolUsageRecord[] = [];
    let pending: TreeMessage | null = null;
    let turnNumber = 0;

    for (const message of messages) {
      switch (message.role) {
        case 'system': {
          const system = this.extractSystemContext(message);
          const text = system.system_message;
          if (typeof text === 'string' && !systemInterpretations.includes(text)) {
            systemInterpretations.push(text);
          }
          break;
        }
        case 'user': {
          pending = message;
          const interpretations = this.extractInterpretations(message);
          if (Object.keys(interpretations).length > 0) {
            userContext = interpretations;
          }
          break;
        }
        case 'tool':
          tools.push(
            message.authorName ? { tool_name: message.authorName, ...message.metadata } : message.metadata,
          );
          break;
        case 'assistant': {
          if (pending) {
            const model = asString(message.metadata.model_slug);
            const chunk = createChunk({
              conversationId: meta.conversationId,
              platform: this.platform,
              timestamp: pending.timestamp,
              conversationStart: meta.conversationStart,
              userMessage: pending.content,
              userMessageType: pending.contentType,
              assistantMessage: message.content,
              assistantMessageType: message.contentType,
              assistantModel: model ?? null,
              aiInterpretations: { ...userContext },
              systemContext:
                systemInterpretations.length > 0
                  ? { system_interpretations: [...systemInterpretations] }
                  : {},
              toolUsage: tools,
              turnNumber,
              hasBranches: pending.childCount > 1 || message.childCount > 1,
              conversationTitle: meta.title,
              rawMetadata: includeRaw
                ? { user_metadata: pending.metadata, assistant_metadata: message.metadata }
                : {},
            });

            if (isValidChunk(chunk)) {
              chunks.push(chunk);
              turnNumber++;
            }
          }
          pending = null;
          tools = [];
          break;
        }
        default:
          log.debug('Ignoring message with unknown role', { role: message.role });
      }
    }

    return chunks;
  }

  /**
   * The user-context side channel (`metadata.user_context_message_data`).
   */
  extractInterpretations(message: unknown): Interpretations {
    const metadata = isRecord(message) ? asRecord(message.metadata) : {};
    const data = metadata.user_context_message_data;
    if (isRecord(data) && Object.keys(data).length > 0) {
      return { user_context_message_data: data };
    }
    return {};
  }

  extractSystemContext(message: unknown): SystemContext {
    if (!isRecord(message) || message.role !== 'system') return {};
    const content = asString(message.content);
    return content ? { system_message: content } : {};
  }

  describeExport(data: unknown): ExportSummary {
    const conversations = asArray(data);
    const range = new DateRangeTracker();
    const models = new Set<string>();
    let messages = 0;
    let withInterpretations = 0;
    let withToolUsage = 0;

    for (const conversation of conversations) {
      const mapping = isRecord(conversation) ? asRecord(conversation.mapping) : {};
      for (const node of Object.values(mapping)) {
        if (!isRecord(node) || !isRecord(node.message)) continue;
        const message = node.message;
        const metadata = asRecord(message.metadata);
        messages++;
        range.add(toIsoTimestamp(message.create_time));

        const model = asString(metadata.model_slug);
        if (model) models.add(model);
        if (isRecord(metadata.user_context_message_data)) withInterpretations++;
        if (asRecord(message.author).role === 'tool' || 'search_result_groups' in metadata) {
          withToolUsage++;
        }
      }
    }

    return {
      platform: this.platform,
      exportType: 'conversations',
      totalItems: conversations.length,
      counts: {
        conversations: conversations.length,
        messages,
        messagesWithInterpretations: withInterpretations,
        messagesWithToolUsage: withToolUsage,
      },
      dateRange: range.toRange(),
      models: [...models].sort(),
    };
  }
}
