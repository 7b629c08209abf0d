/**
 * Normalizer for project exports (Claude `projects.json`).
 *
 * The export is a list mixing one account memory record with project records.
 * Nothing in it is dialogue, so each entity becomes a synthetic chunk:
 *
 * | Entity | userMessage | assistantMessage |
 * |---|---|---|
 * | memory | fixed label | the memory text |
 * | project | `[PROJECT: name] description` | prompt template |
 * | document | `[PROJECT: name] [DOC: filename]` | document body |
 */

import { randomUUID } from 'node:crypto';
import { ChunkCollection } from './collection.js';
import { createChunk, TurnCounter } from './chunk.js';
import { DateRangeTracker, type ExportNormalizer } from './normalizer.js';
import type {
  Chunk,
  ExportSummary,
  Interpretations,
  NormalizeOptions,
  SystemContext,
} from './types.js';
import { MalformedInputError } from '../utils/errors.js';
import { asArray, asRecord, asString, isRecord, type JsonRecord } from '../utils/guards.js';
import { createLogger } from '../utils/logger.js';
import { toIsoTimestamp } from '../utils/time.js';

const log = createLogger('normalizer', { platform: 'claude-projects' });

export const MEMORY_LABEL = 'User context and memory across all conversations';
export const NO_INSTRUCTIONS = 'No custom instructions';

export function isMemoryRecord(item: JsonRecord): boolean {
  return 'conversations_memory' in item;
}

function isProjectRecord(item: JsonRecord): boolean {
  return (
    typeof item.uuid === 'string' &&
    typeof item.name === 'string' &&
    !('chat_messages' in item) &&
    !('mapping' in item)
  );
}

export interface ProjectExportOptions {
  /** Clock used for entities without a timestamp */
  now?: () => Date;
}

export class ProjectExportNormalizer implements ExportNormalizer {
  readonly platform = 'claude-projects' as const;
  private readonly now: () => Date;

  constructor(options: ProjectExportOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  validate(data: unknown): boolean {
    if (!Array.isArray(data) || data.length === 0) return false;
    const first: unknown = data[0];
    return isRecord(first) && (isMemoryRecord(first) || isProjectRecord(first));
  }

  parseExport(data: unknown, _options: NormalizeOptions = {}): ChunkCollection {
    if (!Array.isArray(data)) {
      throw new MalformedInputError('Project export must be a list of projects');
    }

    const collection = new ChunkCollection();
    const turns = new TurnCounter();

    for (const item of data) {
      if (!isRecord(item)) continue;
      if (isMemoryRecord(item)) {
        const chunk = this.memoryChunk(item, turns);
        if (chunk) collection.add(chunk);
      } else {
        collection.addAll(this.projectChunks(item, turns));
      }
    }

    log.debug('Parsed project export', { chunks: collection.size });
    return collection;
  }

  private memoryChunk(item: JsonRecord, turns: TurnCounter): Chunk | null {
    const memory = asString(item.conversations_memory) ?? '';
    if (memory.trim() === '') return null;

    const accountUuid = asString(item.account_uuid) ?? '';
    const conversationId = `memory_${accountUuid}`;

    return createChunk({
      conversationId,
      platform: this.platform,
      timestamp: this.now().toISOString(),
      userMessage: MEMORY_LABEL,
      assistantMessage: memory,
      userMessageType: 'memory_context',
      assistantMessageType: 'memory_content',
      aiInterpretations: {
        memory_type: 'user_context',
        account_uuid: accountUuid,
        is_user_memory: true,
      },
      systemContext: { data_type: 'conversations_memory' },
      turnNumber: turns.take(conversationId),
      conversationTitle: 'User Memory',
    });
  }

  private projectChunks(project: JsonRecord, turns: TurnCounter): Chunk[] {
    const projectUuid = asString(project.uuid) ?? randomUUID();
    const name = asString(project.name) || 'Untitled Project';
    const description = asString(project.description) ?? '';
    const promptTemplate = asString(project.prompt_template) ?? '';
    const createdAt = toIsoTimestamp(project.created_at);
    const updatedAt = toIsoTimestamp(project.updated_at);
    const creator = asRecord(project.creator);

    const docChunks: Chunk[] = [];
    for (const doc of asArray(project.docs)) {
      if (!isRecord(doc)) continue;
      const chunk = this.documentChunk(doc, projectUuid, name, createdAt, turns);
      if (chunk) docChunks.push(chunk);
    }

    const overview = createChunk({
      conversationId: projectUuid,
      platform: this.platform,
      timestamp: createdAt ?? this.now().toISOString(),
      conversationStart: createdAt,
      userMessage: description ? `[PROJECT: ${name}] ${description}` : `[PROJECT: ${name}]`,
      assistantMessage: promptTemplate || NO_INSTRUCTIONS,
      userMessageType: 'project_description',
      assistantMessageType: 'project_instructions',
      aiInterpretations: {
        ...this.extractInterpretations(project),
        project_uuid: projectUuid,
        doc_count: docChunks.length,
        content_type: 'project_overview',
      },
      systemContext: {
        created_at: createdAt,
        updated_at: updatedAt,
        creator_name: asString(creator.full_name) ?? '',
        creator_uuid: asString(creator.uuid) ?? '',
      },
      turnNumber: turns.take(projectUuid),
      conversationTitle: name,
    });

    return [overview, ...docChunks];
  }

  private documentChunk(
    doc: JsonRecord,
    projectUuid: string,
    projectName: string,
    projectCreatedAt: string | null,
    turns: TurnCounter,
  ): Chunk | null {
    const content = asString(doc.content) ?? '';
    if (content.trim() === '') return null;

    const docUuid = asString(doc.uuid) ?? randomUUID();
    const filename = asString(doc.filename) || 'Untitled Document';
    const docCreatedAt = toIsoTimestamp(doc.created_at);
    const conversationId = `${projectUuid}_doc_${docUuid}`;

    return createChunk({
      conversationId,
      platform: this.platform,
      timestamp: docCreatedAt ?? projectCreatedAt ?? this.now().toISOString(),
      userMessage: `[PROJECT: ${projectName}] [DOC: ${filename}]`,
      assistantMessage: content,
      userMessageType: 'document_reference',
      assistantMessageType: 'document_content',
      aiInterpretations: {
        project_uuid: projectUuid,
        document_uuid: docUuid,
        parent_project: projectName,
        content_type: 'project_document',
      },
      systemContext: { filename, created_at: docCreatedAt },
      turnNumber: turns.take(conversationId),
      conversationTitle: `${projectName} - ${filename}`,
    });
  }

  /**
   * Project flags worth keeping next to the overview.
   */
  extractInterpretations(message: unknown): Interpretations {
    if (!isRecord(message)) return {};
    const interpretations: Interpretations = {};
    if ('uuid' in message) interpretations.project_uuid = message.uuid;
    if ('is_private' in message) interpretations.is_private = message.is_private;
    if ('is_starter_project' in message) {
      interpretations.is_starter_project = message.is_starter_project;
    }
    return interpretations;
  }

  extractSystemContext(message: unknown): SystemContext {
    if (!isRecord(message)) return {};
    const context: SystemContext = {};
    for (const key of ['created_at', 'updated_at', 'creator']) {
      if (key in message) context[key] = message[key];
    }
    return context;
  }

  describeExport(data: unknown): ExportSummary {
    const items = asArray(data).filter(isRecord);
    const range = new DateRangeTracker();
    let memories = 0;
    let projects = 0;
    let documents = 0;

    for (const item of items) {
      if (isMemoryRecord(item)) {
        memories++;
        continue;
      }
      projects++;
      range.add(toIsoTimestamp(item.created_at));
      for (const doc of asArray(item.docs)) {
        if (!isRecord(doc)) continue;
        documents++;
        range.add(toIsoTimestamp(doc.created_at));
      }
    }

    return {
      platform: this.platform,
      exportType: 'projects',
      totalItems: items.length,
      counts: { memories, projects, documents },
      dateRange: range.toRange(),
      models: [],
    };
  }
}
