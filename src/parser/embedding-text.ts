/**
 * Text sent to the Embedding Service for each chunk.
 *
 * Sections are tagged so the sparse side of the model can match on them:
 * `[TOPIC: ...]`, the user message, `[RESPONSE] ...`, `[AI_UNDERSTANDING] ...`,
 * `[AI_NOTES] ...`, `[AI_THINKING] ...`, `[SYSTEM] ...` and `[TOOLS] ...`,
 * joined by blank lines.
 */

import type { Chunk } from './types.js';
import { asArray, asRecord, asString, isRecord } from '../utils/guards.js';

export type EmbeddingTextMode = 'balanced' | 'user_focused' | 'minimal' | 'full';

export const EMBEDDING_TEXT_MODES: readonly EmbeddingTextMode[] = [
  'balanced',
  'user_focused',
  'minimal',
  'full',
];

export function isEmbeddingTextMode(value: unknown): value is EmbeddingTextMode {
  return typeof value === 'string' && EMBEDDING_TEXT_MODES.some((m) => m === value);
}

export interface EmbeddingTextOptions {
  /** Default: 'balanced' */
  mode?: EmbeddingTextMode;
  /** Assistant text kept in balanced mode, split between head and tail. Default: 3000 */
  maxAssistantChars?: number;
  /** Default: true */
  includeInterpretations?: boolean;
  /** Default: true */
  includeTitle?: boolean;
}

const TRUNCATION_MARKER = '\n[...]\n';

function truncateMiddle(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  const half = Math.floor(maxChars / 2);
  if (half === 0) return TRUNCATION_MARKER;
  return text.slice(0, half) + TRUNCATION_MARKER + text.slice(-half);
}

function describeValue(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

function interpretationParts(chunk: Chunk): string[] {
  const parts: string[] = [];
  const interpretations = chunk.aiInterpretations;

  if (chunk.platform === 'chatgpt') {
    const userContext = asRecord(interpretations.user_context_message_data);
    const aboutUser = asString(userContext.about_user_message);
    const aboutModel = asString(userContext.about_model_message);
    if (aboutUser) parts.push(`[AI_UNDERSTANDING] ${aboutUser}`);
    if (aboutModel) parts.push(`[AI_NOTES] ${aboutModel}`);
  } else if (chunk.platform === 'claude') {
    if (interpretations.thinking) parts.push(`[AI_THINKING] ${describeValue(interpretations.thinking)}`);
    if (interpretations.user_model) {
      parts.push(`[AI_UNDERSTANDING] ${describeValue(interpretations.user_model)}`);
    }
  }

  return parts;
}

function systemPart(chunk: Chunk): string | null {
  const notes: string[] = [];
  for (const [key, value] of Object.entries(chunk.systemContext)) {
    if (typeof value === 'string' && value !== '') {
      notes.push(`${key}: ${value}`);
    } else if (Array.isArray(value) && value.length > 0) {
      notes.push(`${key}: ${value.map(describeValue).join(', ')}`);
    }
  }
  return notes.length > 0 ? `[SYSTEM] ${notes.join(' | ')}` : null;
}

function toolPart(chunk: Chunk): string | null {
  const summary: string[] = [];
  for (const tool of chunk.toolUsage) {
    if (Array.isArray(tool.search_result_groups)) {
      const domains = asArray(tool.search_result_groups).map((g) =>
        isRecord(g) ? (asString(g.domain) ?? '') : '',
      );
      summary.push(`searched: ${domains.join(', ')}`);
    } else if ('tool_name' in tool) {
      summary.push(`used: ${describeValue(tool.tool_name)}`);
    }
  }
  return summary.length > 0 ? `[TOOLS] ${summary.join(' | ')}` : null;
}

/**
 * Build the embedding text for a chunk.
 *
 * - `minimal`: the user message alone
 * - `user_focused`: user message with interpretations and system notes
 * - `balanced`: adds the assistant response, middle-truncated
 * - `full`: adds the whole response and tool usage
 */
export function toEmbeddingText(chunk: Chunk, options: EmbeddingTextOptions = {}): string {
  const mode = options.mode ?? 'balanced';
  const maxAssistantChars = options.maxAssistantChars ?? 3000;
  const includeInterpretations = options.includeInterpretations ?? true;
  const includeTitle = options.includeTitle ?? true;

  const parts: string[] = [];

  if (includeTitle && chunk.conversationTitle && chunk.conversationTitle !== 'Untitled') {
    parts.push(`[TOPIC: ${chunk.conversationTitle}]`);
  }

  if (chunk.userMessage) {
    if (mode === 'minimal') return chunk.userMessage;
    parts.push(chunk.userMessage);
  }

  if (chunk.assistantMessage && (mode === 'balanced' || mode === 'full')) {
    const assistant =
      mode === 'balanced'
        ? truncateMiddle(chunk.assistantMessage, maxAssistantChars)
        : chunk.assistantMessage;
    parts.push(`[RESPONSE] ${assistant}`);
  }

  if (includeInterpretations) {
    parts.push(...interpretationParts(chunk));
    const system = systemPart(chunk);
    if (system) parts.push(system);
  }

  if (mode === 'full') {
    const tools = toolPart(chunk);
    if (tools) parts.push(tools);
  }

  return parts.join('\n\n');
}
