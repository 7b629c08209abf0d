/**
 * Index payload stored next to each chunk's vectors.
 *
 * Field names are snake_case, matching the keys filters and group-by refer to.
 * `timestamp` is epoch seconds so range filters work on it.
 */

import { hasInterpretations } from '../parser/chunk.js';
import type { Chunk } from '../parser/types.js';
import { asRecord, asString } from '../utils/guards.js';
import { toEpochSeconds } from '../utils/time.js';

/** Prefix of the payload object that `key:value` metadata filters address. */
export const METADATA_FIELD = 'metadata';

export type IndexPayload = {
  chunk_id: string;
  conversation_id: string;
  platform: string;
  timestamp: number | null;
  conversation_title: string;
  turn_number: number;
  user_message: string | null;
  assistant_message: string | null;
  user_message_type: string | null;
  assistant_message_type: string | null;
  assistant_model: string | null;
  has_interpretations: boolean;
  about_user?: string;
  about_model?: string;
  system_context?: Record<string, unknown>;
  /** Scalar system-context entries, addressable as `metadata.<key>` */
  metadata: Record<string, string | number | boolean>;
  has_tool_usage?: boolean;
  tool_count?: number;
};

function scalarEntries(source: Record<string, unknown>): Record<string, string | number | boolean> {
  const result: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(source)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      result[key] = value;
    }
  }
  return result;
}

export function chunkToPayload(chunk: Chunk): IndexPayload {
  const payload: IndexPayload = {
    chunk_id: chunk.chunkId,
    conversation_id: chunk.conversationId,
    platform: chunk.platform,
    timestamp: chunk.timestamp === null ? null : toEpochSeconds(chunk.timestamp),
    conversation_title: chunk.conversationTitle,
    turn_number: chunk.turnNumber,
    user_message: chunk.userMessage,
    assistant_message: chunk.assistantMessage,
    user_message_type: chunk.userMessageType,
    assistant_message_type: chunk.assistantMessageType,
    assistant_model: chunk.assistantModel,
    has_interpretations: hasInterpretations(chunk),
    metadata: scalarEntries(chunk.systemContext),
  };

  if (chunk.platform === 'chatgpt' && payload.has_interpretations) {
    const userContext = asRecord(chunk.aiInterpretations.user_context_message_data);
    payload.about_user = asString(userContext.about_user_message) ?? '';
    payload.about_model = asString(userContext.about_model_message) ?? '';
  }

  if (Object.keys(chunk.systemContext).length > 0) {
    payload.system_context = chunk.systemContext;
  }

  if (chunk.toolUsage.length > 0) {
    payload.has_tool_usage = true;
    payload.tool_count = chunk.toolUsage.length;
  }

  return payload;
}
