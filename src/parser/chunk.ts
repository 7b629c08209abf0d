/**
 * Chunk construction and validity rules.
 */

import { randomUUID } from 'node:crypto';
import type { Chunk, Platform } from './types.js';

/** Fields a normalizer must supply; the rest take defaults. */
export type ChunkInit = Pick<Chunk, 'conversationId' | 'platform'> & Partial<Omit<Chunk, 'chunkId'>>;

/**
 * Create a chunk with a fresh id.
 */
export function createChunk(init: ChunkInit): Chunk {
  return {
    chunkId: randomUUID(),
    conversationId: init.conversationId,
    platform: init.platform,
    timestamp: init.timestamp ?? null,
    conversationStart: init.conversationStart ?? null,
    userMessage: init.userMessage ?? null,
    assistantMessage: init.assistantMessage ?? null,
    userMessageType: init.userMessageType ?? null,
    assistantMessageType: init.assistantMessageType ?? null,
    aiInterpretations: init.aiInterpretations ?? {},
    systemContext: init.systemContext ?? {},
    toolUsage: init.toolUsage ?? [],
    turnNumber: init.turnNumber ?? 0,
    hasBranches: init.hasBranches ?? false,
    conversationTitle: init.conversationTitle || 'Untitled',
    assistantModel: init.assistantModel ?? null,
    rawMetadata: init.rawMetadata ?? {},
  };
}

/**
 * A chunk needs content on at least one side of the exchange.
 */
export function isValidChunk(chunk: Pick<Chunk, 'userMessage' | 'assistantMessage'>): boolean {
  return Boolean(chunk.userMessage) || Boolean(chunk.assistantMessage);
}

/**
 * Hands out turn numbers per conversation, starting at 0.
 */
export class TurnCounter {
  private readonly next = new Map<string, number>();

  take(conversationId: string): number {
    const turn = this.next.get(conversationId) ?? 0;
    this.next.set(conversationId, turn + 1);
    return turn;
  }
}

export function hasInterpretations(chunk: Chunk): boolean {
  return Object.keys(chunk.aiInterpretations).length > 0;
}

export function platformLabel(platform: Platform): string {
  switch (platform) {
    case 'chatgpt':
      return 'ChatGPT';
    case 'claude':
      return 'Claude';
    case 'claude-projects':
      return 'Claude Projects';
  }
}
