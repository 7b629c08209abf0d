/**
 * Converts index hits into display results.
 *
 * Missing payload fields take defaults: platform 'unknown', title 'Untitled',
 * turn 0, empty messages. Interpretation fields stay absent unless present.
 */

import type { IndexGroup, IndexHit } from '../storage/index-service.js';
import { asNumber, asString } from '../utils/guards.js';
import { epochToIso } from '../utils/time.js';
import type { GroupedResult, SearchResult } from './types.js';

export function roundScore(score: number): number {
  return Math.round(score * 10_000) / 10_000;
}

function displayTimestamp(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) return epochToIso(value);
  if (typeof value === 'string') return value;
  return null;
}

export function toSearchResult(hit: IndexHit, id: number): SearchResult {
  const p = hit.payload;
  const result: SearchResult = {
    id,
    pointId: hit.id,
    score: roundScore(hit.score),
    platform: asString(p.platform) ?? 'unknown',
    conversationTitle: asString(p.conversation_title) ?? 'Untitled',
    timestamp: displayTimestamp(p.timestamp),
    turnNumber: asNumber(p.turn_number) ?? 0,
    userMessage: asString(p.user_message) ?? '',
    assistantMessage: asString(p.assistant_message) ?? '',
    hasInterpretations: p.has_interpretations === true,
  };

  const chunkId = asString(p.chunk_id);
  const conversationId = asString(p.conversation_id);
  const aboutUser = asString(p.about_user);
  const aboutModel = asString(p.about_model);
  const userMessageType = asString(p.user_message_type);
  const assistantMessageType = asString(p.assistant_message_type);
  const assistantModel = asString(p.assistant_model);

  if (chunkId !== undefined) result.chunkId = chunkId;
  if (conversationId !== undefined) result.conversationId = conversationId;
  if (aboutUser !== undefined) result.aboutUser = aboutUser;
  if (aboutModel !== undefined) result.aboutModel = aboutModel;
  if (userMessageType !== undefined) result.userMessageType = userMessageType;
  if (assistantMessageType !== undefined) result.assistantMessageType = assistantMessageType;
  if (assistantModel !== undefined) result.assistantModel = assistantModel;

  return result;
}

/**
 * Number hits from `startId` in order.
 */
export function toSearchResults(hits: IndexHit[], startId = 0): SearchResult[] {
  return hits.map((hit, i) => toSearchResult(hit, startId + i));
}

/**
 * Groups keep their index order; result ids run across all groups.
 */
export function toGroupedResults(groups: IndexGroup[]): GroupedResult[] {
  let nextId = 0;
  return groups.map((group) => {
    const hits = toSearchResults(group.hits, nextId);
    nextId += hits.length;
    return { groupKey: String(group.id), hits };
  });
}

/**
 * All hits of all groups, in group order.
 */
export function flattenGroups(groups: GroupedResult[]): SearchResult[] {
  return groups.flatMap((group) => group.hits);
}
