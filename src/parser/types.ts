/**
 * Types for normalized chat-export records.
 */

/** Source systems an export can come from. */
export type Platform = 'chatgpt' | 'claude' | 'claude-projects';

export const PLATFORMS: readonly Platform[] = ['chatgpt', 'claude', 'claude-projects'];

export function isPlatform(value: unknown): value is Platform {
  return typeof value === 'string' && PLATFORMS.some((p) => p === value);
}

/** Platform-specific interpretation data (reasoning traces, inferred user profile, markers). */
export type Interpretations = Record<string, unknown>;

/** Prompt and instruction level metadata. */
export type SystemContext = Record<string, unknown>;

/** One tool invocation recorded next to an exchange. */
export type ToolUsageRecord = Record<string, unknown>;

/**
 * The canonical record: one user/assistant exchange, or a synthetic
 * record (memory, project overview, document) carrying content in the same slots.
 */
export interface Chunk {
  /** Unique across every collection */
  chunkId: string;
  /** Groups chunks from one source conversation or entity */
  conversationId: string;
  platform: Platform;
  /** ISO-8601 instant of the exchange */
  timestamp: string | null;
  /** ISO-8601 creation time of the conversation, where the export has one */
  conversationStart: string | null;
  userMessage: string | null;
  assistantMessage: string | null;
  userMessageType: string | null;
  assistantMessageType: string | null;
  aiInterpretations: Interpretations;
  systemContext: SystemContext;
  toolUsage: ToolUsageRecord[];
  /** Zero-based, strictly increasing per conversationId */
  turnNumber: number;
  hasBranches: boolean;
  conversationTitle: string;
  assistantModel: string | null;
  /** Opaque source metadata, kept for debugging */
  rawMetadata: Record<string, unknown>;
}

/** Options every normalizer accepts. */
export interface NormalizeOptions {
  /** Keep source metadata on each chunk. Default: true */
  includeRawMetadata?: boolean;
}

/** Inclusive range of chunk timestamps. */
export interface DateRange {
  earliest: string | null;
  latest: string | null;
}

/**
 * Summary of an export without normalizing it.
 */
export interface ExportSummary {
  platform: Platform;
  exportType: string;
  totalItems: number;
  /** Conversations, or memory + project + document entries for project exports */
  counts: Record<string, number>;
  dateRange: DateRange;
  models: string[];
}
