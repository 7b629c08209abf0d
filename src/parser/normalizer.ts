/**
 * Contract shared by every export normalizer.
 */

import type { ChunkCollection } from './collection.js';
import type {
  ExportSummary,
  Interpretations,
  NormalizeOptions,
  Platform,
  SystemContext,
} from './types.js';

export interface ExportNormalizer {
  readonly platform: Platform;

  /** Cheap structural check on parsed export data. May throw; callers treat that as "no match". */
  validate(data: unknown): boolean;

  /** Convert a whole export into chunks. */
  parseExport(data: unknown, options?: NormalizeOptions): ChunkCollection;

  /** Interpretation data carried by one raw message. */
  extractInterpretations(message: unknown): Interpretations;

  /** Prompt-level context carried by one raw message. */
  extractSystemContext(message: unknown): SystemContext;

  /** Counts, date range and models of an export, without normalizing it. */
  describeExport(data: unknown): ExportSummary;
}

/**
 * Track the earliest and latest instant seen.
 */
export class DateRangeTracker {
  private earliest: number | null = null;
  private latest: number | null = null;

  add(iso: string | null): void {
    if (iso === null) return;
    const t = Date.parse(iso);
    if (Number.isNaN(t)) return;
    if (this.earliest === null || t < this.earliest) this.earliest = t;
    if (this.latest === null || t > this.latest) this.latest = t;
  }

  toRange(): { earliest: string | null; latest: string | null } {
    return {
      earliest: this.earliest === null ? null : new Date(this.earliest).toISOString(),
      latest: this.latest === null ? null : new Date(this.latest).toISOString(),
    };
  }
}
