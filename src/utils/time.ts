/**
 * Timestamp parsing shared by the export normalizers and the filter builder.
 *
 * Accepted inputs:
 * - numbers and numeric strings: epoch seconds
 * - ISO-8601 strings; a trailing `Z` means UTC, and a value without an offset is read as UTC
 */

const NUMERIC = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;
const ISO_DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATE_TIME =
  /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Parse a timestamp into epoch seconds, or null when it is in neither supported format.
 */
export function toEpochSeconds(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  if (text === '') return null;

  if (NUMERIC.test(text)) {
    return Number(text);
  }

  let normalized: string;
  if (ISO_DATE_ONLY.test(text)) {
    normalized = `${text}T00:00:00+00:00`;
  } else {
    const match = ISO_DATE_TIME.exec(text);
    if (!match) return null;
    const [, date, time, offset] = match;
    const zone = offset === undefined || offset === 'Z' ? '+00:00' : withColon(offset);
    normalized = `${date}T${time}${zone}`;
  }

  const ms = Date.parse(normalized);
  return Number.isNaN(ms) ? null : ms / 1000;
}

function withColon(offset: string): string {
  return offset.includes(':') ? offset : `${offset.slice(0, 3)}:${offset.slice(3)}`;
}

/**
 * Format epoch seconds as an ISO-8601 instant.
 */
export function epochToIso(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

/**
 * Parse a timestamp into an ISO-8601 instant, or null when unparsable.
 */
export function toIsoTimestamp(value: unknown): string | null {
  const seconds = toEpochSeconds(value);
  if (seconds === null) return null;
  const date = new Date(seconds * 1000);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}
