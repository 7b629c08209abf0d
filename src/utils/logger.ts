/**
 * Scoped, levelled logging to stderr.
 *
 * Every logger carries a scope (`dispatcher`, `normalizer`, ...) and a set of
 * bound fields that are merged into each entry, so a normalizer logs its
 * platform and a search logs its mode without repeating them at each call.
 * stdout stays free for CLI output.
 *
 * Level: CHATSTRATA_LOG_LEVEL or setLogLevel(); debug < info < warn < error < silent.
 * CHATSTRATA_LOG_JSON=true writes one JSON object per line.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  scope?: string;
  message: string;
  meta?: LogFields;
}

export interface Logger {
  readonly scope: string;
  debug(msg: string, meta?: LogFields): void;
  info(msg: string, meta?: LogFields): void;
  warn(msg: string, meta?: LogFields): void;
  error(msg: string, meta?: LogFields): void;
  /** Logger with the same scope and `fields` bound on top of the current ones */
  child(fields: LogFields): Logger;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_PRIORITY;
}

const envLevel = process.env.CHATSTRATA_LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';
let jsonMode = process.env.CHATSTRATA_LOG_JSON === 'true';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function setJsonMode(enabled: boolean): void {
  jsonMode = enabled;
}

function formatValue(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

/**
 * `[HH:MM:SS] LEVEL [scope] message (k=v ...)`, or the entry as JSON in JSON mode.
 */
export function formatEntry(entry: LogEntry): string {
  if (jsonMode) {
    return JSON.stringify(entry);
  }

  const { timestamp, level, scope, message, meta } = entry;
  let output = `[${timestamp.slice(11, 19)}] ${level.toUpperCase().padEnd(5)} `;
  if (scope) output += `[${scope}] `;
  output += message;

  if (meta && Object.keys(meta).length > 0) {
    const pairs = Object.entries(meta).map(([k, v]) => `${k}=${formatValue(v)}`);
    output += ` (${pairs.join(' ')})`;
  }

  return output;
}

function write(
  level: Exclude<LogLevel, 'silent'>,
  scope: string,
  bound: LogFields,
  msg: string,
  meta?: LogFields,
): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) return;

  const merged = { ...bound, ...meta };
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    scope,
    message: msg,
    meta: Object.keys(merged).length > 0 ? merged : undefined,
  };

  process.stderr.write(formatEntry(entry) + '\n');
}

/**
 * Logger for `scope`, with `fields` added to every entry.
 */
export function createLogger(scope: string, fields: LogFields = {}): Logger {
  return {
    scope,
    debug: (msg, meta) => write('debug', scope, fields, msg, meta),
    info: (msg, meta) => write('info', scope, fields, msg, meta),
    warn: (msg, meta) => write('warn', scope, fields, msg, meta),
    error: (msg, meta) => write('error', scope, fields, msg, meta),
    child: (extra) => createLogger(scope, { ...fields, ...extra }),
  };
}
