/**
 * Shared CLI utilities.
 */

import { loadConfig, type ResolvedConfig } from '../config/loader.js';
import { ChunkCollection } from '../parser/collection.js';
import { loadJsonFile } from '../parser/input-loader.js';
import { defaultRegistry } from '../parser/registry.js';
import { StrataError, errorMessage, isConfigError, isServiceError } from '../utils/errors.js';
import { isRecord } from '../utils/guards.js';

/**
 * Value following `--name`, or undefined when the flag is absent or last.
 */
export function flagValue(args: string[], name: string): string | undefined {
  const index = args.indexOf(`--${name}`);
  if (index === -1 || index + 1 >= args.length) return undefined;
  return args[index + 1];
}

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(`--${name}`);
}

/**
 * Arguments that are neither flags nor the values of `valueFlags`.
 */
export function positionals(args: string[], valueFlags: string[] = []): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      if (valueFlags.includes(arg.slice(2))) i++;
      continue;
    }
    result.push(arg);
  }
  return result;
}

/**
 * Integer value of `--name`; NaN when given but not a number.
 */
export function intFlag(args: string[], name: string): number | undefined {
  const value = flagValue(args, name);
  return value === undefined ? undefined : parseInt(value, 10);
}

/**
 * Print a usage error and exit with code 2.
 */
export function usageError(message: string, usage: string): void {
  console.error(`Error: ${message}`);
  console.log(`Usage: ${usage}`);
  process.exit(2);
}

/** Exit codes for failures other than usage errors (2). */
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG = 3;
export const EXIT_SERVICE = 4;

/**
 * Print a failed command's error and return the code to exit with.
 */
export function reportFailure(error: unknown): number {
  console.error(
    error instanceof StrataError ? error.toDetailedString() : `Error: ${errorMessage(error)}`,
  );
  if (isConfigError(error)) return EXIT_CONFIG;
  if (isServiceError(error)) return EXIT_SERVICE;
  return EXIT_FAILURE;
}

export function loadCliConfig(): ResolvedConfig {
  return loadConfig();
}

/** A saved collection has a chunk list and an interpretation table. */
function isPersistedCollection(data: unknown): boolean {
  return isRecord(data) && Array.isArray(data.chunks) && isRecord(data.interpretations);
}

/**
 * Read a saved collection, or normalize a raw export when the file is not one.
 */
export async function loadChunks(path: string, config: ResolvedConfig): Promise<ChunkCollection> {
  const options = { maxFileSizeMb: config.input.maxFileSizeMb };
  const input = await loadJsonFile(path, options);
  if (isPersistedCollection(input.data)) {
    return ChunkCollection.deserialize(input.data);
  }
  const normalizer = defaultRegistry().detectData(input.data, input.extension, path);
  return normalizer.parseExport(input.data, {
    includeRawMetadata: config.collection.includeRawMetadata,
  });
}
