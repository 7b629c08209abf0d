/**
 * Reads export and collection files with a size ceiling.
 *
 * Oversized or malformed input fails here, before any normalizer sees it.
 */

import { readFile, stat } from 'node:fs/promises';
import { extname } from 'node:path';
import { InputSizeError, MalformedInputError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('input-loader');

export const DEFAULT_MAX_FILE_SIZE_MB = 500;

const BYTES_PER_MB = 1024 * 1024;

export interface LoadInputOptions {
  /** Largest file accepted, in megabytes. Default: 500 */
  maxFileSizeMb?: number;
}

/** A parsed input file. */
export interface LoadedInput {
  path: string;
  /** Lower-cased extension including the dot, e.g. '.json' */
  extension: string;
  sizeBytes: number;
  data: unknown;
}

/**
 * Parse JSON text, reporting where it came from on failure.
 */
export function parseJsonText(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new MalformedInputError(
      `${source} is not valid JSON: ${errorMessage(error)}`,
      'MALFORMED_INPUT',
      error,
    );
  }
}

/**
 * Read and parse a JSON file.
 */
export async function loadJsonFile(
  path: string,
  options: LoadInputOptions = {},
): Promise<LoadedInput> {
  const limitBytes = (options.maxFileSizeMb ?? DEFAULT_MAX_FILE_SIZE_MB) * BYTES_PER_MB;

  let sizeBytes: number;
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      throw new MalformedInputError(`Not a file: ${path}`, 'INPUT_NOT_FOUND');
    }
    sizeBytes = info.size;
  } catch (error) {
    if (error instanceof MalformedInputError) throw error;
    throw new MalformedInputError(
      `Cannot read ${path}: ${errorMessage(error)}`,
      'INPUT_NOT_FOUND',
      error,
    );
  }

  if (sizeBytes > limitBytes) {
    throw new InputSizeError(
      `${path} is ${formatMb(sizeBytes)} MB, above the ${formatMb(limitBytes)} MB limit`,
      sizeBytes,
      limitBytes,
    );
  }

  log.debug('Reading input', { path, sizeBytes });
  const text = await readFile(path, 'utf-8');

  return {
    path,
    extension: extname(path).toLowerCase(),
    sizeBytes,
    data: parseJsonText(text, path),
  };
}

function formatMb(bytes: number): string {
  return (bytes / BYTES_PER_MB).toFixed(1);
}
