/**
 * Format registry: picks the normalizer for an export.
 *
 * Detection runs in two passes. The first asks only normalizers whose
 * extensions match the file; the second asks every normalizer, whatever the
 * extension. Registration order decides between normalizers that both accept.
 */

import type { ChunkCollection } from './collection.js';
import { loadJsonFile, type LoadInputOptions } from './input-loader.js';
import type { ExportNormalizer } from './normalizer.js';
import { PairedTurnExportNormalizer } from './paired-turn-export.js';
import { ProjectExportNormalizer } from './project-export.js';
import { TreeExportNormalizer } from './tree-export.js';
import type { ExportSummary, NormalizeOptions, Platform } from './types.js';
import { FormatDetectionError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('registry');

interface RegistryEntry {
  normalizer: ExportNormalizer;
  /** Lower-cased, with the leading dot */
  extensions: string[];
}

export interface ParseFileOptions extends NormalizeOptions, LoadInputOptions {
  /** Skip detection and use this platform's normalizer */
  platform?: Platform;
}

export interface ParsedExport {
  normalizer: ExportNormalizer;
  collection: ChunkCollection;
}

export class FormatRegistry {
  private readonly entries: RegistryEntry[] = [];

  register(normalizer: ExportNormalizer, extensions: string[] = ['.json']): this {
    this.entries.push({
      normalizer,
      extensions: extensions.map((ext) => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase()),
    });
    return this;
  }

  get normalizers(): ExportNormalizer[] {
    return this.entries.map((e) => e.normalizer);
  }

  forPlatform(platform: Platform): ExportNormalizer | undefined {
    return this.entries.find((e) => e.normalizer.platform === platform)?.normalizer;
  }

  /**
   * Find the normalizer for already-parsed export data.
   */
  detectData(data: unknown, extension?: string, source = 'input'): ExportNormalizer {
    const ext = extension?.toLowerCase();

    if (ext !== undefined) {
      for (const entry of this.entries) {
        if (entry.extensions.includes(ext) && this.accepts(entry.normalizer, data)) {
          return entry.normalizer;
        }
      }
    }

    for (const entry of this.entries) {
      if (this.accepts(entry.normalizer, data)) {
        return entry.normalizer;
      }
    }

    throw new FormatDetectionError(
      `No suitable format found for ${source}. Tried: ${this.entries
        .map((e) => e.normalizer.platform)
        .join(', ')}`,
      source,
    );
  }

  /**
   * Find the normalizer for an export file.
   */
  async detect(path: string, options: LoadInputOptions = {}): Promise<ExportNormalizer> {
    const input = await loadJsonFile(path, options);
    return this.detectData(input.data, input.extension, path);
  }

  /**
   * Detect the format of an export file and normalize it.
   */
  async parseFile(path: string, options: ParseFileOptions = {}): Promise<ParsedExport> {
    const input = await loadJsonFile(path, options);
    const normalizer = options.platform
      ? this.requirePlatform(options.platform, path)
      : this.detectData(input.data, input.extension, path);

    const fileLog = log.child({ path, platform: normalizer.platform });
    fileLog.info('Normalizing export');
    const collection = normalizer.parseExport(input.data, options);
    fileLog.info('Normalized export', { chunks: collection.size });

    return { normalizer, collection };
  }

  async describeFile(path: string, options: LoadInputOptions = {}): Promise<ExportSummary> {
    const input = await loadJsonFile(path, options);
    return this.detectData(input.data, input.extension, path).describeExport(input.data);
  }

  private requirePlatform(platform: Platform, source: string): ExportNormalizer {
    const normalizer = this.forPlatform(platform);
    if (!normalizer) {
      throw new FormatDetectionError(`No normalizer registered for ${platform}`, source);
    }
    return normalizer;
  }

  private accepts(normalizer: ExportNormalizer, data: unknown): boolean {
    try {
      return normalizer.validate(data);
    } catch (error) {
      log.debug('Validation failed', { platform: normalizer.platform, error: errorMessage(error) });
      return false;
    }
  }
}

/**
 * Registry with the built-in normalizers, in detection order.
 */
export function defaultRegistry(): FormatRegistry {
  return new FormatRegistry()
    .register(new TreeExportNormalizer(), ['.json'])
    .register(new PairedTurnExportNormalizer(), ['.json'])
    .register(new ProjectExportNormalizer(), ['.json']);
}
