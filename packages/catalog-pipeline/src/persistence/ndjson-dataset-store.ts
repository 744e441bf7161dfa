/**
 * File-backed dataset store
 *
 * Layout:
 *   <raw>/<category>_raw_<YYYYMMDD_HHMMSS>.json       raw fetched batch
 *   <processed>/<category>_<YYYYMMDD_HHMMSS>.ndjson   cleaned dataset
 *
 * Known identifiers are the `code` values of every processed file of the
 * category. A file that cannot be read is skipped with a warning; the
 * worst case is reprocessing its records.
 */

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { CatalogRecord, Dataset, DatasetStore } from '../core/types.js';
import { ID_COLUMN } from '../core/constants.js';
import { atomicWriteJSON } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';
import { isMissing } from '../transformation/statistics.js';
import { formatFileTimestamp } from '../quality/report.js';
import { parseNdjson, writeNdjson } from './ndjson.js';

const logger = createLogger('ndjson-store');

export interface NdjsonDatasetStoreOptions {
  readonly rawDir: string;
  readonly processedDir: string;
  /** Clock for file names (default: now) */
  readonly now?: () => Date;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class NdjsonDatasetStore implements DatasetStore {
  private readonly rawDir: string;
  private readonly processedDir: string;
  private readonly now: () => Date;

  constructor(options: NdjsonDatasetStoreOptions) {
    this.rawDir = options.rawDir;
    this.processedDir = options.processedDir;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Processed dataset files of a category, sorted by name (oldest first)
   */
  async listDatasetFiles(category: string): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.processedDir);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const pattern = new RegExp(`^${escapeRegExp(category)}_\\d{8}_\\d{6}\\.ndjson$`);
    return names
      .filter((name) => pattern.test(name))
      .sort()
      .map((name) => join(this.processedDir, name));
  }

  async loadKnownIds(category: string): Promise<ReadonlySet<string>> {
    const files = await this.listDatasetFiles(category);
    const known = new Set<string>();

    for (const file of files) {
      try {
        const { dataset } = await parseNdjson(file);
        for (const row of dataset.rows) {
          const code = row[ID_COLUMN];
          if (code !== undefined && !isMissing(code)) {
            known.add(String(code));
          }
        }
      } catch (error) {
        logger.warn('Skipping unreadable dataset file', {
          file,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    logger.info('Loaded known identifiers', { category, files: files.length, known: known.size });
    return known;
  }

  async write(dataset: Dataset, category: string): Promise<string> {
    const now = this.now();
    const filepath = join(this.processedDir, `${category}_${formatFileTimestamp(now)}.ndjson`);

    await writeNdjson(filepath, dataset, `Cleaned catalog records for category ${category}`, now);

    logger.info('Dataset written', { path: filepath, rows: dataset.rows.length });
    return filepath;
  }

  async archiveRaw(records: readonly CatalogRecord[], category: string): Promise<string> {
    const filepath = join(this.rawDir, `${category}_raw_${formatFileTimestamp(this.now())}.json`);
    await atomicWriteJSON(filepath, records);

    logger.info('Raw batch archived', { path: filepath, records: records.length });
    return filepath;
  }

  async close(): Promise<void> {
    // Nothing held open
  }
}
