/**
 * NDJSON dataset files
 *
 * NDJSON (Newline-Delimited JSON) format:
 * - Line 1: Header object with schema version, type, count, columns, timestamp
 * - Lines 2+: One dataset row per line, every column present
 *
 * @module persistence/ndjson
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { CellValue, Dataset, DataRow } from '../core/types.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';

/**
 * NDJSON header schema - first line of every dataset file
 */
export interface NdjsonHeader {
  readonly _schema: 'v1';
  readonly _type: 'CatalogDataset';
  readonly _count: number;
  readonly _columns: readonly string[];
  readonly _extracted: string; // ISO 8601 timestamp
  readonly _description: string;
}

const HeaderSchema = z.object({
  _schema: z.literal('v1'),
  _type: z.literal('CatalogDataset'),
  _count: z.number().int().nonnegative(),
  _columns: z.array(z.string()),
  _extracted: z.string(),
  _description: z.string(),
});

const RowSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

export interface ParsedNdjson {
  readonly header: NdjsonHeader;
  readonly dataset: Dataset;
  readonly filepath: string;
}

/**
 * Parse NDJSON content into a dataset.
 *
 * @throws Error on a bad header, an unsupported schema or a malformed line
 */
export function parseNdjsonContent(content: string, filepath = '<memory>'): ParsedNdjson {
  const lines = content.trim().split('\n');

  if (lines.length === 0 || lines[0].trim() === '') {
    throw new Error(`NDJSON file is empty: ${filepath}`);
  }

  const headerResult = HeaderSchema.safeParse(JSON.parse(lines[0]));
  if (!headerResult.success) {
    const issues = headerResult.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Invalid NDJSON header in ${filepath}: ${issues.join(', ')}`);
  }
  const header = headerResult.data;

  const rows: DataRow[] = [];
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      throw new Error(
        `Failed to parse line ${i + 1} in ${filepath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const row = RowSchema.safeParse(parsed);
    if (!row.success) {
      throw new Error(`Line ${i + 1} in ${filepath} is not a dataset row`);
    }

    const normalized: Record<string, CellValue> = {};
    for (const column of header._columns) {
      normalized[column] = row.data[column] ?? null;
    }
    rows.push(normalized);
  }

  return {
    header,
    dataset: { columns: header._columns, rows },
    filepath,
  };
}

export async function parseNdjson(filepath: string): Promise<ParsedNdjson> {
  const content = await readFile(filepath, 'utf-8');
  return parseNdjsonContent(content, filepath);
}

export function serializeNdjson(dataset: Dataset, description: string, extractedAt: Date = new Date()): string {
  const header: NdjsonHeader = {
    _schema: 'v1',
    _type: 'CatalogDataset',
    _count: dataset.rows.length,
    _columns: dataset.columns,
    _extracted: extractedAt.toISOString(),
    _description: description,
  };

  const lines: string[] = [JSON.stringify(header)];
  for (const row of dataset.rows) {
    const ordered: Record<string, CellValue> = {};
    for (const column of dataset.columns) {
      ordered[column] = row[column] ?? null;
    }
    lines.push(JSON.stringify(ordered));
  }

  // Trailing newline
  return lines.join('\n') + '\n';
}

/**
 * Write a dataset file atomically
 */
export async function writeNdjson(
  filepath: string,
  dataset: Dataset,
  description: string,
  extractedAt?: Date
): Promise<void> {
  await atomicWriteFile(filepath, serializeNdjson(dataset, description, extractedAt));
}
