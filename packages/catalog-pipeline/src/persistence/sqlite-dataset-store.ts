/**
 * SQLite dataset store
 *
 * ARCHITECTURE:
 * - Synchronous better-sqlite3; the async interface is for parity with
 *   the file store
 * - One transaction per written run, so a failed write leaves no rows
 * - WAL mode for reads (dashboard) during a run
 *
 * Tables: `runs` (one row per persisted dataset), `records` keyed by
 * (run_id, code) with the row serialized as JSON, `raw_batches` for the
 * pre-transformation archive.
 */

import Database from 'better-sqlite3';
import { randomBytes } from 'node:crypto';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { CatalogRecord, CellValue, Dataset, DatasetStore } from '../core/types.js';
import { ID_COLUMN } from '../core/constants.js';
import { createLogger } from '../core/utils/logger.js';
import { isMissing } from '../transformation/statistics.js';

const logger = createLogger('sqlite-store');

export const IN_MEMORY = ':memory:';

/**
 * Migration definition
 */
export interface Migration {
  readonly version: number;
  readonly name: string;
  readonly up: (db: Database.Database) => void;
}

interface RunRow {
  readonly run_id: string;
  readonly category: string;
  readonly created_at: string;
  readonly row_count: number;
  readonly columns_json: string;
}

const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: (db) => {
      db.exec(`
        CREATE TABLE runs (
          run_id TEXT PRIMARY KEY,
          category TEXT NOT NULL,
          created_at TEXT NOT NULL,
          row_count INTEGER NOT NULL,
          columns_json TEXT NOT NULL
        );

        CREATE TABLE records (
          run_id TEXT NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
          code TEXT NOT NULL,
          category TEXT NOT NULL,
          row_json TEXT NOT NULL,
          PRIMARY KEY (run_id, code)
        );

        CREATE INDEX idx_records_category_code ON records(category, code);
        CREATE INDEX idx_runs_category_created ON runs(category, created_at DESC);
      `);
    },
  },
  {
    version: 2,
    name: 'raw_batches',
    up: (db) => {
      db.exec(`
        CREATE TABLE raw_batches (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          category TEXT NOT NULL,
          archived_at TEXT NOT NULL,
          record_count INTEGER NOT NULL,
          payload_json TEXT NOT NULL
        );
      `);
    },
  },
];

export interface SqliteDatasetStoreOptions {
  readonly now?: () => Date;
}

export class SqliteDatasetStore implements DatasetStore {
  private readonly db: Database.Database;
  private readonly now: () => Date;

  constructor(
    private readonly dbPath: string = IN_MEMORY,
    options: SqliteDatasetStoreOptions = {}
  ) {
    if (dbPath !== IN_MEMORY) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.now = options.now ?? (() => new Date());

    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('synchronous = NORMAL');

    this.runMigrations();
  }

  // ============================================================================
  // Migration Management
  // ============================================================================

  getDatabaseVersion(): number {
    const row = this.db
      .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations')
      .get();
    return row?.version ?? 0;
  }

  private runMigrations(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );
    `);

    const currentVersion = this.getDatabaseVersion();
    const record = this.db.prepare<[number, string]>(
      'INSERT INTO schema_migrations (version, name) VALUES (?, ?)'
    );

    const migrate = this.db.transaction(() => {
      for (const migration of MIGRATIONS) {
        if (migration.version > currentVersion) {
          migration.up(this.db);
          record.run(migration.version, migration.name);
        }
      }
    });

    migrate();
  }

  // ============================================================================
  // DatasetStore
  // ============================================================================

  async loadKnownIds(category: string): Promise<ReadonlySet<string>> {
    const rows = this.db
      .prepare<[string], { code: string }>('SELECT DISTINCT code FROM records WHERE category = ?')
      .all(category);

    return new Set(rows.map((row) => row.code));
  }

  async write(dataset: Dataset, category: string): Promise<string> {
    const runId = randomBytes(8).toString('hex');
    const createdAt = this.now().toISOString();

    const insertRun = this.db.prepare<[string, string, string, number, string]>(
      'INSERT INTO runs (run_id, category, created_at, row_count, columns_json) VALUES (?, ?, ?, ?, ?)'
    );
    const insertRecord = this.db.prepare<[string, string, string, string]>(
      'INSERT OR REPLACE INTO records (run_id, code, category, row_json) VALUES (?, ?, ?, ?)'
    );

    let skipped = 0;
    const persist = this.db.transaction(() => {
      insertRun.run(runId, category, createdAt, dataset.rows.length, JSON.stringify(dataset.columns));

      for (const row of dataset.rows) {
        const code = row[ID_COLUMN];
        if (code === undefined || isMissing(code)) {
          skipped++;
          continue;
        }
        insertRecord.run(runId, String(code), category, JSON.stringify(row));
      }
    });

    persist();

    if (skipped > 0) {
      logger.warn('Rows without a code were not persisted', { runId, skipped });
    }
    logger.info('Dataset written', { runId, category, rows: dataset.rows.length - skipped });

    return `sqlite://${this.dbPath}#${runId}`;
  }

  async archiveRaw(records: readonly CatalogRecord[], category: string): Promise<string> {
    const result = this.db
      .prepare<[string, string, number, string]>(
        'INSERT INTO raw_batches (category, archived_at, record_count, payload_json) VALUES (?, ?, ?, ?)'
      )
      .run(category, this.now().toISOString(), records.length, JSON.stringify(records));

    return `sqlite://${this.dbPath}#raw-${String(result.lastInsertRowid)}`;
  }

  /**
   * Dataset persisted by one run, or null for an unknown run id
   */
  loadRun(runId: string): Dataset | null {
    const run = this.db
      .prepare<[string], RunRow>('SELECT * FROM runs WHERE run_id = ?')
      .get(runId);
    if (!run) return null;

    const columns: string[] = parseStringArray(run.columns_json);
    const rows = this.db
      .prepare<[string], { row_json: string }>('SELECT row_json FROM records WHERE run_id = ? ORDER BY rowid')
      .all(runId)
      .map((row) => parseRow(row.row_json, columns));

    return { columns, rows };
  }

  async close(): Promise<void> {
    this.db.close();
  }
}

function parseStringArray(json: string): string[] {
  const value: unknown = JSON.parse(json);
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

function isCellValue(value: unknown): value is CellValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

function parseRow(json: string, columns: readonly string[]): Record<string, CellValue> {
  const value: unknown = JSON.parse(json);
  const row: Record<string, CellValue> = {};

  for (const column of columns) {
    const cell: unknown =
      typeof value === 'object' && value !== null && column in value
        ? Reflect.get(value, column)
        : null;
    row[column] = isCellValue(cell) ? cell : null;
  }
  return row;
}
