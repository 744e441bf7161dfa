/**
 * Dataset store factory
 *
 * Selects the storage backend from configuration. `ndjson` is the
 * default; `sqlite` keeps every run in one database file.
 */

import type { DatasetStore } from '../core/types.js';
import { NdjsonDatasetStore } from './ndjson-dataset-store.js';
import { SqliteDatasetStore } from './sqlite-dataset-store.js';

export type StoreBackend = 'ndjson' | 'sqlite';

export interface StoreLocations {
  readonly rawDir: string;
  readonly processedDir: string;
  readonly databasePath: string;
}

export function createDatasetStore(backend: StoreBackend, locations: StoreLocations): DatasetStore {
  switch (backend) {
    case 'sqlite':
      return new SqliteDatasetStore(locations.databasePath);
    case 'ndjson':
      return new NdjsonDatasetStore({
        rawDir: locations.rawDir,
        processedDir: locations.processedDir,
      });
  }
}
