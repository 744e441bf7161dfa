/**
 * Dataset construction and column inspection
 *
 * Records become rows with a fixed column set: `code`, passthrough
 * attributes in first-seen order, `stores`, then the location columns
 * when any record was enriched.
 */

import type { CatalogRecord, CellValue, ColumnKind, Dataset, DataRow } from '../core/types.js';
import { ID_COLUMN, LOCATION_COLUMNS, STORES_COLUMN } from '../core/constants.js';
import { isMissing } from './statistics.js';

const LOCATION_COLUMN_ORDER: readonly string[] = [
  LOCATION_COLUMNS.STORE_ADDRESS,
  LOCATION_COLUMNS.LATITUDE,
  LOCATION_COLUMNS.LONGITUDE,
  LOCATION_COLUMNS.CITY,
  LOCATION_COLUMNS.POSTAL_CODE,
  LOCATION_COLUMNS.GEOCODING_SCORE,
];

/**
 * Build a dataset from loose rows; columns are the union of keys in
 * first-seen order, absent cells become null.
 */
export function datasetFromRows(rows: readonly Readonly<Record<string, CellValue>>[]): Dataset {
  const columns: string[] = [];
  const seen = new Set<string>();

  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  return {
    columns,
    rows: rows.map((row) => normalizeRow(row, columns)),
  };
}

export function recordsToDataset(records: readonly CatalogRecord[]): Dataset {
  const attributeColumns: string[] = [];
  const seen = new Set<string>([ID_COLUMN, STORES_COLUMN, ...LOCATION_COLUMN_ORDER]);
  let hasLocation = false;

  for (const record of records) {
    for (const key of Object.keys(record.attributes)) {
      if (!seen.has(key)) {
        seen.add(key);
        attributeColumns.push(key);
      }
    }
    if (record.location) hasLocation = true;
  }

  const columns = [
    ID_COLUMN,
    ...attributeColumns,
    STORES_COLUMN,
    ...(hasLocation ? LOCATION_COLUMN_ORDER : []),
  ];

  const rows = records.map((record) => {
    const row: Record<string, CellValue> = {
      ...record.attributes,
      [ID_COLUMN]: record.id,
      [STORES_COLUMN]: record.stores,
    };

    if (record.location) {
      row[LOCATION_COLUMNS.STORE_ADDRESS] = record.location.storeAddress;
      row[LOCATION_COLUMNS.LATITUDE] = record.location.latitude;
      row[LOCATION_COLUMNS.LONGITUDE] = record.location.longitude;
      row[LOCATION_COLUMNS.CITY] = record.location.city;
      row[LOCATION_COLUMNS.POSTAL_CODE] = record.location.postalCode;
      row[LOCATION_COLUMNS.GEOCODING_SCORE] = record.location.score;
    }

    return normalizeRow(row, columns);
  });

  return { columns, rows };
}

function normalizeRow(row: Readonly<Record<string, CellValue>>, columns: readonly string[]): DataRow {
  const normalized: Record<string, CellValue> = {};
  for (const column of columns) {
    normalized[column] = row[column] ?? null;
  }
  return normalized;
}

export function columnValues(dataset: Dataset, column: string): CellValue[] {
  return dataset.rows.map((row) => row[column] ?? null);
}

/**
 * Infer a column's kind from its present values.
 *
 * A column with no present value is text unless the caller knows it is
 * numeric (a coerced column that came back all-missing).
 */
export function inferColumnKind(
  values: readonly (CellValue | undefined)[],
  knownNumeric = false
): ColumnKind {
  let present = 0;
  let numbers = 0;
  let booleans = 0;

  for (const value of values) {
    if (isMissing(value)) continue;
    present++;
    if (typeof value === 'number') numbers++;
    else if (typeof value === 'boolean') booleans++;
  }

  if (knownNumeric && numbers === present) return 'numeric';
  if (present === 0) return 'text';
  if (numbers === present) return 'numeric';
  if (booleans === present) return 'boolean';
  return 'text';
}
