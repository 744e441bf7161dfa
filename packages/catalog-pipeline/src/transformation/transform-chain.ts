/**
 * Transform Chain - ordered cleaning operations with an audit log
 *
 * A mutable builder with single ownership: the constructor copies the
 * input dataset, every operation rewrites the chain's private copy and
 * returns the same instance, and `getResult()` hands out a fresh snapshot.
 * There is no undo; build a new chain to start over.
 *
 * TYPICAL ORDER:
 *   removeDuplicates -> handleMissingValues -> normalizeTextColumns
 *   -> filterOutliers -> addDerivedColumns
 *
 * Ordering is the caller's responsibility. `handleMissingValues` must run
 * before `normalizeTextColumns` so placeholders, not nulls, get
 * normalized. Operations on absent columns are no-ops.
 */

import type { CellValue, ColumnKind, Dataset, DataRow } from '../core/types.js';
import {
  DEFAULT_TEXT_PLACEHOLDER,
  GEOCODED_SCORE_THRESHOLD,
  ID_COLUMN,
  IS_GEOCODED_COLUMN,
  LOCATION_COLUMNS,
  NUMERIC_COLUMNS,
  SUGARS_COLUMN,
  SUGAR_BUCKETS,
  SUGAR_CATEGORY_COLUMN,
} from '../core/constants.js';
import { inferColumnKind } from './dataset.js';
import {
  coerceNumeric,
  isMissing,
  mean,
  median,
  numericValues,
  quantile,
  standardDeviation,
} from './statistics.js';

/**
 * Numeric imputation strategy. `none` leaves numeric columns untouched.
 */
export type NumericFillStrategy = 'median' | 'mean' | 'zero' | 'none';

export type OutlierMethod = 'iqr' | 'zscore';

export const NUMERIC_FILL_STRATEGIES: readonly NumericFillStrategy[] = ['median', 'mean', 'zero', 'none'];

export function isNumericFillStrategy(value: string): value is NumericFillStrategy {
  return (NUMERIC_FILL_STRATEGIES as readonly string[]).includes(value);
}

export function sugarCategory(sugars: number | null): string | null {
  if (sugars === null) return null;
  for (const bucket of SUGAR_BUCKETS) {
    if (sugars <= bucket.upTo) return bucket.label;
  }
  return null;
}

export class TransformChain {
  private columns: string[];
  private rows: Record<string, CellValue>[];
  private readonly numericColumns = new Set<string>();
  private readonly log: string[] = [];

  constructor(dataset: Dataset) {
    this.columns = [...dataset.columns];
    this.rows = dataset.rows.map((row) => ({ ...row }));
  }

  /**
   * Drop rows sharing the same key values, keeping the first occurrence.
   *
   * Default key: `code` when present, otherwise the first column.
   * Missing cells compare equal to each other.
   */
  removeDuplicates(keyColumns?: readonly string[]): this {
    const requested = keyColumns ?? this.defaultKeyColumns();
    const keys = requested.filter((column) => this.hasColumn(column));
    if (keys.length === 0) return this;

    const initial = this.rows.length;
    const seen = new Set<string>();

    this.rows = this.rows.filter((row) => {
      const key = JSON.stringify(keys.map((column) => (isMissing(row[column]) ? null : row[column])));
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });

    const removed = initial - this.rows.length;
    if (removed > 0) {
      this.log.push(`Duplicates removed: ${removed}`);
    }
    return this;
  }

  /**
   * Coerce known-numeric columns, then impute.
   *
   * Coercion comes first: catalog payloads often carry numbers as strings,
   * and a string-typed column would never be picked up as numeric.
   */
  handleMissingValues(
    numericStrategy: NumericFillStrategy = 'median',
    textPlaceholder: string = DEFAULT_TEXT_PLACEHOLDER
  ): this {
    for (const column of NUMERIC_COLUMNS) {
      if (this.hasColumn(column)) {
        this.coerceColumn(column);
      }
    }

    for (const column of this.columns) {
      const kind = this.kindOf(column);

      if (kind === 'numeric') {
        const fill = this.numericFillValue(column, numericStrategy);
        if (fill === null) continue;

        const filled = this.fillMissing(column, fill);
        if (filled > 0) {
          this.log.push(`${column}: ${filled} nulls → ${fill.toFixed(2)}`);
        }
      } else if (kind === 'text') {
        const filled = this.fillMissing(column, textPlaceholder);
        if (filled > 0) {
          this.log.push(`${column}: ${filled} nulls → '${textPlaceholder}'`);
        }
      }
    }

    return this;
  }

  /**
   * Trim and lowercase. Default: every text column. Missing cells stay
   * missing; other values are stringified first.
   */
  normalizeTextColumns(columns?: readonly string[]): this {
    const targets = columns ?? this.columns.filter((column) => this.kindOf(column) === 'text');

    for (const column of targets) {
      if (!this.hasColumn(column)) continue;

      this.numericColumns.delete(column);
      for (const row of this.rows) {
        const value = row[column];
        if (!isMissing(value)) {
          row[column] = String(value).trim().toLowerCase();
        }
      }
    }

    this.log.push(`Text normalization: [${targets.join(', ')}]`);
    return this;
  }

  /**
   * Remove rows whose value lies outside the accepted band.
   *
   * iqr:    keep Q1 - t*IQR <= v <= Q3 + t*IQR
   * zscore: keep |v - mean| / std < t (skipped when std is 0 or undefined)
   *
   * Once a band exists for a column, rows whose cell there is missing or
   * non-numeric fail the range test and are dropped too.
   */
  filterOutliers(columns: readonly string[], method: OutlierMethod = 'iqr', threshold = 1.5): this {
    const initial = this.rows.length;

    for (const column of columns) {
      if (!this.hasColumn(column)) continue;

      const values = numericValues(this.rows.map((row) => row[column]));
      const accept = this.outlierBand(values, method, threshold);
      if (!accept) continue;

      this.rows = this.rows.filter((row) => {
        const value = row[column];
        return typeof value === 'number' && Number.isFinite(value) && accept(value);
      });
    }

    this.log.push(`Outliers filtered (${method}): ${initial - this.rows.length}`);
    return this;
  }

  /**
   * sugar_category from sugars_100g; is_geocoded from geocoding_score.
   * Each is added only when its source column exists.
   */
  addDerivedColumns(): this {
    if (this.hasColumn(SUGARS_COLUMN)) {
      this.coerceColumn(SUGARS_COLUMN);
      this.ensureColumn(SUGAR_CATEGORY_COLUMN);
      for (const row of this.rows) {
        row[SUGAR_CATEGORY_COLUMN] = sugarCategory(coerceNumeric(row[SUGARS_COLUMN]));
      }
      this.log.push(`Added: ${SUGAR_CATEGORY_COLUMN}`);
    }

    if (this.hasColumn(LOCATION_COLUMNS.GEOCODING_SCORE)) {
      this.ensureColumn(IS_GEOCODED_COLUMN);
      for (const row of this.rows) {
        const score = coerceNumeric(row[LOCATION_COLUMNS.GEOCODING_SCORE]);
        row[IS_GEOCODED_COLUMN] = score !== null && score >= GEOCODED_SCORE_THRESHOLD;
      }
      this.log.push(`Added: ${IS_GEOCODED_COLUMN}`);
    }

    return this;
  }

  /**
   * Snapshot of the current dataset. Safe to call at any point.
   */
  getResult(): Dataset {
    return {
      columns: [...this.columns],
      rows: this.rows.map((row): DataRow => ({ ...row })),
    };
  }

  getLog(): string[] {
    return [...this.log];
  }

  getSummary(): string {
    if (this.log.length === 0) {
      return 'No transformations applied.';
    }
    return this.log.map((entry) => `• ${entry}`).join('\n');
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private defaultKeyColumns(): string[] {
    if (this.hasColumn(ID_COLUMN)) return [ID_COLUMN];
    return this.columns.slice(0, 1);
  }

  private hasColumn(column: string): boolean {
    return this.columns.includes(column);
  }

  private ensureColumn(column: string): void {
    if (!this.hasColumn(column)) {
      this.columns.push(column);
    }
  }

  private kindOf(column: string): ColumnKind {
    return inferColumnKind(
      this.rows.map((row) => row[column]),
      this.numericColumns.has(column)
    );
  }

  private coerceColumn(column: string): void {
    for (const row of this.rows) {
      row[column] = coerceNumeric(row[column]);
    }
    this.numericColumns.add(column);
  }

  private numericFillValue(column: string, strategy: NumericFillStrategy): number | null {
    const values = numericValues(this.rows.map((row) => row[column]));

    switch (strategy) {
      case 'median':
        return median(values);
      case 'mean':
        return mean(values);
      case 'zero':
        return 0;
      case 'none':
        return null;
    }
  }

  private fillMissing(column: string, fill: CellValue): number {
    let filled = 0;
    for (const row of this.rows) {
      if (isMissing(row[column])) {
        row[column] = fill;
        filled++;
      }
    }
    return filled;
  }

  private outlierBand(
    values: readonly number[],
    method: OutlierMethod,
    threshold: number
  ): ((value: number) => boolean) | null {
    if (method === 'iqr') {
      const q1 = quantile(values, 0.25);
      const q3 = quantile(values, 0.75);
      if (q1 === null || q3 === null) return null;

      const iqr = q3 - q1;
      const lower = q1 - threshold * iqr;
      const upper = q3 + threshold * iqr;
      return (value) => value >= lower && value <= upper;
    }

    const avg = mean(values);
    const std = standardDeviation(values);
    if (avg === null || std === null || std === 0) return null;

    return (value) => Math.abs((value - avg) / std) < threshold;
  }
}
