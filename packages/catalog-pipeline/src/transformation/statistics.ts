/**
 * Column statistics used by imputation, outlier filtering and scoring.
 *
 * Conventions match the usual dataframe defaults: quantiles use linear
 * interpolation between closest ranks, standard deviation is the sample
 * estimate (n - 1).
 */

import type { CellValue } from '../core/types.js';

/**
 * A cell is missing when it is null or a non-finite number
 */
export function isMissing(value: CellValue | undefined): boolean {
  return value === null || value === undefined || (typeof value === 'number' && !Number.isFinite(value));
}

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Coerce a cell to a number; anything unparseable becomes null.
 *
 * "12,5" is not a number here (no locale handling), "12.5" is.
 */
export function coerceNumeric(value: CellValue | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value ? 1 : 0;

  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;

  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Finite numeric values of a column, in row order
 */
export function numericValues(values: readonly (CellValue | undefined)[]): number[] {
  const result: number[] = [];
  for (const value of values) {
    if (typeof value === 'number' && Number.isFinite(value)) {
      result.push(value);
    }
  }
  return result;
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

export function quantile(values: readonly number[], q: number): number | null {
  if (values.length === 0) return null;

  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);

  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

export function median(values: readonly number[]): number | null {
  return quantile(values, 0.5);
}

/**
 * Sample standard deviation; null below two values
 */
export function standardDeviation(values: readonly number[]): number | null {
  if (values.length < 2) return null;

  const avg = mean(values);
  if (avg === null) return null;

  let squares = 0;
  for (const value of values) {
    squares += (value - avg) ** 2;
  }
  return Math.sqrt(squares / (values.length - 1));
}
