/**
 * Output Formatting for CLI Commands
 *
 * Consistent table and JSON rendering for run summaries and quality
 * metrics.
 *
 * @module cli/lib/output
 */

import type { QualityMetrics } from '../../core/types.js';

/**
 * Column definition for table output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

function formatCell(column: TableColumn, value: unknown): string {
  return column.formatter ? column.formatter(value) : String(value ?? '');
}

/**
 * Pad a cell value to the specified width, truncating with `~`
 */
function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

export function formatTable<T extends Record<string, unknown>>(data: T[], columns: TableColumn[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) => {
    if (col.width) return col.width;
    const maxDataWidth = Math.max(...data.map((row) => formatCell(col, row[col.key]).length));
    return Math.max(col.header.length, maxDataWidth);
  });

  const headerRow = columns.map((col, i) => padCell(col.header, widths[i], col.align ?? 'left')).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = data.map((row) =>
    columns.map((col, i) => padCell(formatCell(col, row[col.key]), widths[i], col.align ?? 'left')).join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Common column formatters
 */
export const formatters = {
  percent: (value: unknown): string => {
    if (value === null || value === undefined) return '-';
    const num = Number(value);
    return isNaN(num) ? String(value) : `${num.toFixed(1)}%`;
  },

  fraction: (value: unknown): string => {
    if (value === null || value === undefined) return '-';
    const num = Number(value);
    return isNaN(num) ? String(value) : `${(num * 100).toFixed(1)}%`;
  },
};

const METRIC_COLUMNS: TableColumn[] = [
  { key: 'metric', header: 'Metric' },
  { key: 'value', header: 'Value', align: 'right' },
];

/**
 * Two-column metrics table
 */
export function formatMetricsTable(metrics: QualityMetrics): string {
  const rows = [
    { metric: 'Grade', value: metrics.quality_grade },
    { metric: 'Total records', value: String(metrics.total_records) },
    { metric: 'Valid records', value: String(metrics.valid_records) },
    { metric: 'Completeness', value: formatters.fraction(metrics.completeness_score) },
    { metric: 'Duplicates', value: `${metrics.duplicates_count} (${formatters.percent(metrics.duplicates_pct)})` },
    { metric: 'Geocoding success', value: formatters.percent(metrics.geocoding_success_rate) },
    { metric: 'Avg geocoding score', value: metrics.avg_geocoding_score.toFixed(3) },
  ];
  return formatTable(rows, METRIC_COLUMNS);
}

export function printOutput(output: string): void {
  console.log(output);
}

export function printError(message: string): void {
  console.error(`Error: ${message}`);
}
