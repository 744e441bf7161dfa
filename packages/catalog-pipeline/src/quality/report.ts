/**
 * Markdown quality report
 *
 * Timestamps are rendered in UTC so reports from different hosts sort
 * and compare consistently.
 */

import type { QualityMetrics } from '../core/types.js';

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * `YYYY-MM-DD HH:MM:SS` (UTC)
 */
export function formatReportTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

/**
 * `YYYYMMDD_HHMMSS` (UTC), used in output file names
 */
export function formatFileTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * Columns with at least one missing cell, most missing first.
 * Ties keep column order.
 */
export function missingValueRows(
  metrics: QualityMetrics
): { readonly column: string; readonly count: number; readonly pct: number }[] {
  return Object.entries(metrics.null_counts)
    .filter(([, count]) => count > 0)
    .sort(([, a], [, b]) => b - a)
    .map(([column, count]) => ({
      column,
      count,
      pct: metrics.total_records > 0 ? (count / metrics.total_records) * 100 : 0,
    }));
}

export function buildQualityReport(
  metrics: QualityMetrics,
  recommendations: string,
  generatedAt: Date
): string {
  let md = `# Data Quality Report

**Generated:** ${formatReportTimestamp(generatedAt)}

## Global Metrics

| Metric | Value | Target |
|--------|-------|--------|
| **Overall grade** | **${metrics.quality_grade}** | A or B |
| Total records | ${metrics.total_records} | - |
| Duplicates | ${metrics.duplicates_pct.toFixed(1)}% | ≤ 5% |
| Completeness | ${(metrics.completeness_score * 100).toFixed(1)}% | ≥ 70% |
| Geocoding success | ${metrics.geocoding_success_rate.toFixed(1)}% | ≥ 50% |

## Missing Values

| Column | Missing | % Missing |
|--------|---------|-----------|
`;

  for (const row of missingValueRows(metrics)) {
    md += `| ${row.column} | ${row.count} | ${row.pct.toFixed(1)}% |\n`;
  }

  md += `
## Recommendations

${recommendations}

---
*Generated by catalog-pipeline*
`;

  return md;
}
