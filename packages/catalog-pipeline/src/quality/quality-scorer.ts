/**
 * Quality Scorer - metrics and letter grade for a finalized dataset
 *
 * Metrics are computed once per scorer and never updated afterwards.
 * Stored values are rounded for display (completeness 3 decimals,
 * percentages 2, average score 3); the grade is computed from the
 * unrounded values.
 */

import { join } from 'node:path';
import type { Dataset, QualityMetrics, RecommendationService } from '../core/types.js';
import { ID_COLUMN, LOCATION_COLUMNS } from '../core/constants.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import { logger } from '../core/utils/logger.js';
import { coerceNumeric, isMissing, mean } from '../transformation/statistics.js';
import { gradeQuality } from './grading.js';
import { buildQualityReport, formatFileTimestamp } from './report.js';
import { RECOMMENDATIONS_UNAVAILABLE } from './recommendation-service.js';

export interface WriteReportOptions {
  readonly recommender?: RecommendationService;
  /** Report clock (default: now) */
  readonly now?: Date;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Plain-text digest handed to the recommendation service
 */
export function buildRecommendationSummary(metrics: QualityMetrics): string {
  return [
    'Dataset quality analysis:',
    `- Total: ${metrics.total_records} records`,
    `- Completeness: ${(metrics.completeness_score * 100).toFixed(1)}%`,
    `- Duplicates: ${metrics.duplicates_pct.toFixed(1)}%`,
    `- Grade: ${metrics.quality_grade}`,
    '',
    'Missing values per column:',
    JSON.stringify(metrics.null_counts),
  ].join('\n');
}

export class QualityScorer {
  private metrics: QualityMetrics | null = null;

  constructor(private readonly dataset: Dataset) {}

  analyze(): QualityMetrics {
    if (this.metrics) return this.metrics;

    const total = this.dataset.rows.length;
    const completeness = this.completeness();
    const duplicates = this.duplicateCount();
    const duplicatesPct = total > 0 ? (duplicates / total) * 100 : 0;
    const hasGeocodingColumn = this.dataset.columns.includes(LOCATION_COLUMNS.GEOCODING_SCORE);
    const geocoding = this.geocodingStats();

    this.metrics = {
      total_records: total,
      valid_records: total - duplicates,
      // Unrounded: one missing cell must keep it below 1
      completeness_score: completeness,
      duplicates_count: duplicates,
      duplicates_pct: roundTo(duplicatesPct, 2),
      geocoding_success_rate: roundTo(geocoding.rate, 2),
      avg_geocoding_score: roundTo(geocoding.avgScore, 3),
      null_counts: this.nullCounts(),
      quality_grade: gradeQuality({
        completeness,
        duplicatesPct,
        geocodingRate: geocoding.rate,
        hasGeocodingColumn,
      }),
    };

    return this.metrics;
  }

  /**
   * Never throws: a failing or absent service yields the fallback text
   */
  async generateRecommendations(recommender?: RecommendationService): Promise<string> {
    if (!recommender) return RECOMMENDATIONS_UNAVAILABLE;

    try {
      return await recommender.generate(buildRecommendationSummary(this.analyze()));
    } catch (error) {
      logger.warn('Recommendation service failed, using fallback text', {
        error: error instanceof Error ? error.message : String(error),
      });
      return RECOMMENDATIONS_UNAVAILABLE;
    }
  }

  /**
   * Write `<name>_<YYYYMMDD_HHMMSS>.md` under `dir`; returns the path
   */
  async writeReport(dir: string, name = 'quality_report', options: WriteReportOptions = {}): Promise<string> {
    const metrics = this.analyze();
    const now = options.now ?? new Date();
    const recommendations = await this.generateRecommendations(options.recommender);

    const filePath = join(dir, `${name}_${formatFileTimestamp(now)}.md`);
    await atomicWriteFile(filePath, buildQualityReport(metrics, recommendations, now));

    logger.info('Quality report written', { path: filePath, grade: metrics.quality_grade });
    return filePath;
  }

  private completeness(): number {
    const { columns, rows } = this.dataset;
    const totalCells = rows.length * columns.length;
    if (totalCells === 0) return 0;

    let present = 0;
    for (const row of rows) {
      for (const column of columns) {
        if (!isMissing(row[column])) present++;
      }
    }
    return present / totalCells;
  }

  private duplicateCount(): number {
    const { columns, rows } = this.dataset;
    const idColumn = columns.includes(ID_COLUMN) ? ID_COLUMN : columns[0];
    if (idColumn === undefined) return 0;

    const seen = new Set<string>();
    let duplicates = 0;

    for (const row of rows) {
      const value = row[idColumn];
      const key = JSON.stringify(isMissing(value) ? null : value);
      if (seen.has(key)) {
        duplicates++;
      } else {
        seen.add(key);
      }
    }
    return duplicates;
  }

  private geocodingStats(): { rate: number; avgScore: number } {
    const { columns, rows } = this.dataset;
    if (!columns.includes(LOCATION_COLUMNS.GEOCODING_SCORE) || rows.length === 0) {
      return { rate: 0, avgScore: 0 };
    }

    const positive: number[] = [];
    for (const row of rows) {
      const score = coerceNumeric(row[LOCATION_COLUMNS.GEOCODING_SCORE]);
      if (score !== null && score > 0) positive.push(score);
    }

    return {
      rate: (positive.length / rows.length) * 100,
      avgScore: mean(positive) ?? 0,
    };
  }

  private nullCounts(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const column of this.dataset.columns) {
      counts[column] = this.dataset.rows.filter((row) => isMissing(row[column])).length;
    }
    return counts;
  }
}
