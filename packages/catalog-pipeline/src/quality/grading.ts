/**
 * Quality grading
 *
 * Pure functions: the grade depends only on the four inputs below, never
 * on the dataset itself. Boundaries are inclusive (exactly 90 is an A).
 *
 * SCORE (0-100):
 *   completeness  min(completeness * 40, 40)
 *   duplicates    <=1% -> 30, <=5% -> 20, <=10% -> 10, else 0
 *   geocoding     min(rate / 100 * 30, 30), or a flat 30 without a
 *                 geocoding column
 */

import type { QualityGrade } from '../core/types.js';

export interface QualityScoreInput {
  /** Fraction of non-missing cells, [0, 1] */
  readonly completeness: number;
  /** Percentage, 0-100 */
  readonly duplicatesPct: number;
  /** Percentage, 0-100 */
  readonly geocodingRate: number;
  readonly hasGeocodingColumn: boolean;
}

const GRADE_THRESHOLDS: readonly { readonly min: number; readonly grade: QualityGrade }[] = [
  { min: 90, grade: 'A' },
  { min: 75, grade: 'B' },
  { min: 60, grade: 'C' },
  { min: 40, grade: 'D' },
];

export function duplicatePoints(duplicatesPct: number): number {
  if (duplicatesPct <= 1) return 30;
  if (duplicatesPct <= 5) return 20;
  if (duplicatesPct <= 10) return 10;
  return 0;
}

export function computeQualityScore(input: QualityScoreInput): number {
  const completenessPoints = Math.min(input.completeness * 40, 40);
  const geocodingPoints = input.hasGeocodingColumn
    ? Math.min((input.geocodingRate / 100) * 30, 30)
    : 30;

  return completenessPoints + duplicatePoints(input.duplicatesPct) + geocodingPoints;
}

export function gradeFromScore(score: number): QualityGrade {
  for (const threshold of GRADE_THRESHOLDS) {
    if (score >= threshold.min) return threshold.grade;
  }
  return 'F';
}

export function gradeQuality(input: QualityScoreInput): QualityGrade {
  return gradeFromScore(computeQualityScore(input));
}
