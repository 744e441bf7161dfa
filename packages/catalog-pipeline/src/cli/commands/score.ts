/**
 * Score Command
 *
 * Scores an existing NDJSON dataset without fetching anything.
 *
 * Usage:
 *   catalog-pipeline score <file>
 *
 * Examples:
 *   catalog-pipeline score data/processed/chocolats_20260105_101500.ndjson
 *   catalog-pipeline --json score data/processed/chocolats_20260105_101500.ndjson
 */

import type { Command } from 'commander';
import type { QualityMetrics } from '../../core/types.js';
import type { CLILogger } from '../lib/logger.js';
import { formatJson, formatMetricsTable, printOutput } from '../lib/output.js';
import type { ContextProvider } from '../context.js';
import { EXIT_CODES } from '../exit-codes.js';
import type { ExitCode } from '../exit-codes.js';
import { parseNdjson } from '../../persistence/ndjson.js';
import { QualityScorer } from '../../quality/quality-scorer.js';
import { missingValueRows } from '../../quality/report.js';

export interface ScoreCommandResult {
  readonly exitCode: ExitCode;
  readonly metrics: QualityMetrics | null;
}

/**
 * Execute the score command; never throws
 */
export async function executeScore(
  file: string,
  context: { readonly logger: CLILogger; readonly config: { readonly json: boolean } }
): Promise<ScoreCommandResult> {
  const { logger, config } = context;
  logger.commandStart('score', { file });

  try {
    const { dataset } = await parseNdjson(file);
    const metrics = new QualityScorer(dataset).analyze();

    if (config.json) {
      printOutput(formatJson({ success: true, file, metrics }));
    } else {
      printOutput(formatMetricsTable(metrics));

      const missing = missingValueRows(metrics);
      if (missing.length > 0) {
        printOutput('');
        logger.table(
          missing.map((row) => ({ column: row.column, missing: row.count, pct: `${row.pct.toFixed(1)}%` })),
          ['column', 'missing', 'pct']
        );
      }
    }

    logger.commandEnd(true, { grade: metrics.quality_grade });
    return { exitCode: EXIT_CODES.SUCCESS, metrics };
  } catch (error) {
    logger.error(`Cannot score ${file}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    logger.commandEnd(false);
    return { exitCode: EXIT_CODES.ERRORS, metrics: null };
  }
}

export function registerScoreCommand(program: Command, getContext: ContextProvider): void {
  program
    .command('score <file>')
    .description('Compute quality metrics for an existing NDJSON dataset')
    .action(async (file: string) => {
      const result = await executeScore(file, getContext());
      process.exitCode = result.exitCode;
    });
}
