/**
 * Run Command
 *
 * Executes one catalog run: fetch, gate, enrich, transform, score, persist.
 *
 * Usage:
 *   catalog-pipeline run [options]
 *
 * Options:
 *   -c, --category <name>      Catalog category (default: chocolats)
 *   -m, --max-items <n>        Maximum records to fetch (default: 50)
 *   -s, --skip-enrichment      Skip geocoding enrichment
 *   -i, --incremental          Only process records not stored by earlier runs
 *   --storage <backend>        ndjson|sqlite
 *
 * Examples:
 *   catalog-pipeline run -c chocolats -m 100 -i
 *   catalog-pipeline run --storage sqlite --skip-enrichment
 */

import type { Command } from 'commander';
import { InvalidArgumentError } from 'commander';
import type { CLIConfig } from '../lib/config.js';
import { resolvePath } from '../lib/config.js';
import type { CLILogger } from '../lib/logger.js';
import { formatDuration } from '../lib/logger.js';
import { formatJson, formatMetricsTable, printOutput } from '../lib/output.js';
import type { ContextProvider } from '../context.js';
import { EXIT_CODES } from '../exit-codes.js';
import type { ExitCode } from '../exit-codes.js';
import type { DatasetStore } from '../../core/types.js';
import { isPipelineStageError } from '../../core/errors.js';
import { PipelineRunner } from '../../pipeline/pipeline-runner.js';
import type { PipelineOutcome } from '../../pipeline/pipeline-runner.js';
import { createDatasetStore } from '../../persistence/store-factory.js';
import { OpenFoodFactsSource } from '../../providers/open-food-facts-source.js';
import { AdresseGeocoder } from '../../providers/adresse-geocoder.js';
import { OllamaRecommendationService } from '../../quality/recommendation-service.js';

export interface RunOptions {
  readonly skipEnrichment?: boolean;
  readonly incremental?: boolean;
  readonly signal?: AbortSignal;
}

export type RunnerFactory = (config: CLIConfig, store: DatasetStore) => PipelineRunner;

export interface RunCommandResult {
  readonly exitCode: ExitCode;
  readonly outcome: PipelineOutcome | null;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Wire the concrete collaborators named by the configuration
 */
export function createRunnerFromConfig(config: CLIConfig, store: DatasetStore): PipelineRunner {
  const { catalog, geocoder, recommendations } = config.services;

  return new PipelineRunner({
    source: new OpenFoodFactsSource({
      baseUrl: catalog.baseUrl,
      pageSize: catalog.pageSize,
      timeoutMs: catalog.timeout,
    }),
    geocoder: new AdresseGeocoder({
      baseUrl: geocoder.baseUrl,
      minScore: geocoder.minScore,
      timeoutMs: geocoder.timeout,
    }),
    store,
    reportsDir: resolvePath(config, 'reports'),
    recommender: recommendations.enabled
      ? new OllamaRecommendationService({
          baseUrl: recommendations.baseUrl,
          model: recommendations.model,
          timeoutMs: recommendations.timeout,
        })
      : undefined,
    geocodeLimit: config.defaults.geocodeLimit,
    geocodeConcurrency: config.defaults.geocodeConcurrency,
    numericStrategy: config.defaults.numericStrategy,
    textPlaceholder: config.defaults.textPlaceholder,
  });
}

export function outcomeExitCode(outcome: PipelineOutcome): ExitCode {
  switch (outcome.status) {
    case 'completed':
    case 'no_new_data':
    case 'cancelled':
      return EXIT_CODES.SUCCESS;
    case 'no_data_fetched':
      return EXIT_CODES.NO_DATA_FETCHED;
  }
}

function printOutcome(outcome: PipelineOutcome, logger: CLILogger, json: boolean): void {
  if (json) {
    printOutput(formatJson({ success: outcome.status !== 'no_data_fetched', ...outcome }));
    return;
  }

  switch (outcome.status) {
    case 'completed':
      printOutput(`\nCategory: ${outcome.category}`);
      printOutput(`Fetched: ${outcome.stats.fetched}, new: ${outcome.stats.accepted}, skipped: ${outcome.stats.skippedKnown}`);
      if (outcome.stats.enrichment) {
        const rate = (outcome.stats.enrichment.successRate * 100).toFixed(1);
        printOutput(`Enriched: ${outcome.stats.enrichment.successfullyEnriched}/${outcome.stats.enrichment.totalProcessed} (${rate}%)`);
      }
      printOutput('');
      printOutput(formatMetricsTable(outcome.metrics));
      printOutput('');
      printOutput(`Dataset: ${outcome.outputLocation}`);
      printOutput(`Report:  ${outcome.reportPath}`);
      printOutput(`Duration: ${formatDuration(outcome.stats.durationMs)}`);
      break;
    case 'no_new_data':
      logger.info('No new records to process', { skipped: outcome.stats.skippedKnown });
      break;
    case 'no_data_fetched':
      logger.error('No records fetched from the catalog', { category: outcome.category });
      break;
    case 'cancelled':
      logger.warn('Run interrupted, nothing persisted', { stage: outcome.stage });
      break;
  }
}

/**
 * Execute the run command; never throws
 */
export async function executeRun(
  options: RunOptions,
  context: { readonly config: CLIConfig; readonly logger: CLILogger },
  runnerFactory: RunnerFactory = createRunnerFromConfig
): Promise<RunCommandResult> {
  const { config, logger } = context;

  const store = createDatasetStore(config.storage, {
    rawDir: resolvePath(config, 'raw'),
    processedDir: resolvePath(config, 'processed'),
    databasePath: resolvePath(config, 'database'),
  });

  logger.commandStart('run', {
    category: config.defaults.category,
    maxItems: config.defaults.maxItems,
    storage: config.storage,
    incremental: options.incremental ?? false,
  });

  try {
    const outcome = await runnerFactory(config, store).run({
      category: config.defaults.category,
      maxItems: config.defaults.maxItems,
      skipEnrichment: options.skipEnrichment,
      incremental: options.incremental,
      signal: options.signal,
      onStage: (stage, current, total) => logger.progress({ current, total, label: stage }),
    });

    printOutcome(outcome, logger, config.json);
    const exitCode = outcomeExitCode(outcome);
    logger.commandEnd(exitCode === EXIT_CODES.SUCCESS, { status: outcome.status });
    return { exitCode, outcome };
  } catch (error) {
    if (isPipelineStageError(error)) {
      logger.error(error.message, { stage: error.stage });
      if (config.verbose) {
        logger.debug(error.toLogString());
      }
    } else {
      logger.error(error instanceof Error ? error.message : String(error));
    }
    logger.commandEnd(false);
    return { exitCode: EXIT_CODES.ERRORS, outcome: null };
  } finally {
    await store.close();
  }
}

/**
 * Register the run command
 *
 * `--category`, `--max-items` and `--storage` are applied while the
 * configuration loads (see bin), so only run-scoped flags are read here.
 */
export function registerRunCommand(program: Command, getContext: ContextProvider, getSignal: () => AbortSignal): void {
  program
    .command('run')
    .description('Fetch, enrich, clean and score one catalog category')
    .option('-c, --category <name>', 'Catalog category')
    .option('-m, --max-items <n>', 'Maximum records to fetch', parsePositiveInt)
    .option('-s, --skip-enrichment', 'Skip geocoding enrichment')
    .option('-i, --incremental', 'Only process records not stored by earlier runs')
    .option('--storage <backend>', 'Storage backend: ndjson|sqlite')
    .action(async (options: { skipEnrichment?: boolean; incremental?: boolean }) => {
      const result = await executeRun(
        { skipEnrichment: options.skipEnrichment, incremental: options.incremental, signal: getSignal() },
        getContext()
      );
      process.exitCode = result.exitCode;
    });
}
