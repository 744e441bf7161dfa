/**
 * Pipeline Runner - one incremental catalog run, end to end
 *
 * ALGORITHM:
 * 1. identity        load known ids (incremental mode only)
 * 2. fetch           pull up to maxItems records from the catalog
 * 3. ingestion       drop known records
 * 4. archive         keep the raw accepted batch
 * 5. enrichment      extract addresses, build the geocode cache, enrich
 * 6. transformation  dedupe, impute, normalize, derive
 * 7. quality         metrics, grade, Markdown report
 * 8. persistence     write the cleaned dataset
 *
 * Stages run strictly in sequence. The abort signal is checked before
 * every stage, so a cancelled run never reaches persistence. Unexpected
 * failures are rethrown as PipelineStageError naming the stage.
 *
 * Non-error terminal outcomes: `no_data_fetched` (empty fetch),
 * `no_new_data` (everything already known), `cancelled`.
 */

import type {
  CatalogRecord,
  CatalogSource,
  DatasetStore,
  GeocodingService,
  QualityMetrics,
  RecommendationService,
} from '../core/types.js';
import type { PipelineStage } from '../core/errors.js';
import { PipelineCancelledError, PipelineStageError, isPipelineCancelledError } from '../core/errors.js';
import {
  DEFAULT_TEXT_PLACEHOLDER,
  GEOCODE_ADDRESS_LIMIT,
  ID_COLUMN,
  NORMALIZED_TEXT_COLUMNS,
} from '../core/constants.js';
import { createLogger } from '../core/utils/logger.js';
import { IdentitySet } from '../acquisition/identity-set.js';
import { filterNewRecords } from '../acquisition/ingestion-gate.js';
import { extractAddresses } from '../enrichment/address-extractor.js';
import { GeocodeCacheBuilder } from '../enrichment/geocode-cache.js';
import type { EnrichmentStats } from '../enrichment/enricher.js';
import { Enricher } from '../enrichment/enricher.js';
import { recordsToDataset } from '../transformation/dataset.js';
import type { NumericFillStrategy } from '../transformation/transform-chain.js';
import { TransformChain } from '../transformation/transform-chain.js';
import { QualityScorer } from '../quality/quality-scorer.js';

const logger = createLogger('runner');

// ============================================================================
// Types
// ============================================================================

export interface PipelineRunnerConfig {
  readonly source: CatalogSource;
  readonly geocoder: GeocodingService;
  /** Identity source, raw archive and final sink */
  readonly store: DatasetStore;
  readonly reportsDir: string;
  readonly recommender?: RecommendationService;
  /** Max unique addresses geocoded per run (default: 100) */
  readonly geocodeLimit?: number;
  readonly geocodeConcurrency?: number;
  readonly numericStrategy?: NumericFillStrategy;
  readonly textPlaceholder?: string;
  /** Clock for report names (default: now) */
  readonly now?: () => Date;
}

export interface PipelineRunOptions {
  readonly category: string;
  readonly maxItems: number;
  readonly skipEnrichment?: boolean;
  readonly incremental?: boolean;
  readonly signal?: AbortSignal;
  /** Called as each stage starts; `index` is 1-based within STAGE_ORDER */
  readonly onStage?: (stage: PipelineStage, index: number, total: number) => void;
}

export interface PipelineStats {
  readonly fetched: number;
  readonly skippedKnown: number;
  readonly accepted: number;
  readonly addresses: number;
  readonly geocodeLookups: number;
  readonly enrichment: EnrichmentStats | null;
  readonly transformations: readonly string[];
  readonly durationMs: number;
}

export type PipelineOutcome =
  | {
      readonly status: 'completed';
      readonly category: string;
      readonly stats: PipelineStats;
      readonly metrics: QualityMetrics;
      readonly outputLocation: string;
      readonly rawLocation: string;
      readonly reportPath: string;
    }
  | { readonly status: 'no_data_fetched'; readonly category: string; readonly stats: PipelineStats }
  | { readonly status: 'no_new_data'; readonly category: string; readonly stats: PipelineStats }
  | { readonly status: 'cancelled'; readonly category: string; readonly stage: PipelineStage };

type MutableStats = { -readonly [K in keyof PipelineStats]: PipelineStats[K] };

interface StageContext {
  readonly category: string;
  readonly signal: AbortSignal | undefined;
  readonly onStage: PipelineRunOptions['onStage'];
}

export const STAGE_ORDER: readonly PipelineStage[] = [
  'identity',
  'fetch',
  'ingestion',
  'archive',
  'enrichment',
  'transformation',
  'quality',
  'persistence',
];

// ============================================================================
// Runner
// ============================================================================

export class PipelineRunner {
  private readonly config: PipelineRunnerConfig;

  constructor(config: PipelineRunnerConfig) {
    this.config = config;
  }

  async run(options: PipelineRunOptions): Promise<PipelineOutcome> {
    const { category, signal } = options;
    const ctx: StageContext = { category, signal, onStage: options.onStage };
    const startedAt = Date.now();
    const stats: MutableStats = {
      fetched: 0,
      skippedKnown: 0,
      accepted: 0,
      addresses: 0,
      geocodeLookups: 0,
      enrichment: null,
      transformations: [],
      durationMs: 0,
    };
    const snapshot = (): PipelineStats => ({ ...stats, durationMs: Date.now() - startedAt });

    logger.info('Pipeline started', {
      category,
      maxItems: options.maxItems,
      incremental: options.incremental ?? false,
      skipEnrichment: options.skipEnrichment ?? false,
    });

    try {
      const known = options.incremental
        ? await this.stage('identity', ctx, () => IdentitySet.load(this.config.store, category))
        : IdentitySet.empty();

      const fetched = await this.stage('fetch', ctx, () =>
        this.config.source.fetch(category, options.maxItems, { signal })
      );
      stats.fetched = fetched.length;

      if (fetched.length === 0) {
        logger.error('No records fetched', { category });
        return { status: 'no_data_fetched', category, stats: snapshot() };
      }

      const gate = await this.stage('ingestion', ctx, async () => filterNewRecords(fetched, known));
      stats.skippedKnown = gate.skippedCount;

      if (gate.skippedCount > 0) {
        logger.info('Known records skipped', { category, skipped: gate.skippedCount });
      }
      if (gate.status === 'no_new_data') {
        logger.info('No new records, nothing to do', { category });
        return { status: 'no_new_data', category, stats: snapshot() };
      }
      stats.accepted = gate.records.length;

      const rawLocation = await this.stage('archive', ctx, () =>
        this.config.store.archiveRaw(gate.records, category)
      );

      const records = options.skipEnrichment
        ? gate.records
        : await this.stage('enrichment', ctx, () => this.enrich(gate.records, stats));
      if (options.skipEnrichment) {
        logger.info('Enrichment skipped', { category });
      }

      const dataset = await this.stage('transformation', ctx, async () => {
        const chain = new TransformChain(recordsToDataset(records))
          .removeDuplicates([ID_COLUMN])
          .handleMissingValues(
            this.config.numericStrategy ?? 'median',
            this.config.textPlaceholder ?? DEFAULT_TEXT_PLACEHOLDER
          )
          .normalizeTextColumns(NORMALIZED_TEXT_COLUMNS)
          .addDerivedColumns();

        stats.transformations = chain.getLog();
        logger.info('Transformations applied', { count: stats.transformations.length });
        return chain.getResult();
      });

      const quality = await this.stage('quality', ctx, async () => {
        const scorer = new QualityScorer(dataset);
        const metrics = scorer.analyze();
        logger.info('Quality analyzed', {
          grade: metrics.quality_grade,
          completeness: Number((metrics.completeness_score * 100).toFixed(1)),
        });

        const reportPath = await scorer.writeReport(this.config.reportsDir, `${category}_quality`, {
          recommender: this.config.recommender,
          now: this.config.now?.(),
        });
        return { metrics, reportPath };
      });

      const outputLocation = await this.stage('persistence', ctx, () =>
        this.config.store.write(dataset, category)
      );

      const finalStats = snapshot();
      logger.info('Pipeline completed', {
        category,
        rows: dataset.rows.length,
        output: outputLocation,
        durationMs: finalStats.durationMs,
      });

      return {
        status: 'completed',
        category,
        stats: finalStats,
        metrics: quality.metrics,
        outputLocation,
        rawLocation,
        reportPath: quality.reportPath,
      };
    } catch (error) {
      if (isPipelineCancelledError(error)) {
        logger.warn('Pipeline cancelled', { category, stage: error.stage });
        return { status: 'cancelled', category, stage: error.stage };
      }
      throw error;
    }
  }

  private async enrich(records: readonly CatalogRecord[], stats: MutableStats): Promise<readonly CatalogRecord[]> {
    const addresses = extractAddresses(records);
    stats.addresses = addresses.length;

    if (addresses.length === 0) {
      logger.warn('No addresses found in store field, enrichment skipped');
      return records;
    }

    const builder = new GeocodeCacheBuilder({
      geocoder: this.config.geocoder,
      limit: this.config.geocodeLimit ?? GEOCODE_ADDRESS_LIMIT,
      concurrency: this.config.geocodeConcurrency,
    });
    const cache = await builder.build(addresses);
    stats.geocodeLookups = builder.lookups;

    const enricher = new Enricher();
    const enriched = enricher.enrich(records, cache);
    stats.enrichment = enricher.getStats();
    return enriched;
  }

  /**
   * Abort check, then run one stage; foreign errors gain the stage name
   */
  private async stage<T>(stage: PipelineStage, ctx: StageContext, fn: () => Promise<T>): Promise<T> {
    const { category, signal } = ctx;
    if (signal?.aborted) {
      throw new PipelineCancelledError(stage);
    }
    ctx.onStage?.(stage, STAGE_ORDER.indexOf(stage) + 1, STAGE_ORDER.length);

    try {
      return await fn();
    } catch (error) {
      if (isPipelineCancelledError(error) || error instanceof PipelineStageError) {
        throw error;
      }
      // Requests interrupted by the run's own signal
      if (signal?.aborted) {
        throw new PipelineCancelledError(stage);
      }
      throw new PipelineStageError(stage, category, error);
    }
  }
}
