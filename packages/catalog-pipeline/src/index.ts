/**
 * Catalog Pipeline - incremental catalog ETL
 *
 * catalog-pipeline provides:
 * - Incremental ingestion against identifiers stored by earlier runs
 * - Bounded, cached geocoding enrichment with first-match merging
 * - An ordered transformation chain with an audit log
 * - Deterministic quality scoring and Markdown reports
 *
 * @packageDocumentation
 */

// Core types and contracts
export type {
  CatalogFetchOptions,
  CatalogRecord,
  CatalogSource,
  CellValue,
  ColumnKind,
  Dataset,
  DatasetStore,
  DataRow,
  GeocodingResult,
  GeocodingService,
  IdentityStore,
  LocationEnrichment,
  PersistenceSink,
  QualityGrade,
  QualityMetrics,
  RawArchive,
  RecommendationService,
} from './core/types.js';
export * from './core/constants.js';
export {
  ConfigValidationError,
  PipelineCancelledError,
  PipelineStageError,
  isConfigValidationError,
  isPipelineCancelledError,
  isPipelineStageError,
  type PipelineStage,
} from './core/errors.js';
export { Logger, logger, createLogger, type LogLevel, type LogMetadata } from './core/utils/logger.js';
export {
  HTTPClient,
  HTTPError,
  HTTPJSONParseError,
  HTTPNetworkError,
  HTTPRetryExhaustedError,
  HTTPTimeoutError,
  DEFAULT_HTTP_CONFIG,
  backoffDelay,
  isFeatureCollection,
  parseRetryAfter,
  type HTTPClientConfig,
  type RequestOptions,
  type RetryPolicy,
  type TransportFailure,
} from './core/http-client.js';

// Acquisition
export { IdentitySet } from './acquisition/identity-set.js';
export { filterNewRecords, type IngestionGateResult } from './acquisition/ingestion-gate.js';

// Enrichment
export { extractAddresses, readAddressField, splitAddressParts } from './enrichment/address-extractor.js';
export {
  GeocodeCache,
  GeocodeCacheBuilder,
  failedGeocodingResult,
  type GeocodeCacheBuilderOptions,
} from './enrichment/geocode-cache.js';
export {
  Enricher,
  toLocationEnrichment,
  type EnricherOptions,
  type EnrichmentStats,
  type MatchPolicy,
} from './enrichment/enricher.js';

// Transformation
export { datasetFromRows, recordsToDataset, columnValues, inferColumnKind } from './transformation/dataset.js';
export {
  TransformChain,
  NUMERIC_FILL_STRATEGIES,
  isNumericFillStrategy,
  sugarCategory,
  type NumericFillStrategy,
  type OutlierMethod,
} from './transformation/transform-chain.js';

// Quality
export {
  computeQualityScore,
  duplicatePoints,
  gradeFromScore,
  gradeQuality,
  type QualityScoreInput,
} from './quality/grading.js';
export { QualityScorer, buildRecommendationSummary, type WriteReportOptions } from './quality/quality-scorer.js';
export { buildQualityReport, formatFileTimestamp, formatReportTimestamp } from './quality/report.js';
export {
  OllamaRecommendationService,
  RECOMMENDATIONS_UNAVAILABLE,
  type OllamaRecommendationConfig,
} from './quality/recommendation-service.js';

// Collaborators
export { OpenFoodFactsSource, productToRecord, type OpenFoodFactsConfig } from './providers/open-food-facts-source.js';
export { AdresseGeocoder, type AdresseGeocoderConfig } from './providers/adresse-geocoder.js';
export { NdjsonDatasetStore, type NdjsonDatasetStoreOptions } from './persistence/ndjson-dataset-store.js';
export { SqliteDatasetStore, type SqliteDatasetStoreOptions } from './persistence/sqlite-dataset-store.js';
export { createDatasetStore, type StoreBackend, type StoreLocations } from './persistence/store-factory.js';
export { parseNdjson, parseNdjsonContent, serializeNdjson, writeNdjson, type NdjsonHeader } from './persistence/ndjson.js';

// Orchestration
export {
  PipelineRunner,
  STAGE_ORDER,
  type PipelineOutcome,
  type PipelineRunOptions,
  type PipelineRunnerConfig,
  type PipelineStats,
} from './pipeline/pipeline-runner.js';
