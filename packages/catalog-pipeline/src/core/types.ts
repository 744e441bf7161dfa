/**
 * Catalog Pipeline Core Types
 *
 * Records, geocoding results, tabular datasets, quality metrics and the
 * collaborator contracts the pipeline depends on. Collaborators are
 * interfaces only; concrete network and storage implementations live in
 * providers/ and persistence/.
 */

// ============================================================================
// Records
// ============================================================================

/**
 * Scalar value held by a record attribute or a dataset cell
 */
export type CellValue = string | number | boolean | null;

/**
 * Location data copied onto a record from a matched geocoding result
 */
export interface LocationEnrichment {
  readonly storeAddress: string | null;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly city: string | null;
  readonly postalCode: string | null;
  readonly score: number;
}

/**
 * One catalog item flowing through the pipeline.
 *
 * Well-known fields are typed; everything else the catalog returns
 * (nutrition facts, grade labels, names) rides along in `attributes`.
 * Stages that change a record produce a new object.
 */
export interface CatalogRecord {
  /** Catalog code, unique per product */
  readonly id: string;
  /** Comma-separated store / location names */
  readonly stores: string | null;
  /** Passthrough attributes keyed by field name */
  readonly attributes: Readonly<Record<string, CellValue>>;
  /** Present once the Enricher matched one of the record's stores */
  readonly location?: LocationEnrichment;
}

// ============================================================================
// Geocoding
// ============================================================================

/**
 * Result of resolving one free-text address.
 *
 * Field names mirror the geocoding service payload.
 */
export interface GeocodingResult {
  readonly original_address: string;
  readonly label: string | null;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly city: string | null;
  readonly postal_code: string | null;
  /** Confidence in [0, 1] */
  readonly score: number;
  /** True when a usable coordinate was returned */
  readonly is_valid: boolean;
}

// ============================================================================
// Tabular Dataset
// ============================================================================

export type DataRow = Readonly<Record<string, CellValue>>;

/**
 * Column-oriented view of the pipeline output.
 *
 * Every row carries every column; absent values are `null`.
 */
export interface Dataset {
  readonly columns: readonly string[];
  readonly rows: readonly DataRow[];
}

export type ColumnKind = 'numeric' | 'boolean' | 'text';

// ============================================================================
// Quality
// ============================================================================

export type QualityGrade = 'A' | 'B' | 'C' | 'D' | 'F';

export interface QualityMetrics {
  readonly total_records: number;
  readonly valid_records: number;
  /** Fraction of non-missing cells, in [0, 1] */
  readonly completeness_score: number;
  readonly duplicates_count: number;
  /** Percentage (0-100) */
  readonly duplicates_pct: number;
  /** Percentage (0-100) of rows with a positive geocoding score */
  readonly geocoding_success_rate: number;
  readonly avg_geocoding_score: number;
  readonly null_counts: Readonly<Record<string, number>>;
  readonly quality_grade: QualityGrade;
}

// ============================================================================
// Collaborators
// ============================================================================

export interface CatalogFetchOptions {
  /** Checked between page requests */
  readonly signal?: AbortSignal;
}

/**
 * Product catalog. May return fewer items than requested.
 */
export interface CatalogSource {
  fetch(
    category: string,
    maxItems: number,
    options?: CatalogFetchOptions
  ): Promise<CatalogRecord[]>;
}

/**
 * Free-text address resolver. Timeouts and retries are its own business.
 */
export interface GeocodingService {
  resolve(address: string): Promise<GeocodingResult>;
}

/**
 * Identifiers already persisted by previous runs
 */
export interface IdentityStore {
  loadKnownIds(category: string): Promise<ReadonlySet<string>>;
}

/**
 * Receives the final cleaned table; returns where it was written
 */
export interface PersistenceSink {
  write(dataset: Dataset, category: string): Promise<string>;
}

/**
 * Keeps a copy of the raw fetched batch before any transformation
 */
export interface RawArchive {
  archiveRaw(records: readonly CatalogRecord[], category: string): Promise<string>;
}

/**
 * Optional narrative generator for quality reports
 */
export interface RecommendationService {
  generate(summary: string): Promise<string>;
}

/**
 * Storage backend: both the incremental identity source and the final sink
 */
export interface DatasetStore extends IdentityStore, PersistenceSink, RawArchive {
  close(): Promise<void>;
}
