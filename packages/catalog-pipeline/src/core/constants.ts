/**
 * Shared constants for the catalog pipeline
 *
 * Column names here are part of the persisted table contract: the
 * dashboard reads them, so renaming one is a breaking change.
 */

// ============================================================================
// Column Names
// ============================================================================

/** Identifier column of the flattened dataset (catalog code) */
export const ID_COLUMN = 'code';

/** Free-text store list used as the address-bearing field */
export const STORES_COLUMN = 'stores';

/**
 * Columns added by the Enricher, in output order
 */
export const LOCATION_COLUMNS = {
  STORE_ADDRESS: 'store_address',
  LATITUDE: 'latitude',
  LONGITUDE: 'longitude',
  CITY: 'city',
  POSTAL_CODE: 'postal_code',
  GEOCODING_SCORE: 'geocoding_score',
} as const;

export const SUGARS_COLUMN = 'sugars_100g';
export const SUGAR_CATEGORY_COLUMN = 'sugar_category';
export const IS_GEOCODED_COLUMN = 'is_geocoded';

/**
 * Columns that must be numeric before imputation.
 *
 * Catalog payloads mix numbers and numeric strings; these are coerced
 * first so numeric fill strategies see them.
 */
export const NUMERIC_COLUMNS: readonly string[] = [
  'energy_100g',
  SUGARS_COLUMN,
  'fat_100g',
  'salt_100g',
  'nova_group',
  LOCATION_COLUMNS.GEOCODING_SCORE,
];

/** Text columns normalized by the default run */
export const NORMALIZED_TEXT_COLUMNS: readonly string[] = ['brands', 'categories', STORES_COLUMN];

// ============================================================================
// Enrichment
// ============================================================================

/** Max unique addresses resolved per run (external call budget) */
export const GEOCODE_ADDRESS_LIMIT = 100;

/** Address tokens of this length or shorter are discarded */
export const MIN_ADDRESS_TOKEN_LENGTH = 2;

/** Score at or above which a row counts as geocoded */
export const GEOCODED_SCORE_THRESHOLD = 0.5;

// ============================================================================
// Derived Columns
// ============================================================================

/**
 * Sugar buckets: upper bounds are inclusive, the last bucket is open.
 */
export const SUGAR_BUCKETS: readonly { readonly upTo: number; readonly label: string }[] = [
  { upTo: 5, label: 'low' },
  { upTo: 15, label: 'moderate' },
  { upTo: 30, label: 'high' },
  { upTo: Number.POSITIVE_INFINITY, label: 'very_high' },
];

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CATEGORY = 'chocolats';
export const DEFAULT_MAX_ITEMS = 50;
export const DEFAULT_TEXT_PLACEHOLDER = 'unknown';
