/**
 * Enricher - merges geocoding results into records
 *
 * MATCH POLICY (first-match):
 * Parts of the address field are scanned in order; the first part present
 * in the cache wins and scanning stops, even when that hit is invalid and
 * a later part would have matched a valid result. A best-score policy
 * would change outcomes for any record listing several cached stores.
 *
 * Counters belong to one Enricher instance; create one per run.
 */

import type { CatalogRecord, GeocodingResult, LocationEnrichment } from '../core/types.js';
import { STORES_COLUMN } from '../core/constants.js';
import { logger } from '../core/utils/logger.js';
import type { GeocodeCache } from './geocode-cache.js';
import { readAddressField, splitAddressParts } from './address-extractor.js';

export type MatchPolicy = 'first-match';

export interface EnrichmentStats {
  readonly totalProcessed: number;
  readonly successfullyEnriched: number;
  readonly failedEnrichment: number;
  /** successfullyEnriched / totalProcessed, 0 when nothing was processed */
  readonly successRate: number;
}

export interface EnricherOptions {
  /** Address-bearing field (default: `stores`) */
  readonly addressField?: string;
  readonly policy?: MatchPolicy;
}

export function toLocationEnrichment(result: GeocodingResult): LocationEnrichment {
  return {
    storeAddress: result.label,
    latitude: result.latitude,
    longitude: result.longitude,
    city: result.city,
    postalCode: result.postal_code,
    score: result.score,
  };
}

export class Enricher {
  private readonly addressField: string;
  readonly policy: MatchPolicy;
  private totalProcessed = 0;
  private successfullyEnriched = 0;
  private failedEnrichment = 0;

  constructor(options: EnricherOptions = {}) {
    this.addressField = options.addressField ?? STORES_COLUMN;
    this.policy = options.policy ?? 'first-match';
  }

  /**
   * Enrich a batch. Input records are never modified; matched records are
   * returned as new objects, unmatched ones pass through as-is.
   */
  enrich(records: readonly CatalogRecord[], cache: GeocodeCache): CatalogRecord[] {
    const enriched = records.map((record) => this.enrichRecord(record, cache));

    logger.info('Enrichment complete', {
      processed: records.length,
      successRate: Number((this.getStats().successRate * 100).toFixed(1)),
    });

    return enriched;
  }

  getStats(): EnrichmentStats {
    return {
      totalProcessed: this.totalProcessed,
      successfullyEnriched: this.successfullyEnriched,
      failedEnrichment: this.failedEnrichment,
      successRate: this.totalProcessed > 0 ? this.successfullyEnriched / this.totalProcessed : 0,
    };
  }

  private enrichRecord(record: CatalogRecord, cache: GeocodeCache): CatalogRecord {
    this.totalProcessed++;

    const match = this.findMatch(record, cache);
    if (!match) {
      this.failedEnrichment++;
      return record;
    }

    if (match.is_valid) {
      this.successfullyEnriched++;
    } else {
      this.failedEnrichment++;
    }

    return { ...record, location: toLocationEnrichment(match) };
  }

  private findMatch(record: CatalogRecord, cache: GeocodeCache): GeocodingResult | undefined {
    const value = readAddressField(record, this.addressField);
    if (!value) return undefined;

    for (const part of splitAddressParts(value)) {
      const hit = cache.get(part);
      if (hit) return hit;
    }

    return undefined;
  }
}
