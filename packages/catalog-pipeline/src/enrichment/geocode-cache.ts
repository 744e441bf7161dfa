/**
 * Geocode Cache - one resolution per unique address per run
 *
 * ALGORITHM:
 * 1. Dedupe candidates, then bound to `limit` (first N in candidate order)
 * 2. Resolve each bounded candidate exactly once, `concurrency` at a time
 * 3. Store every result, valid or not, keyed by the candidate string
 *
 * The limit is the only backpressure on external calls: it caps how many
 * lookups a run can issue regardless of batch size. It says nothing about
 * which addresses deserve coordinates.
 *
 * Concurrent requests for the same address share one in-flight promise,
 * so parallel batches never double-call the geocoder. Nothing is kept
 * once a lookup settles: a later build on the same builder resolves again.
 */

import type { GeocodingResult, GeocodingService } from '../core/types.js';
import { GEOCODE_ADDRESS_LIMIT } from '../core/constants.js';
import { logger } from '../core/utils/logger.js';

/**
 * Immutable address -> result mapping produced by one cache build
 */
export class GeocodeCache {
  private readonly results: ReadonlyMap<string, GeocodingResult>;

  constructor(results: Iterable<readonly [string, GeocodingResult]>) {
    this.results = new Map(results);
  }

  static empty(): GeocodeCache {
    return new GeocodeCache([]);
  }

  get(address: string): GeocodingResult | undefined {
    return this.results.get(address);
  }

  has(address: string): boolean {
    return this.results.has(address);
  }

  get size(): number {
    return this.results.size;
  }

  entries(): IterableIterator<[string, GeocodingResult]> {
    return this.results.entries();
  }

  get validCount(): number {
    let count = 0;
    for (const result of this.results.values()) {
      if (result.is_valid) count++;
    }
    return count;
  }

  /**
   * Fraction of cached results that are valid; 0 for an empty cache
   */
  get successRate(): number {
    return this.results.size === 0 ? 0 : this.validCount / this.results.size;
  }
}

export interface GeocodeCacheBuilderOptions {
  readonly geocoder: GeocodingService;
  /** Max unique addresses resolved (default: 100) */
  readonly limit?: number;
  /** Parallel lookups per batch (default: 1) */
  readonly concurrency?: number;
}

/**
 * Invalid placeholder for a lookup that threw
 */
export function failedGeocodingResult(address: string): GeocodingResult {
  return {
    original_address: address,
    label: null,
    latitude: null,
    longitude: null,
    city: null,
    postal_code: null,
    score: 0,
    is_valid: false,
  };
}

export class GeocodeCacheBuilder {
  private readonly geocoder: GeocodingService;
  private readonly limit: number;
  private readonly concurrency: number;
  /** Pending lookups only; an entry leaves the map once it settles */
  private readonly inFlight = new Map<string, Promise<GeocodingResult>>();
  private lookupCount = 0;

  constructor(options: GeocodeCacheBuilderOptions) {
    this.geocoder = options.geocoder;
    this.limit = options.limit ?? GEOCODE_ADDRESS_LIMIT;
    this.concurrency = Math.max(1, options.concurrency ?? 1);
  }

  /**
   * Number of geocoder calls issued by this builder
   */
  get lookups(): number {
    return this.lookupCount;
  }

  async build(addresses: readonly string[]): Promise<GeocodeCache> {
    const bounded = [...new Set(addresses)].slice(0, this.limit);
    const results = new Map<string, GeocodingResult>();

    if (addresses.length > bounded.length) {
      logger.info('Address candidates exceed geocoding limit', {
        candidates: addresses.length,
        limit: this.limit,
      });
    }

    for (let i = 0; i < bounded.length; i += this.concurrency) {
      const batch = bounded.slice(i, i + this.concurrency);
      const resolved = await Promise.all(batch.map((address) => this.resolveOnce(address)));

      batch.forEach((address, index) => {
        results.set(address, resolved[index]);
      });

      logger.debug('Geocoding progress', {
        resolved: Math.min(i + batch.length, bounded.length),
        total: bounded.length,
      });
    }

    const cache = new GeocodeCache(results);
    logger.info('Geocoding cache built', {
      addresses: cache.size,
      valid: cache.validCount,
      successRate: Number((cache.successRate * 100).toFixed(1)),
    });

    return cache;
  }

  /**
   * Join an in-flight lookup for the same address, or start one
   */
  private resolveOnce(address: string): Promise<GeocodingResult> {
    const pending = this.inFlight.get(address);
    if (pending) {
      return pending;
    }

    const lookup = this.lookup(address).finally(() => {
      this.inFlight.delete(address);
    });
    this.inFlight.set(address, lookup);
    return lookup;
  }

  private async lookup(address: string): Promise<GeocodingResult> {
    this.lookupCount++;

    try {
      const result = await this.geocoder.resolve(address);
      // Keyed by the candidate string, whatever the service echoes back
      return { ...result, original_address: address };
    } catch (error) {
      logger.warn('Geocoding lookup failed', {
        address,
        error: error instanceof Error ? error.message : String(error),
      });
      return failedGeocodingResult(address);
    }
  }
}
