/**
 * BAN address geocoder
 *
 * Resolves free-text addresses against a BAN-compatible search endpoint
 * (French national address base). Responses are GeoJSON
 * FeatureCollections; only the best feature is used.
 *
 * Data Source:
 * - https://api-adresse.data.gouv.fr/search/
 *
 * Never throws: HTTP and parse failures come back as an invalid result
 * with score 0, which the cache stores like any other result.
 */

import type { Feature } from 'geojson';
import { z } from 'zod';
import type { GeocodingResult, GeocodingService } from '../core/types.js';
import { HTTPClient } from '../core/http-client.js';
import { GEOCODED_SCORE_THRESHOLD } from '../core/constants.js';
import { failedGeocodingResult } from '../enrichment/geocode-cache.js';
import { logger } from '../core/utils/logger.js';

const DEFAULT_BASE_URL = 'https://api-adresse.data.gouv.fr';

const FeaturePropertiesSchema = z.object({
  label: z.string().optional(),
  score: z.number().optional(),
  city: z.string().optional(),
  postcode: z.string().optional(),
});

export interface AdresseGeocoderConfig {
  readonly baseUrl?: string;
  /** Minimum score for a valid result (default: 0.5) */
  readonly minScore?: number;
  readonly timeoutMs?: number;
  readonly client?: HTTPClient;
}

function pointCoordinates(feature: Feature): { latitude: number; longitude: number } | null {
  if (feature.geometry?.type !== 'Point') return null;

  const [longitude, latitude] = feature.geometry.coordinates;
  if (typeof latitude !== 'number' || typeof longitude !== 'number') return null;
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) return null;

  return { latitude, longitude };
}

export class AdresseGeocoder implements GeocodingService {
  private readonly baseUrl: string;
  private readonly minScore: number;
  private readonly timeoutMs: number;
  private readonly client: HTTPClient;

  constructor(config: AdresseGeocoderConfig = {}) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.minScore = config.minScore ?? GEOCODED_SCORE_THRESHOLD;
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.client = config.client ?? new HTTPClient({ maxRetries: 2, timeoutMs: this.timeoutMs });
  }

  buildSearchUrl(address: string): string {
    const params = new URLSearchParams({ q: address, limit: '1' });
    return `${this.baseUrl}/search/?${params.toString()}`;
  }

  async resolve(address: string): Promise<GeocodingResult> {
    const query = address.trim();
    if (query.length === 0) {
      return failedGeocodingResult(address);
    }

    try {
      const collection = await this.client.getFeatureCollection(this.buildSearchUrl(query), {
        timeoutMs: this.timeoutMs,
      });
      return this.toResult(address, collection.features[0]);
    } catch (error) {
      logger.warn('Geocoding request failed', {
        address,
        error: error instanceof Error ? error.message : String(error),
      });
      return failedGeocodingResult(address);
    }
  }

  private toResult(address: string, feature: Feature | undefined): GeocodingResult {
    if (!feature) {
      return failedGeocodingResult(address);
    }

    const parsed = FeaturePropertiesSchema.safeParse(feature.properties ?? {});
    const properties = parsed.success ? parsed.data : {};
    const coordinates = pointCoordinates(feature);
    const score = properties.score ?? 0;

    return {
      original_address: address,
      label: properties.label ?? null,
      latitude: coordinates?.latitude ?? null,
      longitude: coordinates?.longitude ?? null,
      city: properties.city ?? null,
      postal_code: properties.postcode ?? null,
      score,
      is_valid: coordinates !== null && score >= this.minScore,
    };
  }
}
