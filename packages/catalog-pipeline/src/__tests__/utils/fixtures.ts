/**
 * Test Fixtures
 *
 * Factories for records and geocoding results. Every value is made up;
 * overrides replace fields shallowly.
 */

import type { CatalogRecord, CellValue, GeocodingResult } from '../../core/types.js';

export function createRecord(
  id: string,
  stores: string | null = null,
  attributes: Readonly<Record<string, CellValue>> = {}
): CatalogRecord {
  return { id, stores, attributes };
}

/**
 * A record with the attribute set the catalog source produces
 */
export function createProductRecord(
  id: string,
  overrides: Partial<Record<string, CellValue>> & { stores?: string | null } = {}
): CatalogRecord {
  const { stores = 'Carrefour', ...rest } = overrides;
  const attributes: Record<string, CellValue> = {
    product_name: `Test product ${id}`,
    brands: 'Test Brand',
    categories: 'Chocolats',
    nutriscore_grade: 'd',
    nova_group: 4,
    energy_100g: 2200,
    sugars_100g: 40,
    fat_100g: 30,
    salt_100g: 0.1,
  };

  for (const [key, value] of Object.entries(rest)) {
    if (value !== undefined) attributes[key] = value;
  }

  return { id, stores, attributes };
}

export function createGeocodingResult(
  address: string,
  overrides: Partial<GeocodingResult> = {}
): GeocodingResult {
  return {
    original_address: address,
    label: `${address}, 75001 Paris`,
    latitude: 48.86,
    longitude: 2.34,
    city: 'Paris',
    postal_code: '75001',
    score: 0.9,
    is_valid: true,
    ...overrides,
  };
}

export function createInvalidGeocodingResult(address: string, score = 0.2): GeocodingResult {
  return createGeocodingResult(address, { score, is_valid: false });
}
