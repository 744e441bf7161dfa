/**
 * Address extraction from free-text store lists
 *
 * "Carrefour, Auchan, U" -> ["Carrefour", "Auchan"]
 */

import type { CatalogRecord } from '../core/types.js';
import { MIN_ADDRESS_TOKEN_LENGTH, STORES_COLUMN } from '../core/constants.js';

/**
 * Read the address-bearing field of a record.
 *
 * `stores` is a typed field; any other name is looked up in attributes.
 */
export function readAddressField(record: CatalogRecord, field: string): string | null {
  const value = field === STORES_COLUMN ? record.stores : record.attributes[field];
  return typeof value === 'string' ? value : null;
}

/**
 * Split an address field into trimmed parts, order preserved
 */
export function splitAddressParts(value: string): string[] {
  return value.split(',').map((part) => part.trim());
}

/**
 * Unique candidate addresses across a batch, in first-seen order.
 *
 * Tokens of length <= 2 are discarded. Uniqueness is by exact trimmed
 * string ("Lidl" and "LIDL" are two candidates).
 */
export function extractAddresses(
  records: readonly CatalogRecord[],
  field: string = STORES_COLUMN
): string[] {
  const addresses = new Set<string>();

  for (const record of records) {
    const value = readAddressField(record, field);
    if (!value || !value.trim()) continue;

    for (const part of splitAddressParts(value)) {
      if (part.length > MIN_ADDRESS_TOKEN_LENGTH) {
        addresses.add(part);
      }
    }
  }

  return Array.from(addresses);
}
