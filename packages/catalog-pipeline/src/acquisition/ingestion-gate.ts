/**
 * Ingestion Gate - drops records already stored by previous runs
 *
 * Pure function over its inputs. Survivors keep their fetch order.
 */

import type { CatalogRecord } from '../core/types.js';
import type { IdentitySet } from './identity-set.js';

/**
 * Gate outcome.
 *
 * `no_new_data` is a terminal success: the batch was non-empty but every
 * record is already known. Callers stop the run without error.
 */
export type IngestionGateResult =
  | {
      readonly status: 'accepted';
      readonly records: readonly CatalogRecord[];
      readonly skippedCount: number;
    }
  | {
      readonly status: 'no_new_data';
      readonly skippedCount: number;
    };

export function filterNewRecords(
  records: readonly CatalogRecord[],
  known: IdentitySet
): IngestionGateResult {
  if (known.isEmpty()) {
    return { status: 'accepted', records, skippedCount: 0 };
  }

  const fresh = records.filter((record) => !known.has(record.id));
  const skippedCount = records.length - fresh.length;

  if (fresh.length === 0 && records.length > 0) {
    return { status: 'no_new_data', skippedCount };
  }

  return { status: 'accepted', records: fresh, skippedCount };
}
