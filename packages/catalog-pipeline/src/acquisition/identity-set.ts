/**
 * IdentitySet - identifiers stored by previous runs
 *
 * Loaded once per run in incremental mode; empty otherwise. An empty set
 * disables filtering in the ingestion gate.
 */

import type { IdentityStore } from '../core/types.js';
import { logger } from '../core/utils/logger.js';

export class IdentitySet {
  private readonly ids: ReadonlySet<string>;

  private constructor(ids: Iterable<string>) {
    this.ids = new Set(ids);
  }

  /**
   * Non-incremental mode: nothing is known
   */
  static empty(): IdentitySet {
    return new IdentitySet([]);
  }

  static of(ids: Iterable<string>): IdentitySet {
    return new IdentitySet(ids);
  }

  /**
   * Load previously stored identifiers for a category
   */
  static async load(store: IdentityStore, category: string): Promise<IdentitySet> {
    const ids = await store.loadKnownIds(category);
    const set = new IdentitySet(ids);

    if (!set.isEmpty()) {
      logger.info('Loaded known record identifiers', { category, known: set.size });
    }

    return set;
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  get size(): number {
    return this.ids.size;
  }

  isEmpty(): boolean {
    return this.ids.size === 0;
  }
}
