/**
 * Test Mocks
 *
 * In-process stand-ins for the pipeline collaborators and for fetch.
 * Each fake records its calls so tests can assert on them.
 */

import type {
  CatalogFetchOptions,
  CatalogRecord,
  CatalogSource,
  Dataset,
  DatasetStore,
  GeocodingResult,
  GeocodingService,
  RecommendationService,
} from '../../core/types.js';
import { createGeocodingResult } from './fixtures.js';

// ============================================================================
// Collaborators
// ============================================================================

export class FakeCatalogSource implements CatalogSource {
  readonly calls: { category: string; maxItems: number }[] = [];

  constructor(private readonly records: readonly CatalogRecord[]) {}

  async fetch(category: string, maxItems: number, options: CatalogFetchOptions = {}): Promise<CatalogRecord[]> {
    this.calls.push({ category, maxItems });
    if (options.signal?.aborted) {
      throw new Error('aborted');
    }
    return this.records.slice(0, maxItems);
  }
}

/**
 * Resolves addresses from a fixed table; unknown addresses come back
 * invalid, addresses in `failing` throw.
 */
export class FakeGeocoder implements GeocodingService {
  readonly calls: string[] = [];

  constructor(
    private readonly known: ReadonlyMap<string, GeocodingResult> = new Map(),
    private readonly failing: ReadonlySet<string> = new Set()
  ) {}

  async resolve(address: string): Promise<GeocodingResult> {
    this.calls.push(address);
    if (this.failing.has(address)) {
      throw new Error(`geocoder down for ${address}`);
    }
    return this.known.get(address) ?? createGeocodingResult(address, { score: 0, is_valid: false, label: null });
  }
}

export class InMemoryDatasetStore implements DatasetStore {
  readonly written: { dataset: Dataset; category: string }[] = [];
  readonly archived: { records: readonly CatalogRecord[]; category: string }[] = [];
  closed = false;

  constructor(private readonly knownIds: readonly string[] = []) {}

  async loadKnownIds(_category: string): Promise<ReadonlySet<string>> {
    return new Set(this.knownIds);
  }

  async write(dataset: Dataset, category: string): Promise<string> {
    this.written.push({ dataset, category });
    return `memory://${category}/${this.written.length}`;
  }

  async archiveRaw(records: readonly CatalogRecord[], category: string): Promise<string> {
    this.archived.push({ records, category });
    return `memory://${category}/raw/${this.archived.length}`;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeRecommender implements RecommendationService {
  readonly summaries: string[] = [];

  constructor(private readonly reply: string | Error = 'Fill in missing brands.') {}

  async generate(summary: string): Promise<string> {
    this.summaries.push(summary);
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return this.reply;
  }
}

// ============================================================================
// Fetch
// ============================================================================

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
