/**
 * Open Food Facts catalog source
 *
 * Pages the public product search by category tag and flattens each
 * product into a CatalogRecord. Nutriments (`energy_100g`, `sugars_100g`,
 * ...) are lifted to top-level attributes; products without a code are
 * dropped.
 *
 * Data Source:
 * - Search API: https://world.openfoodfacts.org/cgi/search.pl
 *
 * The API cannot filter by product code, so incremental runs still fetch
 * full pages and rely on the ingestion gate.
 */

import { z } from 'zod';
import type { CatalogFetchOptions, CatalogRecord, CatalogSource, CellValue } from '../core/types.js';
import { HTTPClient } from '../core/http-client.js';
import { PipelineCancelledError } from '../core/errors.js';
import { logger } from '../core/utils/logger.js';

const DEFAULT_BASE_URL = 'https://world.openfoodfacts.org';

/** Product fields copied as attributes, in output column order */
const PRODUCT_FIELDS = ['product_name', 'brands', 'categories', 'nutriscore_grade', 'nova_group'] as const;

const NUTRIMENT_FIELDS = ['energy_100g', 'sugars_100g', 'fat_100g', 'salt_100g'] as const;

const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]).optional();

const ProductSchema = z
  .object({
    code: z.union([z.string(), z.number()]).optional(),
    stores: z.string().nullable().optional(),
    nutriments: z.record(z.unknown()).optional(),
  })
  .catchall(z.unknown());

const SearchResponseSchema = z.object({
  count: z.union([z.number(), z.string()]).optional(),
  products: z.array(ProductSchema),
});

type Product = z.infer<typeof ProductSchema>;

export interface OpenFoodFactsConfig {
  readonly baseUrl?: string;
  /** Products per request (default: 50, API max: 100) */
  readonly pageSize?: number;
  readonly timeoutMs?: number;
  readonly client?: HTTPClient;
}

function toCell(value: unknown): CellValue {
  const parsed = ScalarSchema.safeParse(value);
  return parsed.success && parsed.data !== undefined ? parsed.data : null;
}

/**
 * Flatten one API product; null when it has no usable code
 */
export function productToRecord(product: Product): CatalogRecord | null {
  const code = product.code === undefined ? '' : String(product.code).trim();
  if (code.length === 0) return null;

  const attributes: Record<string, CellValue> = {};
  for (const field of PRODUCT_FIELDS) {
    attributes[field] = toCell(product[field]);
  }
  for (const field of NUTRIMENT_FIELDS) {
    attributes[field] = toCell(product.nutriments?.[field]);
  }

  return {
    id: code,
    stores: product.stores ?? null,
    attributes,
  };
}

export class OpenFoodFactsSource implements CatalogSource {
  private readonly baseUrl: string;
  private readonly pageSize: number;
  private readonly timeoutMs: number;
  private readonly client: HTTPClient;

  constructor(config: OpenFoodFactsConfig = {}) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.pageSize = Math.min(100, Math.max(1, config.pageSize ?? 50));
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.client = config.client ?? new HTTPClient({ timeoutMs: this.timeoutMs });
  }

  buildSearchUrl(category: string, page: number, pageSize: number): string {
    const params = new URLSearchParams({
      action: 'process',
      tagtype_0: 'categories',
      tag_contains_0: 'contains',
      tag_0: category,
      page: String(page),
      page_size: String(pageSize),
      json: '1',
      fields: ['code', 'stores', 'nutriments', ...PRODUCT_FIELDS].join(','),
    });
    return `${this.baseUrl}/cgi/search.pl?${params.toString()}`;
  }

  async fetch(category: string, maxItems: number, options: CatalogFetchOptions = {}): Promise<CatalogRecord[]> {
    const records: CatalogRecord[] = [];
    let page = 1;

    while (records.length < maxItems) {
      if (options.signal?.aborted) {
        throw new PipelineCancelledError('fetch');
      }

      // page_size stays fixed: the server derives the offset from (page - 1) * page_size
      const products = await this.fetchPage(category, page, this.pageSize, options.signal);
      if (products.length === 0) break;

      for (const product of products) {
        const record = productToRecord(product);
        if (record) {
          records.push(record);
        } else {
          logger.debug('Skipping product without code', { category, page });
        }
      }

      logger.debug('Catalog page fetched', { category, page, total: records.length });

      if (products.length < this.pageSize) break;
      page++;
    }

    const result = records.slice(0, maxItems);
    logger.info('Catalog fetch complete', { category, requested: maxItems, fetched: result.length });
    return result;
  }

  private async fetchPage(
    category: string,
    page: number,
    pageSize: number,
    signal: AbortSignal | undefined
  ): Promise<Product[]> {
    const url = this.buildSearchUrl(category, page, pageSize);
    const data = await this.client.getJSON(url, { timeoutMs: this.timeoutMs, signal });

    const parsed = SearchResponseSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
      throw new Error(`Invalid catalog search response: ${issues.join(', ')}`);
    }

    return parsed.data.products;
  }
}
