/**
 * Enricher Tests
 *
 * First-match merging and per-instance counters.
 */

import { describe, it, expect } from 'vitest';
import { Enricher, toLocationEnrichment } from '../../../enrichment/enricher.js';
import { GeocodeCache } from '../../../enrichment/geocode-cache.js';
import { createGeocodingResult, createInvalidGeocodingResult, createRecord } from '../../utils/index.js';

const carrefour = createGeocodingResult('Carrefour', {
  label: '1 Rue de Rivoli 75001 Paris',
  latitude: 48.8606,
  longitude: 2.3376,
  city: 'Paris',
  postal_code: '75001',
  score: 0.82,
});
const auchan = createInvalidGeocodingResult('Auchan', 0.31);

const cache = new GeocodeCache([
  ['Carrefour', carrefour],
  ['Auchan', auchan],
]);

describe('Enricher', () => {
  it('copies the matched result onto a new record', () => {
    const record = createRecord('001', 'Carrefour');
    const enricher = new Enricher();

    const [enriched] = enricher.enrich([record], cache);

    expect(enriched.location).toEqual({
      storeAddress: '1 Rue de Rivoli 75001 Paris',
      latitude: 48.8606,
      longitude: 2.3376,
      city: 'Paris',
      postalCode: '75001',
      score: 0.82,
    });
    expect(enriched).not.toBe(record);
    expect(record.location).toBeUndefined();
  });

  it('stops at the first cached part even when it is invalid', () => {
    const enricher = new Enricher();

    const [enriched] = enricher.enrich([createRecord('001', 'Auchan, Carrefour')], cache);

    expect(enriched.location).toEqual(toLocationEnrichment(auchan));
    expect(enricher.getStats()).toEqual({
      totalProcessed: 1,
      successfullyEnriched: 0,
      failedEnrichment: 1,
      successRate: 0,
    });
  });

  it('skips uncached parts before matching', () => {
    const [enriched] = new Enricher().enrich([createRecord('001', 'Lidl, Carrefour')], cache);

    expect(enriched.location?.score).toBe(0.82);
  });

  it('passes records without a match through unchanged', () => {
    const noStores = createRecord('001', null);
    const unknown = createRecord('002', 'Monoprix');
    const enricher = new Enricher();

    const result = enricher.enrich([noStores, unknown], cache);

    expect(result[0]).toBe(noStores);
    expect(result[1]).toBe(unknown);
    expect(enricher.getStats().failedEnrichment).toBe(2);
  });

  it('accumulates counters across batches', () => {
    const enricher = new Enricher();

    enricher.enrich([createRecord('001', 'Carrefour'), createRecord('002', 'Auchan')], cache);
    enricher.enrich([createRecord('003', 'Carrefour'), createRecord('004', null)], cache);

    expect(enricher.getStats()).toEqual({
      totalProcessed: 4,
      successfullyEnriched: 2,
      failedEnrichment: 2,
      successRate: 0.5,
    });
  });

  it('reports a zero success rate before any record', () => {
    expect(new Enricher().getStats().successRate).toBe(0);
  });

  it('reads an alternate address field', () => {
    const record = createRecord('001', null, { shop: 'Carrefour' });

    const [enriched] = new Enricher({ addressField: 'shop' }).enrich([record], cache);

    expect(enriched.location?.city).toBe('Paris');
  });
});
