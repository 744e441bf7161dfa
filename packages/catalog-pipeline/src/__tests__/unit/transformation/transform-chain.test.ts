/**
 * Transform Chain Tests
 *
 * Each operation in isolation, then the default run order.
 */

import { describe, it, expect } from 'vitest';
import { TransformChain, isNumericFillStrategy, sugarCategory } from '../../../transformation/transform-chain.js';
import { columnValues, datasetFromRows } from '../../../transformation/dataset.js';

describe('removeDuplicates', () => {
  it('keeps the first occurrence of each code', () => {
    const chain = new TransformChain(
      datasetFromRows([
        { code: '001', brands: 'first' },
        { code: '002', brands: 'b' },
        { code: '001', brands: 'second' },
        { code: '003', brands: 'c' },
      ])
    );

    const result = chain.removeDuplicates().getResult();

    expect(columnValues(result, 'code')).toEqual(['001', '002', '003']);
    expect(result.rows[0].brands).toBe('first');
    expect(chain.getLog()).toEqual(['Duplicates removed: 1']);
  });

  it('gives the same result when applied twice', () => {
    const input = datasetFromRows([
      { code: '001', brands: 'a' },
      { code: '002', brands: null },
      { code: '001', brands: 'b' },
      { code: '003', brands: 'c' },
      { code: '002', brands: 'd' },
    ]);

    const once = new TransformChain(input).removeDuplicates(['code']).getResult();
    const twiceChain = new TransformChain(input).removeDuplicates(['code']).removeDuplicates(['code']);

    expect(twiceChain.getResult()).toEqual(once);
    expect(columnValues(once, 'code')).toEqual(['001', '002', '003']);
    expect(twiceChain.getLog()).toEqual(['Duplicates removed: 2']);
  });

  it('falls back to the first column without a code column', () => {
    const chain = new TransformChain(datasetFromRows([{ ean: 'x' }, { ean: 'x' }]));

    expect(chain.removeDuplicates().getResult().rows).toHaveLength(1);
  });

  it('compares on the requested key columns and logs nothing when unchanged', () => {
    const chain = new TransformChain(
      datasetFromRows([
        { code: '001', brands: 'a' },
        { code: '002', brands: 'a' },
      ])
    );

    chain.removeDuplicates(['code', 'brands']);

    expect(chain.getResult().rows).toHaveLength(2);
    expect(chain.getLog()).toEqual([]);
  });
});

describe('handleMissingValues', () => {
  it('fills numeric gaps with the median', () => {
    const chain = new TransformChain(
      datasetFromRows([
        { code: '1', sugars_100g: 10 },
        { code: '2', sugars_100g: null },
        { code: '3', sugars_100g: 10 },
        { code: '4', sugars_100g: 100 },
      ])
    );

    const result = chain.handleMissingValues('median').getResult();

    expect(columnValues(result, 'sugars_100g')).toEqual([10, 10, 10, 100]);
    expect(chain.getLog()).toEqual(['sugars_100g: 1 nulls → 10.00']);
  });

  it('supports mean and zero strategies', () => {
    const rows = [{ fat_100g: 10 }, { fat_100g: null }, { fat_100g: 20 }];

    const byMean = new TransformChain(datasetFromRows(rows)).handleMissingValues('mean');
    const byZero = new TransformChain(datasetFromRows(rows)).handleMissingValues('zero');

    expect(columnValues(byMean.getResult(), 'fat_100g')).toEqual([10, 15, 20]);
    expect(byMean.getLog()).toEqual(['fat_100g: 1 nulls → 15.00']);
    expect(columnValues(byZero.getResult(), 'fat_100g')).toEqual([10, 0, 20]);
  });

  it('leaves numeric gaps alone with the none strategy', () => {
    const chain = new TransformChain(datasetFromRows([{ fat_100g: 1 }, { fat_100g: null }]));

    const result = chain.handleMissingValues('none').getResult();

    expect(columnValues(result, 'fat_100g')).toEqual([1, null]);
  });

  it('coerces numeric strings before imputing', () => {
    const chain = new TransformChain(
      datasetFromRows([{ salt_100g: '0.5' }, { salt_100g: 'n/a' }, { salt_100g: '1.5' }])
    );

    const result = chain.handleMissingValues().getResult();

    expect(columnValues(result, 'salt_100g')).toEqual([0.5, 1, 1.5]);
    expect(chain.getLog()).toEqual(['salt_100g: 1 nulls → 1.00']);
  });

  it('fills text gaps with the placeholder', () => {
    const chain = new TransformChain(datasetFromRows([{ brands: 'Lindt' }, { brands: null }]));

    chain.handleMissingValues('median', 'n/a');

    expect(columnValues(chain.getResult(), 'brands')).toEqual(['Lindt', 'n/a']);
    expect(chain.getLog()).toEqual(["brands: 1 nulls → 'n/a'"]);
  });

  it('leaves boolean columns untouched', () => {
    const chain = new TransformChain(datasetFromRows([{ organic: true }, { organic: null }]));

    chain.handleMissingValues();

    expect(columnValues(chain.getResult(), 'organic')).toEqual([true, null]);
  });

  it('changes nothing when applied a second time', () => {
    const chain = new TransformChain(
      datasetFromRows([
        { brands: null, sugars_100g: 5 },
        { brands: 'Milka', sugars_100g: null },
      ])
    );

    chain.handleMissingValues();
    const once = chain.getResult();
    chain.handleMissingValues();

    expect(chain.getResult()).toEqual(once);
    expect(chain.getLog()).toHaveLength(2);
  });
});

describe('normalizeTextColumns', () => {
  it('trims and lowercases the named columns and keeps nulls', () => {
    const chain = new TransformChain(
      datasetFromRows([
        { code: 'A1', brands: '  LINDT ' },
        { code: 'B2', brands: null },
      ])
    );

    const result = chain.normalizeTextColumns(['brands', 'absent']).getResult();

    expect(columnValues(result, 'brands')).toEqual(['lindt', null]);
    expect(columnValues(result, 'code')).toEqual(['A1', 'B2']);
    expect(chain.getLog()).toEqual(['Text normalization: [brands, absent]']);
  });

  it('defaults to every text column', () => {
    const chain = new TransformChain(datasetFromRows([{ code: 'A1', brands: 'Milka', fat_100g: 3 }]));

    chain.normalizeTextColumns();

    expect(chain.getResult().rows[0]).toEqual({ code: 'a1', brands: 'milka', fat_100g: 3 });
    expect(chain.getLog()).toEqual(['Text normalization: [code, brands]']);
  });
});

describe('filterOutliers', () => {
  it('drops values outside the IQR band along with missing cells', () => {
    const chain = new TransformChain(
      datasetFromRows([
        { energy_100g: 1 },
        { energy_100g: 2 },
        { energy_100g: null },
        { energy_100g: 3 },
        { energy_100g: 4 },
        { energy_100g: 100 },
      ])
    );

    const result = chain.filterOutliers(['energy_100g']).getResult();

    expect(columnValues(result, 'energy_100g')).toEqual([1, 2, 3, 4]);
    expect(chain.getLog()).toEqual(['Outliers filtered (iqr): 2']);
  });

  it('drops values at or beyond the z-score threshold', () => {
    const values = [10, 10, 10, 10, 10, 10, 10, 10, 10, 100];
    const chain = new TransformChain(datasetFromRows(values.map((value) => ({ fat_100g: value }))));

    const result = chain.filterOutliers(['fat_100g'], 'zscore', 2).getResult();

    expect(result.rows).toHaveLength(9);
    expect(chain.getLog()).toEqual(['Outliers filtered (zscore): 1']);
  });

  it('drops missing and non-numeric cells under the z-score filter', () => {
    const values: (number | string | null)[] = [10, 10, 10, 10, 10, 10, 10, 10, 10, 100, null, 'n/a'];
    const chain = new TransformChain(datasetFromRows(values.map((value) => ({ fat_100g: value }))));

    const result = chain.filterOutliers(['fat_100g'], 'zscore', 2).getResult();

    expect(columnValues(result, 'fat_100g')).toEqual([10, 10, 10, 10, 10, 10, 10, 10, 10]);
    expect(chain.getLog()).toEqual(['Outliers filtered (zscore): 3']);
  });

  it('skips a z-score filter on a constant column', () => {
    const chain = new TransformChain(datasetFromRows([{ fat_100g: 5 }, { fat_100g: 5 }, { fat_100g: 5 }]));

    chain.filterOutliers(['fat_100g'], 'zscore', 0.5);

    expect(chain.getResult().rows).toHaveLength(3);
    expect(chain.getLog()).toEqual(['Outliers filtered (zscore): 0']);
  });

  it('ignores absent columns', () => {
    const chain = new TransformChain(datasetFromRows([{ fat_100g: 5 }]));

    chain.filterOutliers(['absent']);

    expect(chain.getResult().rows).toHaveLength(1);
  });
});

describe('addDerivedColumns', () => {
  it('buckets sugars and flags geocoded rows', () => {
    const chain = new TransformChain(
      datasetFromRows([
        { sugars_100g: 3, geocoding_score: 0.5 },
        { sugars_100g: 5, geocoding_score: 0.49 },
        { sugars_100g: 10, geocoding_score: null },
        { sugars_100g: 20, geocoding_score: 0.9 },
        { sugars_100g: 45, geocoding_score: 0 },
        { sugars_100g: null, geocoding_score: 1 },
      ])
    );

    const result = chain.addDerivedColumns().getResult();

    expect(result.columns).toEqual(['sugars_100g', 'geocoding_score', 'sugar_category', 'is_geocoded']);
    expect(columnValues(result, 'sugar_category')).toEqual(['low', 'low', 'moderate', 'high', 'very_high', null]);
    expect(columnValues(result, 'is_geocoded')).toEqual([true, false, false, true, false, true]);
    expect(chain.getLog()).toEqual(['Added: sugar_category', 'Added: is_geocoded']);
  });

  it('adds nothing without the source columns', () => {
    const chain = new TransformChain(datasetFromRows([{ code: '1' }]));

    chain.addDerivedColumns();

    expect(chain.getResult().columns).toEqual(['code']);
    expect(chain.getLog()).toEqual([]);
  });
});

describe('TransformChain', () => {
  it('never modifies its input dataset', () => {
    const input = datasetFromRows([{ code: '1', brands: null }, { code: '1', brands: ' X ' }]);

    new TransformChain(input).removeDuplicates().handleMissingValues().normalizeTextColumns();

    expect(input.rows).toEqual([
      { code: '1', brands: null },
      { code: '1', brands: ' X ' },
    ]);
  });

  it('summarizes the log as bullet lines', () => {
    const chain = new TransformChain(datasetFromRows([{ code: '1' }, { code: '1' }]));

    expect(chain.getSummary()).toBe('No transformations applied.');

    chain.removeDuplicates().normalizeTextColumns(['code']);

    expect(chain.getSummary()).toBe('• Duplicates removed: 1\n• Text normalization: [code]');
  });

  it('runs the default order end to end', () => {
    const chain = new TransformChain(
      datasetFromRows([
        { code: '001', brands: ' Lindt ', sugars_100g: '40', stores: 'Carrefour' },
        { code: '002', brands: null, sugars_100g: null, stores: null },
        { code: '001', brands: 'dup', sugars_100g: 1, stores: null },
        { code: '003', brands: 'MILKA', sugars_100g: 4, stores: 'Lidl' },
      ])
    );

    const result = chain
      .removeDuplicates()
      .handleMissingValues()
      .normalizeTextColumns(['brands', 'stores'])
      .addDerivedColumns()
      .getResult();

    expect(result.rows).toEqual([
      { code: '001', brands: 'lindt', sugars_100g: 40, stores: 'carrefour', sugar_category: 'very_high' },
      { code: '002', brands: 'unknown', sugars_100g: 22, stores: 'unknown', sugar_category: 'high' },
      { code: '003', brands: 'milka', sugars_100g: 4, stores: 'lidl', sugar_category: 'low' },
    ]);
    expect(chain.getLog()).toEqual([
      'Duplicates removed: 1',
      "brands: 1 nulls → 'unknown'",
      'sugars_100g: 1 nulls → 22.00',
      "stores: 1 nulls → 'unknown'",
      'Text normalization: [brands, stores]',
      'Added: sugar_category',
    ]);
  });
});

describe('helpers', () => {
  it('maps sugar values to inclusive buckets', () => {
    expect(sugarCategory(5)).toBe('low');
    expect(sugarCategory(5.01)).toBe('moderate');
    expect(sugarCategory(15)).toBe('moderate');
    expect(sugarCategory(30)).toBe('high');
    expect(sugarCategory(30.5)).toBe('very_high');
    expect(sugarCategory(null)).toBeNull();
  });

  it('recognizes fill strategies', () => {
    expect(isNumericFillStrategy('median')).toBe(true);
    expect(isNumericFillStrategy('mode')).toBe(false);
  });
});
