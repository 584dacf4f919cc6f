/**
 * Tests for the Features Stage (Stage 3)
 */

import { describe, it, expect } from '@jest/globals';
import { DEFAULT_PIPELINE_CONFIG } from '../config/defaults.js';
import { ArtifactMissingError, InvalidConfigError, UnknownColumnError } from '../errors/index.js';
import type { BucketFeature, CombineFeature } from '../schemas/pipeline-config.js';
import { createRunParams } from '../schemas/run-params.js';
import { MemoryArtifactStore } from '../storage/artifact-store.js';
import { RecordTable, col } from '../table/record-table.js';
import { featuresStage } from './features.js';
import { applyNumericOp, bucketValue, buildFeatures } from './features/index.js';

// ============================================================================
// Helpers
// ============================================================================

function bucket(overrides: Partial<BucketFeature> = {}): BucketFeature {
  return {
    kind: 'bucket',
    name: 'band',
    column: 'v',
    edges: [0, 2, 4, Infinity],
    labels: ['low', 'mid', 'high'],
    outOfRangeLabel: 'out_of_range',
    ...overrides,
  };
}

function combine(overrides: Partial<CombineFeature> & Pick<CombineFeature, 'op' | 'columns'>): CombineFeature {
  return { kind: 'combine', name: 'out', offset: 0, separator: '_', ...overrides };
}

function valuesTable(values: (number | null)[]): RecordTable {
  return RecordTable.fromRows(
    [col('v', 'float')],
    values.map((v) => ({ v }))
  );
}

// ============================================================================
// Bucketing
// ============================================================================

describe('bucketValue', () => {
  const edges = [0, 2, 4, Infinity];
  const labels = ['low', 'mid', 'high'];

  it('classifies 1 → low, 3 → mid, 1000 → high', () => {
    expect(bucketValue(1, edges, labels, 'out_of_range')).toBe('low');
    expect(bucketValue(3, edges, labels, 'out_of_range')).toBe('mid');
    expect(bucketValue(1000, edges, labels, 'out_of_range')).toBe('high');
  });

  it('uses half-open bins', () => {
    expect(bucketValue(0, edges, labels, 'out_of_range')).toBe('low');
    expect(bucketValue(2, edges, labels, 'out_of_range')).toBe('mid');
    expect(bucketValue(4, edges, labels, 'out_of_range')).toBe('high');
  });

  it('puts a value equal to the final edge in the last bin', () => {
    expect(bucketValue(10, [0, 5, 10], ['a', 'b'], 'oor')).toBe('b');
  });

  it('labels values outside the edges as out of range', () => {
    expect(bucketValue(-1, edges, labels, 'out_of_range')).toBe('out_of_range');
    expect(bucketValue(11, [0, 5, 10], ['a', 'b'], 'oor')).toBe('oor');
  });

  it('keeps null as null', () => {
    expect(bucketValue(null, edges, labels, 'out_of_range')).toBeNull();
  });
});

// ============================================================================
// Combination
// ============================================================================

describe('applyNumericOp', () => {
  it('computes each op', () => {
    expect(applyNumericOp('ratio', [6, 2])).toBe(3);
    expect(applyNumericOp('ratio', [6, 2], 1)).toBe(2);
    expect(applyNumericOp('difference', [6, 2])).toBe(4);
    expect(applyNumericOp('sum', [1, 2, 3])).toBe(6);
    expect(applyNumericOp('product', [2, 3, 4])).toBe(24);
    expect(applyNumericOp('log1p', [0])).toBe(0);
  });

  it('returns null for non-finite results', () => {
    expect(applyNumericOp('ratio', [1, 0])).toBeNull();
    expect(applyNumericOp('log1p', [-1])).toBeNull();
    expect(applyNumericOp('log1p', [-2])).toBeNull();
  });
});

// ============================================================================
// buildFeatures
// ============================================================================

describe('buildFeatures', () => {
  it('appends feature columns after the originals, in spec order', () => {
    const table = RecordTable.fromRows([col('a', 'float'), col('b', 'float')], [{ a: 6, b: 3 }]);

    const featured = buildFeatures(table, [
      combine({ name: 'ratio', op: 'ratio', columns: ['a', 'b'] }),
      combine({ name: 'diff', op: 'difference', columns: ['a', 'b'] }),
    ]);

    expect(featured.columnNames).toEqual(['a', 'b', 'ratio', 'diff']);
    expect(featured.rows[0]).toEqual({ a: 6, b: 3, ratio: 2, diff: 3 });
  });

  it('lets a spec use a column produced by an earlier spec', () => {
    const table = valuesTable([1, 3]);

    const featured = buildFeatures(table, [
      bucket(),
      combine({ name: 'segment', op: 'concat', columns: ['band', 'v'], separator: '-' }),
    ]);

    expect(featured.values('segment')).toEqual(['low-1', 'mid-3']);
  });

  it('produces a string bucket column with null for null input', () => {
    const featured = buildFeatures(valuesTable([1, null, 1000, -5]), [bucket()]);

    expect(featured.column('band')).toEqual(col('band', 'string'));
    expect(featured.values('band')).toEqual(['low', null, 'high', 'out_of_range']);
  });

  it('yields null when an operand is null', () => {
    const table = RecordTable.fromRows([col('a', 'float'), col('b', 'float')], [{ a: null, b: 1 }]);

    const featured = buildFeatures(table, [combine({ op: 'sum', columns: ['a', 'b'] })]);

    expect(featured.values('out')).toEqual([null]);
  });

  it('keeps every row', () => {
    const featured = buildFeatures(valuesTable([1, 2, 3]), [bucket()]);
    expect(featured.rowCount).toBe(3);
  });

  it('throws UnknownColumnError for a column absent at that point', () => {
    expect(() => buildFeatures(valuesTable([1]), [bucket({ column: 'missing' })])).toThrow(UnknownColumnError);
    expect(() =>
      buildFeatures(valuesTable([1]), [
        combine({ name: 'early', op: 'concat', columns: ['v', 'band'] }),
        bucket(),
      ])
    ).toThrow(UnknownColumnError);
  });

  it('throws InvalidConfigError when labels do not match the edges', () => {
    expect(() => buildFeatures(valuesTable([1]), [bucket({ labels: ['low', 'high'] })])).toThrow(
      InvalidConfigError
    );
  });

  it('throws InvalidConfigError for edges that do not increase', () => {
    expect(() => buildFeatures(valuesTable([1]), [bucket({ edges: [0, 4, 2, 8] })])).toThrow(
      'band: bin edges must be strictly increasing'
    );
  });

  it('throws InvalidConfigError for numeric ops on string columns', () => {
    const table = RecordTable.fromRows([col('s', 'string'), col('v', 'float')], [{ s: 'a', v: 1 }]);

    expect(() => buildFeatures(table, [combine({ op: 'sum', columns: ['s', 'v'] })])).toThrow(InvalidConfigError);
  });

  it('refuses to overwrite an existing column', () => {
    expect(() => buildFeatures(valuesTable([1]), [bucket({ name: 'v' })])).toThrow(
      'Feature "v" would overwrite an existing column'
    );
  });

  it('derives the default housing features', () => {
    const table = RecordTable.fromRows(
      DEFAULT_PIPELINE_CONFIG.dataset.columns.map((c) => col(c.name, c.type)),
      [
        {
          MedInc: 4,
          HouseAge: 30,
          AveRooms: 6,
          AveBedrms: 2,
          Population: 300,
          AveOccup: 2,
          Latitude: 37,
          Longitude: -122,
          MedHouseVal: 2,
          year: 2024,
          extraction_date: '2024-06-01',
        },
      ]
    );

    const row = buildFeatures(table, DEFAULT_PIPELINE_CONFIG.features).rows[0];

    expect(row.rooms_per_household).toBe(3);
    expect(row.population_density).toBe(100);
    expect(row.income_per_capita).toBe(2);
    expect(row.price_category).toBe('high');
    expect(row.income_category).toBe('medium');
    expect(row.house_age_category).toBe('old');
    expect(row.income_age_interaction).toBe(120);
    expect(row.market_segment).toBe('medium_high');
    expect(row.MedInc_log).toBeCloseTo(Math.log(5), 12);
  });
});

// ============================================================================
// Stage
// ============================================================================

describe('featuresStage', () => {
  it('reads the clean artifact and writes the features artifact', async () => {
    const store = new MemoryArtifactStore();
    await store.writeTable('clean', 2024, valuesTable([1, 3]));
    const config = {
      ...DEFAULT_PIPELINE_CONFIG,
      features: [bucket()],
    };

    const result = await featuresStage.execute({ params: createRunParams({ year: 2024 }), config, store });

    expect(result.data).toEqual({ rowCount: 2, columnsIn: 1, columnsOut: 2, added: ['band'] });
    expect(result.artifact.name).toBe('features_2024.csv');
    expect((await store.readTable('features', 2024)).values('band')).toEqual(['low', 'mid']);
  });

  it('fails with ArtifactMissingError when the clean artifact is absent', async () => {
    const store = new MemoryArtifactStore();

    await expect(
      featuresStage.execute({ params: createRunParams({ year: 2024 }), config: DEFAULT_PIPELINE_CONFIG, store })
    ).rejects.toThrow(ArtifactMissingError);
  });
});
