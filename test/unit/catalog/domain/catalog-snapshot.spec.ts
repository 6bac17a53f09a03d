import { buildCatalogSnapshot, isSnapshotFresh } from '@/modules/catalog/domain/catalog-snapshot';
import { makeProduct } from '../../../fixtures/catalog/catalog-records';

const HOUR_MS = 60 * 60 * 1000;

describe('buildCatalogSnapshot', () => {
  const lastUpdate = new Date('2026-03-01T10:00:00.000Z');

  it('indexes products by uppercase sku and keeps the rest aside', () => {
    const { snapshot, duplicateSkus } = buildCatalogSnapshot(
      [
        makeProduct({ sku: 'rl-001', title: 'Runner Low' }),
        makeProduct({ sku: '', title: 'Gift Card' }),
        makeProduct({ sku: 'TR-200', title: 'Trail' }),
      ],
      lastUpdate,
    );

    expect([...snapshot.productsBySku.keys()]).toEqual(['RL-001', 'TR-200']);
    expect(snapshot.productsBySku.get('RL-001')?.sku).toBe('RL-001');
    expect(snapshot.productsWithoutSku.map((product) => product.title)).toEqual(['Gift Card']);
    expect(snapshot.metadata).toEqual({
      totalProducts: 3,
      productsWithSku: 2,
      lastUpdate,
    });
    expect(duplicateSkus).toEqual([]);
  });

  it('keeps the later record for a repeated sku', () => {
    const { snapshot, duplicateSkus } = buildCatalogSnapshot(
      [
        makeProduct({ sku: 'DUP-1', title: 'First' }),
        makeProduct({ sku: 'OTHER-1', title: 'Other' }),
        makeProduct({ sku: 'dup-1', title: 'Second' }),
      ],
      lastUpdate,
    );

    expect(snapshot.productsBySku.get('DUP-1')?.title).toBe('Second');
    expect([...snapshot.productsBySku.keys()]).toEqual(['OTHER-1', 'DUP-1']);
    expect(snapshot.metadata.totalProducts).toBe(2);
    expect(duplicateSkus).toEqual(['DUP-1']);
  });

  it('total equals indexed plus unindexed products', () => {
    const { snapshot } = buildCatalogSnapshot(
      [makeProduct({ sku: 'A-1' }), makeProduct({ sku: '' }), makeProduct({ sku: '' })],
      lastUpdate,
    );

    expect(snapshot.metadata.totalProducts).toBe(
      snapshot.productsBySku.size + snapshot.productsWithoutSku.length,
    );
  });
});

describe('isSnapshotFresh', () => {
  const lastUpdate = new Date('2026-03-01T10:00:00.000Z');
  const { snapshot } = buildCatalogSnapshot([makeProduct({ sku: 'A-1' })], lastUpdate);
  const maxAgeMs = 24 * HOUR_MS;

  it('accepts a snapshot younger than the max age', () => {
    expect(isSnapshotFresh(snapshot, new Date(lastUpdate.getTime() + 23 * HOUR_MS), maxAgeMs)).toBe(true);
  });

  it('rejects a snapshot at or past the max age', () => {
    expect(isSnapshotFresh(snapshot, new Date(lastUpdate.getTime() + 24 * HOUR_MS), maxAgeMs)).toBe(false);
    expect(isSnapshotFresh(snapshot, new Date(lastUpdate.getTime() + 25 * HOUR_MS), maxAgeMs)).toBe(false);
  });

  it('rejects a snapshot dated in the future', () => {
    expect(isSnapshotFresh(snapshot, new Date(lastUpdate.getTime() - HOUR_MS), maxAgeMs)).toBe(false);
  });
});
