import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { JsonFileSnapshotRepository } from '@/modules/catalog/infrastructure/repositories/json-file-snapshot.repository';
import {
  giftCardRecord,
  runnerLowRecord,
  snapshotOf,
} from '../../../fixtures/catalog/catalog-records';
import { configStub, createMetricsPortMock } from '../../../fixtures/catalog/fakes';

describe('JsonFileSnapshotRepository', () => {
  const lastUpdate = new Date('2026-03-01T10:00:00.000Z');
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'catalog-snapshot-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function buildRepository(filePath: string, enabled = true) {
    const metrics = createMetricsPortMock();
    const repository = new JsonFileSnapshotRepository(
      configStub({ CATALOG_SNAPSHOT_PATH: filePath, CATALOG_PERSISTENCE_ENABLED: enabled }),
      metrics,
    );
    return { repository, metrics };
  }

  it('saves and loads a snapshot', async () => {
    const filePath = join(dir, 'nested', 'products_cache.json');
    const { repository } = buildRepository(filePath);
    const snapshot = snapshotOf([runnerLowRecord(), giftCardRecord()], lastUpdate);

    await repository.save(snapshot);
    const loaded = await repository.load();

    expect(loaded?.metadata).toEqual({ totalProducts: 2, productsWithSku: 1, lastUpdate });
    expect([...(loaded?.productsBySku.keys() ?? [])]).toEqual(['RL-001']);
    expect(loaded?.productsBySku.get('RL-001')).toEqual(snapshot.productsBySku.get('RL-001'));
    expect(loaded?.productsWithoutSku).toEqual(snapshot.productsWithoutSku);
  });

  it('keeps relative variant images across a reload', async () => {
    const filePath = join(dir, 'products_cache.json');
    const { repository } = buildRepository(filePath);
    const record = runnerLowRecord({
      images: [
        { id: 1, src: '/files/a.jpg' },
        { id: 2, src: '/files/b.jpg' },
        { id: 3, src: 'c.jpg' },
      ],
      variants: [
        { id: 1, title: '42', available: true, featured_image: { id: 2, src: '/files/b.jpg' } },
        { id: 2, title: '43', available: true, featured_image: 3 },
      ],
    });

    await repository.save(snapshotOf([record], lastUpdate));
    const loaded = await repository.load();

    expect(loaded?.productsBySku.get('RL-001')?.variants.map((variant) => variant.featuredImage)).toEqual([
      '/files/b.jpg',
      'c.jpg',
    ]);
  });

  it('writes the indexed file layout', async () => {
    const filePath = join(dir, 'products_cache.json');
    const { repository } = buildRepository(filePath);

    await repository.save(snapshotOf([runnerLowRecord(), giftCardRecord()], lastUpdate));
    const written: unknown = JSON.parse(await readFile(filePath, 'utf8'));

    expect(written).toMatchObject({
      total_products: 2,
      products_with_sku: 1,
      last_update: '2026-03-01T10:00:00.000Z',
      products: {
        'RL-001': {
          sku: 'RL-001',
          title: 'Runner Low',
          body_markup: '<p>Ref: <strong>RL-001</strong></p>',
          default_image: 'https://cdn.test/rl-1.jpg',
          variants: [
            { id: '1', title: '42', featured_image: 'https://cdn.test/rl-2.jpg' },
            { id: '2', title: '43', featured_image: null },
          ],
        },
      },
      products_without_sku: [{ sku: '', title: 'Gift Card' }],
    });
  });

  it('returns null without counting a failure when the file is absent', async () => {
    const { repository, metrics } = buildRepository(join(dir, 'missing.json'));

    await expect(repository.load()).resolves.toBeNull();
    expect(metrics.incrementPersistenceFailure).not.toHaveBeenCalled();
  });

  it('returns null for a corrupt file', async () => {
    const filePath = join(dir, 'products_cache.json');
    await writeFile(filePath, '{"products": {', 'utf8');
    const { repository, metrics } = buildRepository(filePath);

    await expect(repository.load()).resolves.toBeNull();
    expect(metrics.incrementPersistenceFailure).toHaveBeenCalledWith('load');
  });

  it('returns null when last_update is missing', async () => {
    const filePath = join(dir, 'products_cache.json');
    await writeFile(filePath, JSON.stringify({ products: {}, products_without_sku: [] }), 'utf8');
    const { repository } = buildRepository(filePath);

    await expect(repository.load()).resolves.toBeNull();
  });

  it('reads the list layout', async () => {
    const filePath = join(dir, 'products_cache.json');
    await writeFile(
      filePath,
      JSON.stringify({
        products: [{ title: 'Legacy Boot', body_markup: '<b>LEG-1</b>', variants: [{ title: '40' }] }],
        last_update: '2026-02-28T08:00:00.000Z',
      }),
      'utf8',
    );
    const { repository } = buildRepository(filePath);

    const loaded = await repository.load();

    expect(loaded?.productsBySku.get('LEG-1')?.title).toBe('Legacy Boot');
    expect(loaded?.metadata.lastUpdate.toISOString()).toBe('2026-02-28T08:00:00.000Z');
  });

  it('uses the index key as sku when an entry carries none', async () => {
    const filePath = join(dir, 'products_cache.json');
    await writeFile(
      filePath,
      JSON.stringify({
        products: { 'key-7': { title: 'Keyed' } },
        products_without_sku: [],
        last_update: '2026-02-28T08:00:00.000Z',
      }),
      'utf8',
    );
    const { repository } = buildRepository(filePath);

    const loaded = await repository.load();

    expect(loaded?.productsBySku.get('KEY-7')?.title).toBe('Keyed');
  });

  it('swallows write failures', async () => {
    const blocker = join(dir, 'blocker');
    await writeFile(blocker, 'not a directory', 'utf8');
    const { repository, metrics } = buildRepository(join(blocker, 'products_cache.json'));

    await expect(repository.save(snapshotOf([runnerLowRecord()], lastUpdate))).resolves.toBeUndefined();
    expect(metrics.incrementPersistenceFailure).toHaveBeenCalledWith('save');
  });

  it('does nothing when persistence is disabled', async () => {
    const filePath = join(dir, 'products_cache.json');
    const { repository } = buildRepository(filePath, false);

    await repository.save(snapshotOf([runnerLowRecord()], lastUpdate));

    await expect(readFile(filePath, 'utf8')).rejects.toMatchObject({ code: 'ENOENT' });
    await expect(repository.load()).resolves.toBeNull();
  });
});
