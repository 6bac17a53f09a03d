import type { Product } from '../product';
import { normalizeSku } from '../sku';
import type { CatalogSnapshot, CatalogSnapshotBuildReport } from './types';

export function buildCatalogSnapshot(
  products: readonly Product[],
  lastUpdate: Date,
): CatalogSnapshotBuildReport {
  const productsBySku = new Map<string, Product>();
  const productsWithoutSku: Product[] = [];
  const duplicateSkus = new Set<string>();

  for (const product of products) {
    const sku = normalizeSku(product.sku);
    if (sku.length === 0) {
      productsWithoutSku.push(product.sku === '' ? product : { ...product, sku: '' });
      continue;
    }

    if (productsBySku.has(sku)) {
      duplicateSkus.add(sku);
      // Re-insert so iteration order follows the record that won.
      productsBySku.delete(sku);
    }
    productsBySku.set(sku, product.sku === sku ? product : { ...product, sku });
  }

  const snapshot: CatalogSnapshot = {
    productsBySku,
    productsWithoutSku: Object.freeze(productsWithoutSku),
    metadata: Object.freeze({
      totalProducts: productsBySku.size + productsWithoutSku.length,
      productsWithSku: productsBySku.size,
      lastUpdate: new Date(lastUpdate.getTime()),
    }),
  };

  return { snapshot, duplicateSkus: [...duplicateSkus] };
}

export function isSnapshotFresh(snapshot: CatalogSnapshot, now: Date, maxAgeMs: number): boolean {
  const ageMs = now.getTime() - snapshot.metadata.lastUpdate.getTime();
  return ageMs >= 0 && ageMs < maxAgeMs;
}
