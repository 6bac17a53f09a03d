import type { Product } from '../product';

export interface CatalogMetadata {
  totalProducts: number;
  productsWithSku: number;
  lastUpdate: Date;
}

/**
 * Immutable catalog contents. Keys of `productsBySku` are uppercase and equal
 * to the `sku` of the product they hold.
 */
export interface CatalogSnapshot {
  readonly productsBySku: ReadonlyMap<string, Product>;
  readonly productsWithoutSku: readonly Product[];
  readonly metadata: Readonly<CatalogMetadata>;
}

export interface CatalogSnapshotBuildReport {
  snapshot: CatalogSnapshot;
  /** SKUs that appeared more than once; the later record was kept. */
  duplicateSkus: string[];
}
