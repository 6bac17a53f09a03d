import { isRecord } from '@/common/utils/object.utils';
import { buildCatalogSnapshot, type CatalogSnapshot } from '../../domain/catalog-snapshot';
import { normalizeProductRecord, type Product } from '../../domain/product';

export interface PersistedVariant {
  id: string | null;
  title: string;
  price: string | null;
  available: boolean;
  featured_image: string | null;
}

export interface PersistedProduct {
  sku: string;
  title: string;
  handle: string;
  vendor: string;
  tags: string[];
  body_markup: string;
  images: Array<{ id: string | null; src: string }>;
  default_image: string | null;
  variants: PersistedVariant[];
  product_url: string | null;
}

export interface PersistedCatalogFile {
  products: Record<string, PersistedProduct>;
  products_without_sku: PersistedProduct[];
  total_products: number;
  products_with_sku: number;
  last_update: string;
}

export function encodeSnapshot(snapshot: CatalogSnapshot): PersistedCatalogFile {
  const products: Record<string, PersistedProduct> = {};
  for (const [sku, product] of snapshot.productsBySku) {
    products[sku] = encodeProduct(product);
  }

  return {
    products,
    products_without_sku: snapshot.productsWithoutSku.map(encodeProduct),
    total_products: snapshot.metadata.totalProducts,
    products_with_sku: snapshot.metadata.productsWithSku,
    last_update: snapshot.metadata.lastUpdate.toISOString(),
  };
}

function encodeProduct(product: Product): PersistedProduct {
  return {
    sku: product.sku,
    title: product.title,
    handle: product.handle,
    vendor: product.vendor,
    tags: [...product.tags],
    body_markup: product.bodyMarkup,
    images: product.images.map((image) => ({ id: image.id, src: image.src })),
    default_image: product.defaultImage ?? null,
    variants: product.variants.map((variant) => ({
      id: variant.id,
      title: variant.title,
      price: variant.price,
      available: variant.available,
      featured_image: variant.featuredImage ?? null,
    })),
    product_url: product.productUrl ?? null,
  };
}

export type DecodeResult =
  | { ok: true; snapshot: CatalogSnapshot; format: 'indexed' | 'legacy_list' }
  | { ok: false; reason: string };

/**
 * Rebuilds a snapshot from file contents. Accepts the indexed format and the
 * older layout where `products` is a plain list. Entries are re-normalized, so
 * index keys are derived from each product's own SKU, not trusted as written.
 */
export function decodeSnapshot(input: unknown): DecodeResult {
  if (!isRecord(input)) {
    return { ok: false, reason: 'not_an_object' };
  }

  const lastUpdate = parseTimestamp(input.last_update);
  if (!lastUpdate) {
    return { ok: false, reason: 'invalid_last_update' };
  }

  const withoutSku = Array.isArray(input.products_without_sku) ? input.products_without_sku : [];

  if (Array.isArray(input.products)) {
    const products = [...input.products, ...withoutSku].map((raw) => normalizeProductRecord(raw));
    return { ok: true, snapshot: buildCatalogSnapshot(products, lastUpdate).snapshot, format: 'legacy_list' };
  }

  if (!isRecord(input.products)) {
    return { ok: false, reason: 'invalid_products' };
  }

  const indexed = Object.entries(input.products).map(([key, raw]) =>
    normalizeProductRecord(isRecord(raw) && typeof raw.sku !== 'string' ? { ...raw, sku: key } : raw),
  );
  const unindexed = withoutSku.map((raw) => normalizeProductRecord(raw));

  return {
    ok: true,
    snapshot: buildCatalogSnapshot([...indexed, ...unindexed], lastUpdate).snapshot,
    format: 'indexed',
  };
}

function parseTimestamp(value: unknown): Date | null {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return null;
  }

  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}
