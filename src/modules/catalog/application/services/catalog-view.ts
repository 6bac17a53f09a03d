import type { CatalogSnapshot } from '../../domain/catalog-snapshot';
import {
  findVariant,
  listVariantTitles,
  resolveVariantImage,
  type MultiVariantLookupResult,
  type ProductLookupResult,
  type ProductOnlyLookupResult,
} from '../../domain/lookup';
import type { Product } from '../../domain/product';
import { normalizeSku } from '../../domain/sku';

type ResolvedLookup<T extends { status: string }> = Exclude<T, { status: 'refreshing' }>;

/**
 * Read-only projection of one snapshot. A view is never mutated; the store
 * publishes a new one on every swap.
 */
export class CatalogView {
  static readonly EMPTY = new CatalogView(null);

  constructor(readonly snapshot: CatalogSnapshot | null) {}

  get hasCache(): boolean {
    return this.snapshot !== null;
  }

  get totalProducts(): number {
    return this.snapshot?.metadata.totalProducts ?? 0;
  }

  get productsWithSku(): number {
    return this.snapshot?.metadata.productsWithSku ?? 0;
  }

  get lastUpdate(): Date | null {
    return this.snapshot?.metadata.lastUpdate ?? null;
  }

  findProduct(sku: string): Product | undefined {
    return this.snapshot?.productsBySku.get(normalizeSku(sku));
  }

  lookup(sku: string, variantTitle: string): ResolvedLookup<ProductLookupResult> {
    const normalizedSku = normalizeSku(sku);
    const product = this.findProduct(normalizedSku);
    if (!product) {
      return { status: 'sku_not_found', sku: normalizedSku };
    }

    const variant = findVariant(product, variantTitle);
    if (!variant) {
      return {
        status: 'variant_not_found',
        sku: normalizedSku,
        product,
        invalidVariants: [variantTitle.trim()],
        availableVariants: listVariantTitles(product),
      };
    }

    return {
      status: 'found',
      sku: normalizedSku,
      product,
      variant,
      imageUrl: resolveVariantImage(product, variant),
    };
  }

  lookupProduct(sku: string): ResolvedLookup<ProductOnlyLookupResult> {
    const normalizedSku = normalizeSku(sku);
    const product = this.findProduct(normalizedSku);
    if (!product) {
      return { status: 'sku_not_found', sku: normalizedSku };
    }

    return {
      status: 'found',
      sku: normalizedSku,
      product,
      imageUrl: resolveVariantImage(product),
    };
  }

  lookupVariants(sku: string, variantTitles: readonly string[]): ResolvedLookup<MultiVariantLookupResult> {
    const normalizedSku = normalizeSku(sku);
    const product = this.findProduct(normalizedSku);
    if (!product) {
      return { status: 'sku_not_found', sku: normalizedSku };
    }

    const matched = variantTitles.map((title) => ({ title, variant: findVariant(product, title) }));
    const invalidVariants = matched
      .filter((entry) => entry.variant === undefined)
      .map((entry) => entry.title.trim());

    if (variantTitles.length === 0 || invalidVariants.length > 0) {
      return {
        status: 'variant_not_found',
        sku: normalizedSku,
        product,
        invalidVariants,
        availableVariants: listVariantTitles(product),
      };
    }

    const variants = matched.flatMap((entry) => (entry.variant ? [entry.variant] : []));

    return {
      status: 'found',
      sku: normalizedSku,
      product,
      variants,
      imageUrl: resolveVariantImage(product, variants[0]),
    };
  }
}
