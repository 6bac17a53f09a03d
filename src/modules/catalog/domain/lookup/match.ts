import type { Product, Variant } from '../product';

function normalizeVariantTitle(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * First variant whose title equals `title`, ignoring case and surrounding
 * whitespace. No numeric coercion: "43" does not match "43.0".
 */
export function findVariant(product: Product, title: string): Variant | undefined {
  const wanted = normalizeVariantTitle(title);
  if (wanted.length === 0) {
    return undefined;
  }

  return product.variants.find((variant) => normalizeVariantTitle(variant.title) === wanted);
}

export function resolveVariantImage(product: Product, variant?: Variant): string | null {
  return variant?.featuredImage ?? product.defaultImage ?? null;
}

export function listVariantTitles(product: Product): string[] {
  return product.variants.map((variant) => variant.title).filter((title) => title.length > 0);
}
