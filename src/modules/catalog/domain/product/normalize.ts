import { isRecord, readOptionalString, readString } from '@/common/utils/object.utils';
import { extractSku, normalizeSku } from '../sku';
import type { Product, ProductImage, Variant } from './types';

export interface NormalizeProductOptions {
  /** Storefront origin used to build `productUrl` from the handle. */
  storefrontUrl?: string;
}

/**
 * Maps one raw catalog record (upstream page item or persisted entry) to a Product.
 * Never throws: missing or mistyped fields become empty values.
 */
export function normalizeProductRecord(raw: unknown, options: NormalizeProductOptions = {}): Product {
  const record = isRecord(raw) ? raw : {};

  const bodyMarkup = readString(record.body_html) || readString(record.body_markup);
  const ownSku = readString(record.sku);
  const images = normalizeImages(record.images);
  const handle = readString(record.handle);

  return {
    sku: ownSku.length > 0 ? normalizeSku(ownSku) : extractSku(bodyMarkup),
    title: readString(record.title),
    handle,
    vendor: readString(record.vendor),
    tags: normalizeTags(record.tags),
    bodyMarkup,
    images,
    defaultImage: readOptionalString(record.default_image) ?? images[0]?.src,
    variants: Array.isArray(record.variants)
      ? record.variants.filter(isRecord).map((variant) => normalizeVariant(variant, images))
      : [],
    productUrl: readOptionalString(record.product_url) ?? buildProductUrl(handle, options.storefrontUrl),
  };
}

function normalizeImages(value: unknown): ProductImage[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value.flatMap((item): ProductImage[] => {
    if (typeof item === 'string' && item.trim().length > 0) {
      return [{ id: null, src: item.trim() }];
    }
    if (!isRecord(item)) {
      return [];
    }

    const src = readString(item.src);
    return src.length > 0 ? [{ id: readId(item.id), src }] : [];
  });
}

function normalizeVariant(record: Record<string, unknown>, images: ProductImage[]): Variant {
  const featuredImage = resolveFeaturedImage(record.featured_image, images);

  return {
    id: readId(record.id),
    title: readString(record.title),
    price: readPrice(record.price),
    available: record.available === true,
    ...(featuredImage ? { featuredImage } : {}),
  };
}

function resolveFeaturedImage(value: unknown, images: ProductImage[]): string | undefined {
  if (isRecord(value)) {
    return readOptionalString(value.src) ?? findImageById(readId(value.id), images);
  }

  if (typeof value === 'string') {
    const src = value.trim();
    // Persisted entries store the resolved src, which may be relative.
    if (images.some((image) => image.src === src) || src.includes('/')) {
      return src;
    }
  }

  return findImageById(readId(value), images);
}

function findImageById(id: string | null, images: ProductImage[]): string | undefined {
  if (id === null) {
    return undefined;
  }

  return images.find((image) => image.id === id)?.src;
}

function normalizeTags(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.map((tag) => readString(tag)).filter((tag) => tag.length > 0);
  }

  if (typeof value === 'string') {
    return value
      .split(',')
      .map((tag) => tag.trim())
      .filter((tag) => tag.length > 0);
  }

  return [];
}

function readId(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }

  return readOptionalString(value) ?? null;
}

function readPrice(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value.toFixed(2);
  }

  return readOptionalString(value) ?? null;
}

function buildProductUrl(handle: string, storefrontUrl?: string): string | undefined {
  if (handle.length === 0 || !storefrontUrl) {
    return undefined;
  }

  return `${storefrontUrl.replace(/\/+$/, '')}/products/${encodeURIComponent(handle)}`;
}
