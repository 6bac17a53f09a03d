import type { Product, Variant } from '../domain/product';

export interface ProductSummaryDto {
  sku: string;
  title: string;
  handle: string;
  vendor: string;
  tags: string[];
  product_url: string | null;
  default_image: string | null;
}

export interface VariantDto {
  id: string | null;
  title: string;
  price: string | null;
  available: boolean;
}

export interface VariantLookupResponseDto {
  ok: true;
  product: ProductSummaryDto;
  variant: VariantDto;
  image_url: string | null;
}

/** SKU-only lookups list every variant; multi-variant lookups list the requested ones. */
export interface ProductLookupResponseDto {
  ok: true;
  product: ProductSummaryDto;
  variants: VariantDto[];
  image_url: string | null;
}

export function toProductSummaryDto(product: Product): ProductSummaryDto {
  return {
    sku: product.sku,
    title: product.title,
    handle: product.handle,
    vendor: product.vendor,
    tags: [...product.tags],
    product_url: product.productUrl ?? null,
    default_image: product.defaultImage ?? null,
  };
}

export function toVariantDto(variant: Variant): VariantDto {
  return {
    id: variant.id,
    title: variant.title,
    price: variant.price,
    available: variant.available,
  };
}
