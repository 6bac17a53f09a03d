import type { Product, Variant } from '../product';

export type ProductLookupResult =
  | { status: 'refreshing' }
  | { status: 'sku_not_found'; sku: string }
  | {
      status: 'variant_not_found';
      sku: string;
      product: Product;
      invalidVariants: string[];
      availableVariants: string[];
    }
  | { status: 'found'; sku: string; product: Product; variant: Variant; imageUrl: string | null };

export type ProductOnlyLookupResult =
  | { status: 'refreshing' }
  | { status: 'sku_not_found'; sku: string }
  | { status: 'found'; sku: string; product: Product; imageUrl: string | null };

export type MultiVariantLookupResult =
  | { status: 'refreshing' }
  | { status: 'sku_not_found'; sku: string }
  | {
      status: 'variant_not_found';
      sku: string;
      product: Product;
      invalidVariants: string[];
      availableVariants: string[];
    }
  | { status: 'found'; sku: string; product: Product; variants: Variant[]; imageUrl: string | null };

export type LookupOutcome = ProductLookupResult['status'];
