export interface ProductImage {
  id: string | null;
  src: string;
}

export interface Variant {
  id: string | null;
  title: string;
  price: string | null;
  available: boolean;
  /** Own image URL; resolved against the product's default image at lookup time. */
  featuredImage?: string;
}

export interface Product {
  /** Uppercase SKU, or '' when none could be extracted. */
  sku: string;
  title: string;
  handle: string;
  vendor: string;
  tags: string[];
  bodyMarkup: string;
  images: ProductImage[];
  defaultImage?: string;
  variants: Variant[];
  productUrl?: string;
}
