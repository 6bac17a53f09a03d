import { buildCatalogSnapshot, type CatalogSnapshot } from '@/modules/catalog/domain/catalog-snapshot';
import {
  normalizeProductRecord,
  type Product,
  type Variant,
} from '@/modules/catalog/domain/product';

export const STOREFRONT_URL = 'https://shop.test';

/** Upstream-shaped record with an SKU token in its markup and two shoe sizes. */
export function runnerLowRecord(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 101,
    title: 'Runner Low',
    handle: 'runner-low',
    vendor: 'Acme',
    tags: ['shoes'],
    body_html: '<p>Ref: <strong>RL-001</strong></p>',
    images: [
      { id: 9001, src: 'https://cdn.test/rl-1.jpg' },
      { id: 9002, src: 'https://cdn.test/rl-2.jpg' },
    ],
    variants: [
      {
        id: 1,
        title: '42',
        price: '99.90',
        available: true,
        featured_image: { id: 9002, src: 'https://cdn.test/rl-2.jpg' },
      },
      { id: 2, title: '43', price: '99.90', available: false, featured_image: null },
    ],
    ...overrides,
  };
}

/** Record whose markup carries no SKU token. */
export function giftCardRecord(): Record<string, unknown> {
  return {
    id: 202,
    title: 'Gift Card',
    handle: 'gift-card',
    vendor: 'Acme',
    tags: [],
    body_html: '<p>Redeemable online.</p>',
    images: [],
    variants: [{ id: 3, title: 'Default Title', price: '25.00', available: true }],
  };
}

export function recordWithSku(sku: string, title: string, variantTitles: string[] = ['M']): Record<string, unknown> {
  return {
    id: title.length,
    title,
    handle: title.toLowerCase().replace(/\s+/g, '-'),
    vendor: 'Acme',
    tags: [],
    body_html: `<p><b>${sku}</b></p>`,
    images: [{ id: 1, src: `https://cdn.test/${sku.toLowerCase()}.jpg` }],
    variants: variantTitles.map((variantTitle, index) => ({
      id: index + 1,
      title: variantTitle,
      price: '10.00',
      available: true,
    })),
  };
}

export function normalizedProduct(record: Record<string, unknown>): Product {
  return normalizeProductRecord(record, { storefrontUrl: STOREFRONT_URL });
}

export function makeVariant(overrides: Partial<Variant> = {}): Variant {
  return {
    id: '1',
    title: 'M',
    price: '10.00',
    available: true,
    ...overrides,
  };
}

export function makeProduct(overrides: Partial<Product> = {}): Product {
  return {
    sku: '',
    title: 'Test product',
    handle: 'test-product',
    vendor: 'Acme',
    tags: [],
    bodyMarkup: '',
    images: [],
    variants: [makeVariant()],
    ...overrides,
  };
}

export function snapshotOf(records: Array<Record<string, unknown>>, lastUpdate: Date): CatalogSnapshot {
  return buildCatalogSnapshot(records.map(normalizedProduct), lastUpdate).snapshot;
}
