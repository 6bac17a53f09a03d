import { normalizeProductRecord } from '@/modules/catalog/domain/product';
import { runnerLowRecord } from '../../../fixtures/catalog/catalog-records';

describe('normalizeProductRecord', () => {
  it('maps an upstream record to a product', () => {
    const product = normalizeProductRecord(
      runnerLowRecord({ title: ' Runner Low ', tags: ['shoes', ' running ', ''] }),
      { storefrontUrl: 'https://shop.test/' },
    );

    expect(product).toEqual({
      sku: 'RL-001',
      title: 'Runner Low',
      handle: 'runner-low',
      vendor: 'Acme',
      tags: ['shoes', 'running'],
      bodyMarkup: '<p>Ref: <strong>RL-001</strong></p>',
      images: [
        { id: '9001', src: 'https://cdn.test/rl-1.jpg' },
        { id: '9002', src: 'https://cdn.test/rl-2.jpg' },
      ],
      defaultImage: 'https://cdn.test/rl-1.jpg',
      variants: [
        {
          id: '1',
          title: '42',
          price: '99.90',
          available: true,
          featuredImage: 'https://cdn.test/rl-2.jpg',
        },
        { id: '2', title: '43', price: '99.90', available: false },
      ],
      productUrl: 'https://shop.test/products/runner-low',
    });
    expect(product.variants[1]).not.toHaveProperty('featuredImage');
  });

  it('degrades a malformed record to empty fields', () => {
    const product = normalizeProductRecord(null);

    expect(product.sku).toBe('');
    expect(product.title).toBe('');
    expect(product.variants).toEqual([]);
    expect(product.images).toEqual([]);
    expect(product.defaultImage).toBeUndefined();
    expect(product.productUrl).toBeUndefined();
  });

  it('prefers an explicit sku field over the markup token', () => {
    const product = normalizeProductRecord({ sku: ' ab-12 ', body_html: '<b>ZZ-9</b>' });

    expect(product.sku).toBe('AB-12');
  });

  it('splits comma separated tags', () => {
    expect(normalizeProductRecord({ tags: 'a, b,,c' }).tags).toEqual(['a', 'b', 'c']);
  });

  it('resolves a featured image given by id', () => {
    const product = normalizeProductRecord(
      runnerLowRecord({
        variants: [{ id: 5, title: 'S', price: 12, available: true, featured_image: 9001 }],
      }),
    );

    expect(product.variants).toEqual([
      { id: '5', title: 'S', price: '12.00', available: true, featuredImage: 'https://cdn.test/rl-1.jpg' },
    ]);
  });

  it('treats a non-boolean availability as unavailable', () => {
    const product = normalizeProductRecord({ variants: [{ title: 'M', available: 'yes' }] });

    expect(product.variants[0]?.available).toBe(false);
  });
});
