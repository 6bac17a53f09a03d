import { validateEnv } from '@/common/config/env.validation';

describe('env.validation', () => {
  const baseConfig = {
    CATALOG_BASE_URL: 'https://catalog.test/',
  };

  it('requires CATALOG_BASE_URL', () => {
    expect(() => validateEnv({})).toThrow('CATALOG_BASE_URL is required');
  });

  it('rejects a non-http base url', () => {
    expect(() => validateEnv({ CATALOG_BASE_URL: 'ftp://catalog.test' })).toThrow(
      'CATALOG_BASE_URL must be an absolute http(s) URL',
    );
  });

  it('applies defaults', () => {
    expect(validateEnv(baseConfig)).toEqual({
      NODE_ENV: 'development',
      PORT: 3090,
      LOG_LEVEL: 'log',
      CATALOG_BASE_URL: 'https://catalog.test',
      CATALOG_PRODUCTS_PATH: '/products.json',
      CATALOG_STOREFRONT_URL: 'https://catalog.test',
      CATALOG_API_TIMEOUT_MS: 8000,
      CATALOG_MAX_PAGES: 400,
      CATALOG_REFRESH_INTERVAL_MS: 86_400_000,
      CATALOG_SNAPSHOT_MAX_AGE_MS: 86_400_000,
      CATALOG_SNAPSHOT_PATH: 'products_cache.json',
      CATALOG_PERSISTENCE_ENABLED: true,
    });
  });

  it('parses overrides', () => {
    const result = validateEnv({
      ...baseConfig,
      NODE_ENV: 'production',
      PORT: '8080',
      CATALOG_PRODUCTS_PATH: 'collections/all/products.json',
      CATALOG_STOREFRONT_URL: 'https://shop.test',
      CATALOG_PERSISTENCE_ENABLED: 'false',
      CATALOG_SNAPSHOT_PATH: '/var/cache/catalog.json',
    });

    expect(result).toMatchObject({
      NODE_ENV: 'production',
      PORT: 8080,
      CATALOG_PRODUCTS_PATH: '/collections/all/products.json',
      CATALOG_STOREFRONT_URL: 'https://shop.test',
      CATALOG_PERSISTENCE_ENABLED: false,
      CATALOG_SNAPSHOT_PATH: '/var/cache/catalog.json',
    });
  });

  it('keeps the refresh interval within timer limits', () => {
    expect(validateEnv({ ...baseConfig, CATALOG_REFRESH_INTERVAL_MS: '1000' }).CATALOG_REFRESH_INTERVAL_MS).toBe(
      60_000,
    );
    expect(
      validateEnv({ ...baseConfig, CATALOG_REFRESH_INTERVAL_MS: '99999999999' }).CATALOG_REFRESH_INTERVAL_MS,
    ).toBe(2_147_483_647);
  });

  it('rejects a non-numeric timeout', () => {
    expect(() => validateEnv({ ...baseConfig, CATALOG_API_TIMEOUT_MS: 'abc' })).toThrow(
      'Invalid number value: abc',
    );
  });
});
