export interface AppEnv {
  NODE_ENV: 'development' | 'test' | 'production';
  PORT: number;
  LOG_LEVEL: 'debug' | 'log' | 'info' | 'warn' | 'error';
  CATALOG_BASE_URL: string;
  CATALOG_PRODUCTS_PATH: string;
  CATALOG_STOREFRONT_URL: string;
  CATALOG_API_TIMEOUT_MS: number;
  CATALOG_MAX_PAGES: number;
  CATALOG_REFRESH_INTERVAL_MS: number;
  CATALOG_SNAPSHOT_MAX_AGE_MS: number;
  CATALOG_SNAPSHOT_PATH: string;
  CATALOG_PERSISTENCE_ENABLED: boolean;
}

const ONE_DAY_MS = 24 * 60 * 60 * 1000;

// setTimeout stores its delay as a signed 32-bit integer.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

function parseNumber(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid number value: ${String(value)}`);
  }

  return parsed;
}

function parseBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value !== 'string') {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
    return true;
  }
  if (normalized === 'false' || normalized === '0' || normalized === 'no') {
    return false;
  }

  return fallback;
}

function parseNodeEnv(value: unknown): AppEnv['NODE_ENV'] {
  if (value === 'production' || value === 'test') {
    return value;
  }

  return 'development';
}

function parseLogLevel(value: unknown): AppEnv['LOG_LEVEL'] {
  if (value === 'debug' || value === 'warn' || value === 'error' || value === 'info' || value === 'log') {
    return value;
  }

  return 'log';
}

function parseUrl(name: string, value: string): string {
  try {
    const url = new URL(value);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new Error('unsupported protocol');
    }
  } catch {
    throw new Error(`${name} must be an absolute http(s) URL`);
  }

  return value.replace(/\/+$/, '');
}

function parsePath(value: unknown, fallback: string): string {
  const raw = String(value ?? '').trim();
  if (raw.length === 0) {
    return fallback;
  }

  return raw.startsWith('/') ? raw : `/${raw}`;
}

function clampDelay(value: number, min: number): number {
  return Math.min(MAX_TIMER_DELAY_MS, Math.max(min, value));
}

export function validateEnv(config: Record<string, unknown>): AppEnv {
  const rawBaseUrl = String(config.CATALOG_BASE_URL ?? '').trim();
  if (rawBaseUrl.length === 0) {
    throw new Error('CATALOG_BASE_URL is required');
  }

  const CATALOG_BASE_URL = parseUrl('CATALOG_BASE_URL', rawBaseUrl);
  const rawStorefrontUrl = String(config.CATALOG_STOREFRONT_URL ?? '').trim();
  const snapshotPath = String(config.CATALOG_SNAPSHOT_PATH ?? '').trim();

  return {
    NODE_ENV: parseNodeEnv(config.NODE_ENV),
    PORT: parseNumber(config.PORT, 3090),
    LOG_LEVEL: parseLogLevel(config.LOG_LEVEL),
    CATALOG_BASE_URL,
    CATALOG_PRODUCTS_PATH: parsePath(config.CATALOG_PRODUCTS_PATH, '/products.json'),
    CATALOG_STOREFRONT_URL:
      rawStorefrontUrl.length > 0
        ? parseUrl('CATALOG_STOREFRONT_URL', rawStorefrontUrl)
        : CATALOG_BASE_URL,
    CATALOG_API_TIMEOUT_MS: Math.max(1000, parseNumber(config.CATALOG_API_TIMEOUT_MS, 8000)),
    CATALOG_MAX_PAGES: Math.max(1, Math.floor(parseNumber(config.CATALOG_MAX_PAGES, 400))),
    CATALOG_REFRESH_INTERVAL_MS: clampDelay(
      parseNumber(config.CATALOG_REFRESH_INTERVAL_MS, ONE_DAY_MS),
      60_000,
    ),
    CATALOG_SNAPSHOT_MAX_AGE_MS: Math.max(0, parseNumber(config.CATALOG_SNAPSHOT_MAX_AGE_MS, ONE_DAY_MS)),
    CATALOG_SNAPSHOT_PATH: snapshotPath.length > 0 ? snapshotPath : 'products_cache.json',
    CATALOG_PERSISTENCE_ENABLED: parseBoolean(config.CATALOG_PERSISTENCE_ENABLED, true),
  };
}
