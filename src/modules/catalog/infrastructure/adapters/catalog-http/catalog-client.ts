import { isRecord } from '@/common/utils/object.utils';
import {
  CatalogFormatError,
  CatalogTransportError,
  type CatalogRequestContext,
} from '@/modules/catalog/domain/errors';
import { fetchTextWithTimeout, HttpTimeoutError } from '../shared';

/**
 * GETs one catalog page and returns its `products` array.
 */
export async function fetchCatalogProducts(
  baseUrl: string,
  path: string,
  timeoutMs: number,
  context: CatalogRequestContext,
): Promise<unknown[]> {
  let status: number;
  let ok: boolean;
  let text: string;

  try {
    const { response, body } = await fetchTextWithTimeout(
      `${baseUrl}${path}`,
      {
        method: 'GET',
        headers: { Accept: 'application/json' },
      },
      timeoutMs,
    );
    status = response.status;
    ok = response.ok;
    text = body;
  } catch (error: unknown) {
    if (error instanceof HttpTimeoutError) {
      throw new CatalogTransportError('Catalog request timeout', 0, 'timeout', context);
    }

    throw new CatalogTransportError('Catalog network error', 0, 'network', context);
  }

  if (!ok) {
    throw new CatalogTransportError(`Catalog backend error ${status}`, status, 'http', context);
  }

  return readProducts(text, context);
}

function readProducts(text: string, context: CatalogRequestContext): unknown[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text) as unknown;
  } catch {
    throw new CatalogFormatError('Catalog page is not valid JSON', context);
  }

  if (!isRecord(parsed) || !Array.isArray(parsed.products)) {
    throw new CatalogFormatError('Catalog page has no products array', context);
  }

  return parsed.products;
}
