import type { CatalogRequestContext } from './catalog-transport.error';

/**
 * Thrown when an upstream page cannot be read as `{ products: [...] }`,
 * or when pagination never reaches an empty page.
 */
export class CatalogFormatError extends Error {
  constructor(
    message: string,
    public readonly context?: CatalogRequestContext,
  ) {
    super(message);
    this.name = 'CatalogFormatError';
  }
}
