export interface CatalogRequestContext {
  service: 'catalog';
  endpointPath: string;
  offset: number;
  pageSize: number;
}

/**
 * Thrown when the upstream catalog is unreachable, times out or answers non-2xx.
 * Aborts the current refresh cycle only.
 */
export class CatalogTransportError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorCode: 'network' | 'timeout' | 'http',
    public readonly context?: CatalogRequestContext,
  ) {
    super(message);
    this.name = 'CatalogTransportError';
  }
}
