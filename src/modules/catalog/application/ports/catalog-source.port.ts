export const CATALOG_PAGE_SIZE = 250;

export interface CatalogPageRequest {
  offset: number;
  pageSize: number;
}

export interface CatalogSourcePort {
  /**
   * Raw product records of one page. An empty array marks the end of the catalog.
   * Rejects with CatalogTransportError or CatalogFormatError.
   */
  fetchPage(input: CatalogPageRequest): Promise<unknown[]>;
}
