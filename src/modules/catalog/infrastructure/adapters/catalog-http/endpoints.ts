/**
 * Upstream collection endpoint. The source pages by 1-based page number, so
 * the offset cursor is converted here.
 */
export function productsPageEndpoint(productsPath: string, offset: number, pageSize: number): string {
  const params = new URLSearchParams({
    limit: String(pageSize),
    page: String(Math.floor(offset / pageSize) + 1),
  });

  return `${productsPath}?${params.toString()}`;
}
