export { CatalogHttpAdapter } from './catalog-http.adapter';
