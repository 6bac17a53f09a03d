export { CatalogFormatError } from './catalog-format.error';
export { CatalogTransportError, type CatalogRequestContext } from './catalog-transport.error';
