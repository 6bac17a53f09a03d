export { extractSku, normalizeSku } from './extract';
