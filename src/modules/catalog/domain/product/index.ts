export type { Product, ProductImage, Variant } from './types';
export { normalizeProductRecord, type NormalizeProductOptions } from './normalize';
