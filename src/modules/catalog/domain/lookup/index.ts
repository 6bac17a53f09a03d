export type {
  LookupOutcome,
  MultiVariantLookupResult,
  ProductLookupResult,
  ProductOnlyLookupResult,
} from './types';
export { findVariant, listVariantTitles, resolveVariantImage } from './match';
