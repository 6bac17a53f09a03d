/**
 * User-facing error messages shared by the HTTP surface.
 */

export const BACKEND_ERROR_MESSAGE = 'Something went wrong on our side. Please try again in a moment.';

export const INVALID_PAYLOAD_MESSAGE = 'Invalid payload.';

export const CATALOG_REFRESHING_MESSAGE =
  'Product data is being refreshed, please try again in a moment.';

export const SKU_NOT_FOUND_MESSAGE = 'No product found for that SKU.';

export const VARIANT_NOT_FOUND_MESSAGE = 'The product exists but that size/variant was not found.';
