export const CATALOG_METRIC_REFRESH_CYCLES_TOTAL = 'catalog_refresh_cycles_total';
export const CATALOG_METRIC_REFRESH_DURATION_SECONDS = 'catalog_refresh_last_duration_seconds';
export const CATALOG_METRIC_PRODUCTS = 'catalog_products';
export const CATALOG_METRIC_LOOKUPS_TOTAL = 'catalog_lookups_total';
export const CATALOG_METRIC_PERSISTENCE_FAILURES_TOTAL = 'catalog_persistence_failures_total';
