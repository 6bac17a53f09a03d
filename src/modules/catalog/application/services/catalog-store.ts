import { Injectable } from '@nestjs/common';
import { createLogger } from '@/common/utils/logger';
import type { CatalogSnapshot } from '../../domain/catalog-snapshot';
import type {
  MultiVariantLookupResult,
  ProductLookupResult,
  ProductOnlyLookupResult,
} from '../../domain/lookup';
import { CatalogView } from './catalog-view';

export interface CatalogStatus {
  isRefreshing: boolean;
  hasCache: boolean;
  lastUpdate: string | null;
  totalProducts: number;
}

/**
 * Owns the live catalog. Readers take the current view reference once per
 * call; `replace`/`load` publish a fully built view with a single assignment,
 * so a reader sees either the old snapshot or the new one.
 */
@Injectable()
export class CatalogStore {
  private readonly logger = createLogger(CatalogStore.name);
  private current: CatalogView = CatalogView.EMPTY;
  private refreshing = false;

  view(): CatalogView {
    return this.current;
  }

  status(): CatalogStatus {
    const view = this.current;
    return {
      isRefreshing: this.refreshing,
      hasCache: view.hasCache,
      lastUpdate: view.lastUpdate?.toISOString() ?? null,
      totalProducts: view.totalProducts,
    };
  }

  /** True only during a first fetch with nothing loaded yet. */
  isUnavailable(): boolean {
    return this.refreshing && !this.current.hasCache;
  }

  lookup(sku: string, variantTitle: string): ProductLookupResult {
    const view = this.current;
    if (this.refreshing && !view.hasCache) {
      return { status: 'refreshing' };
    }

    return view.lookup(sku, variantTitle);
  }

  lookupProduct(sku: string): ProductOnlyLookupResult {
    const view = this.current;
    if (this.refreshing && !view.hasCache) {
      return { status: 'refreshing' };
    }

    return view.lookupProduct(sku);
  }

  lookupVariants(sku: string, variantTitles: readonly string[]): MultiVariantLookupResult {
    const view = this.current;
    if (this.refreshing && !view.hasCache) {
      return { status: 'refreshing' };
    }

    return view.lookupVariants(sku, variantTitles);
  }

  replace(snapshot: CatalogSnapshot): void {
    this.publish(snapshot, 'replace');
  }

  load(snapshot: CatalogSnapshot): void {
    this.publish(snapshot, 'load');
  }

  beginRefresh(): void {
    this.refreshing = true;
  }

  endRefresh(): void {
    this.refreshing = false;
  }

  private publish(snapshot: CatalogSnapshot, origin: 'replace' | 'load'): void {
    const next = new CatalogView(snapshot);
    this.current = next;

    this.logger.catalog('catalog_snapshot_published', {
      event: 'catalog_snapshot_published',
      origin,
      total_products: next.totalProducts,
      products_with_sku: next.productsWithSku,
      last_update: next.lastUpdate?.toISOString() ?? null,
    });
  }
}
