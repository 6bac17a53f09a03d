import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createLogger } from '@/common/utils/logger';
import {
  buildCatalogSnapshot,
  type CatalogSnapshotBuildReport,
} from '@/modules/catalog/domain/catalog-snapshot';
import { CatalogFormatError } from '@/modules/catalog/domain/errors';
import { normalizeProductRecord, type Product } from '@/modules/catalog/domain/product';
import type { CatalogSourcePort } from '../../ports/catalog-source.port';
import { CATALOG_PAGE_SIZE } from '../../ports/catalog-source.port';
import type { ClockPort } from '../../ports/clock.port';
import { CATALOG_SOURCE_PORT, CLOCK_PORT } from '../../ports/tokens';

export interface FetchCatalogSnapshotResult extends CatalogSnapshotBuildReport {
  pages: number;
  records: number;
}

/**
 * Walks the upstream catalog page by page until an empty page, normalizing
 * every record, and builds a new snapshot. Nothing is published here; a page
 * failure rejects and the partial result is discarded.
 */
@Injectable()
export class FetchCatalogSnapshotUseCase {
  private readonly logger = createLogger(FetchCatalogSnapshotUseCase.name);
  private readonly storefrontUrl: string | undefined;
  private readonly maxPages: number;

  constructor(
    private readonly configService: ConfigService,
    @Inject(CATALOG_SOURCE_PORT)
    private readonly catalogSource: CatalogSourcePort,
    @Inject(CLOCK_PORT)
    private readonly clock: ClockPort,
  ) {
    this.storefrontUrl =
      this.configService.get<string>('CATALOG_STOREFRONT_URL') ??
      this.configService.get<string>('CATALOG_BASE_URL');
    this.maxPages = this.configService.get<number>('CATALOG_MAX_PAGES') ?? 400;
  }

  async execute(): Promise<FetchCatalogSnapshotResult> {
    const products: Product[] = [];
    let offset = 0;
    let pages = 0;

    for (;;) {
      const records = await this.catalogSource.fetchPage({ offset, pageSize: CATALOG_PAGE_SIZE });
      if (records.length === 0) {
        break;
      }

      // Only a non-empty page past the cap is an error.
      if (pages >= this.maxPages) {
        throw new CatalogFormatError(`Catalog did not end within ${this.maxPages} pages`, {
          service: 'catalog',
          endpointPath: 'pagination',
          offset,
          pageSize: CATALOG_PAGE_SIZE,
        });
      }

      for (const record of records) {
        products.push(normalizeProductRecord(record, { storefrontUrl: this.storefrontUrl }));
      }

      pages += 1;
      offset += CATALOG_PAGE_SIZE;

      this.logger.debug('catalog_page_fetched', {
        event: 'catalog_page_fetched',
        page: pages,
        page_records: records.length,
        total_records: products.length,
      });
    }

    const report = buildCatalogSnapshot(products, this.clock.now());

    if (report.duplicateSkus.length > 0) {
      this.logger.warn('catalog_duplicate_skus', {
        event: 'catalog_duplicate_skus',
        count: report.duplicateSkus.length,
        sample: report.duplicateSkus.slice(0, 10),
      });
    }

    return { ...report, pages, records: products.length };
  }
}
