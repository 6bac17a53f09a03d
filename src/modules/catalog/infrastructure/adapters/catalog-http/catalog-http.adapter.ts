import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createLogger } from '@/common/utils/logger';
import type {
  CatalogPageRequest,
  CatalogSourcePort,
} from '@/modules/catalog/application/ports/catalog-source.port';
import { fetchCatalogProducts } from './catalog-client';
import { productsPageEndpoint } from './endpoints';

@Injectable()
export class CatalogHttpAdapter implements CatalogSourcePort {
  private readonly logger = createLogger(CatalogHttpAdapter.name);
  private readonly baseUrl: string;
  private readonly productsPath: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = String(this.configService.get<string>('CATALOG_BASE_URL') ?? '').replace(/\/+$/, '');
    this.productsPath = this.configService.get<string>('CATALOG_PRODUCTS_PATH') ?? '/products.json';
    this.timeoutMs = this.configService.get<number>('CATALOG_API_TIMEOUT_MS') ?? 8000;
  }

  async fetchPage(input: CatalogPageRequest): Promise<unknown[]> {
    const { offset, pageSize } = input;
    if (!Number.isInteger(pageSize) || pageSize <= 0) {
      throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
    }
    if (!Number.isInteger(offset) || offset < 0 || offset % pageSize !== 0) {
      throw new RangeError(`offset must be a non-negative multiple of ${pageSize}, got ${offset}`);
    }

    const path = productsPageEndpoint(this.productsPath, offset, pageSize);
    const startedAt = Date.now();

    const products = await fetchCatalogProducts(this.baseUrl, path, this.timeoutMs, {
      service: 'catalog',
      endpointPath: this.productsPath,
      offset,
      pageSize,
    });

    this.logger.http('catalog_page_received', {
      event: 'catalog_page_received',
      offset,
      page_size: pageSize,
      records: products.length,
      duration: Date.now() - startedAt,
    });

    return products;
  }
}
