import { Controller, Get, Req } from '@nestjs/common';
import type { Request } from 'express';
import { createLogger } from '@/common/utils/logger';
import { CatalogRefreshScheduler } from '../catalog/application/scheduler/catalog-refresh.scheduler';
import { CatalogStore } from '../catalog/application/services/catalog-store';

export type ProductCacheState = 'initialized' | 'loading' | 'empty';

export interface HealthResponse {
  status: 'ok' | 'degraded';
  timestamp: string;
  product_cache: {
    is_refreshing: boolean;
    has_cache: boolean;
    last_update: string | null;
    total_products: number;
    status: ProductCacheState;
  };
  refresh: {
    phase: string;
    next_refresh_at: string | null;
    last_outcome: string | null;
  };
}

@Controller('health')
export class HealthController {
  private readonly logger = createLogger(HealthController.name);

  constructor(
    private readonly catalogStore: CatalogStore,
    private readonly refreshScheduler: CatalogRefreshScheduler,
  ) {}

  @Get()
  check(@Req() req: Request): HealthResponse {
    const cache = this.catalogStore.status();
    const refresh = this.refreshScheduler.getState();
    const cacheState: ProductCacheState = cache.hasCache
      ? 'initialized'
      : cache.isRefreshing
        ? 'loading'
        : 'empty';

    this.logger.debug('health_check_request', {
      event: 'health_check_request',
      request_id: req.requestId ?? null,
      cache_state: cacheState,
    });

    return {
      // Nothing published and nothing in flight: lookups cannot succeed until the next cycle.
      status: cacheState === 'empty' ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      product_cache: {
        is_refreshing: cache.isRefreshing,
        has_cache: cache.hasCache,
        last_update: cache.lastUpdate,
        total_products: cache.totalProducts,
        status: cacheState,
      },
      refresh: {
        phase: refresh.phase,
        next_refresh_at: refresh.nextRefreshAt,
        last_outcome: refresh.lastCycle?.outcome ?? null,
      },
    };
  }
}
