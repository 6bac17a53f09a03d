import { Module } from '@nestjs/common';
import { CatalogRefreshScheduler } from './application/scheduler/catalog-refresh.scheduler';
import { CatalogStore } from './application/services/catalog-store';
import { FetchCatalogSnapshotUseCase } from './application/use-cases/fetch-catalog-snapshot';
import {
  CATALOG_SNAPSHOT_REPOSITORY_PORT,
  CATALOG_SOURCE_PORT,
  CLOCK_PORT,
  METRICS_PORT,
  TASK_TIMER_PORT,
} from './application/ports/tokens';
import { MetricsController } from './controllers/metrics.controller';
import { ProductLookupController } from './controllers/product-lookup.controller';
import { CatalogHttpAdapter } from './infrastructure/adapters/catalog-http';
import { PrometheusMetricsAdapter } from './infrastructure/adapters/metrics/prometheus-metrics.adapter';
import { NodeTaskTimer, SystemClock } from './infrastructure/adapters/timers';
import { JsonFileSnapshotRepository } from './infrastructure/repositories/json-file-snapshot.repository';

@Module({
  controllers: [ProductLookupController, MetricsController],
  providers: [
    CatalogStore,
    FetchCatalogSnapshotUseCase,
    CatalogRefreshScheduler,
    CatalogHttpAdapter,
    JsonFileSnapshotRepository,
    PrometheusMetricsAdapter,
    NodeTaskTimer,
    SystemClock,
    {
      provide: CATALOG_SOURCE_PORT,
      useExisting: CatalogHttpAdapter,
    },
    {
      provide: CATALOG_SNAPSHOT_REPOSITORY_PORT,
      useExisting: JsonFileSnapshotRepository,
    },
    {
      provide: METRICS_PORT,
      useExisting: PrometheusMetricsAdapter,
    },
    {
      provide: CLOCK_PORT,
      useExisting: SystemClock,
    },
    {
      provide: TASK_TIMER_PORT,
      useExisting: NodeTaskTimer,
    },
  ],
  exports: [CatalogStore, CatalogRefreshScheduler],
})
export class CatalogModule {}
