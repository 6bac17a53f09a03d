import { Inject, Injectable, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createLogger } from '@/common/utils/logger';
import { isSnapshotFresh, type CatalogSnapshot } from '../../domain/catalog-snapshot';
import { CatalogFormatError, CatalogTransportError } from '../../domain/errors';
import type { CatalogSnapshotRepositoryPort } from '../ports/catalog-snapshot-repository.port';
import type { ClockPort } from '../ports/clock.port';
import type { MetricsPort, RefreshCycleOutcome } from '../ports/metrics.port';
import type { ScheduledTask, TaskTimerPort } from '../ports/task-timer.port';
import {
  CATALOG_SNAPSHOT_REPOSITORY_PORT,
  CLOCK_PORT,
  METRICS_PORT,
  TASK_TIMER_PORT,
} from '../ports/tokens';
import { CatalogStore } from '../services/catalog-store';
import { FetchCatalogSnapshotUseCase } from '../use-cases/fetch-catalog-snapshot';

const DEFAULT_INTERVAL_MS = 24 * 60 * 60 * 1000;

export type RefreshPhase = 'idle' | 'fetching' | 'settling' | 'stopped';

export interface RefreshCycleSummary {
  outcome: RefreshCycleOutcome;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  errorName?: string;
}

export interface RefreshSchedulerState {
  phase: RefreshPhase;
  nextRefreshAt: string | null;
  lastCycle: RefreshCycleSummary | null;
}

/**
 * Drives the catalog lifecycle: hydrate from the persisted snapshot at boot,
 * then fetch -> replace -> save on a fixed interval.
 *
 * Phases: idle -> fetching -> settling -> idle, and stopped after shutdown.
 * A failed cycle leaves the published catalog untouched and is only retried
 * at the next scheduled run.
 */
@Injectable()
export class CatalogRefreshScheduler implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = createLogger(CatalogRefreshScheduler.name);
  private readonly refreshIntervalMs: number;
  private readonly maxSnapshotAgeMs: number;

  private phase: RefreshPhase = 'idle';
  private started = false;
  private stopped = false;
  private pendingTask?: ScheduledTask;
  private nextRefreshAt: Date | null = null;
  private activeCycle?: Promise<RefreshCycleOutcome>;
  private lastCycle: RefreshCycleSummary | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly catalogStore: CatalogStore,
    private readonly fetchCatalogSnapshot: FetchCatalogSnapshotUseCase,
    @Inject(CATALOG_SNAPSHOT_REPOSITORY_PORT)
    private readonly snapshotRepository: CatalogSnapshotRepositoryPort,
    @Inject(METRICS_PORT)
    private readonly metricsPort: MetricsPort,
    @Inject(CLOCK_PORT)
    private readonly clock: ClockPort,
    @Inject(TASK_TIMER_PORT)
    private readonly timer: TaskTimerPort,
  ) {
    this.refreshIntervalMs =
      this.configService.get<number>('CATALOG_REFRESH_INTERVAL_MS') ?? DEFAULT_INTERVAL_MS;
    this.maxSnapshotAgeMs =
      this.configService.get<number>('CATALOG_SNAPSHOT_MAX_AGE_MS') ?? DEFAULT_INTERVAL_MS;
  }

  async onApplicationBootstrap(): Promise<void> {
    await this.start();
  }

  onModuleDestroy(): void {
    this.stop();
  }

  /**
   * Resolves once the boot decision is made. When no fresh snapshot exists the
   * initial cycle is already running (and `isRefreshing` set) at that point.
   */
  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;

    const persisted = await this.snapshotRepository.load();
    if (this.stopped) {
      return;
    }

    if (persisted && isSnapshotFresh(persisted, this.clock.now(), this.maxSnapshotAgeMs)) {
      this.hydrate(persisted);
      this.scheduleNext(this.refreshIntervalMs);
      return;
    }

    this.logger.catalog('catalog_initial_refresh_required', {
      event: 'catalog_initial_refresh_required',
      reason: persisted ? 'snapshot_stale' : 'snapshot_absent',
      snapshot_last_update: persisted?.metadata.lastUpdate.toISOString() ?? null,
    });
    this.launchCycle();
  }

  stop(): void {
    this.stopped = true;
    this.pendingTask?.cancel();
    this.pendingTask = undefined;
    this.nextRefreshAt = null;
    if (!this.activeCycle) {
      this.phase = 'stopped';
    }
  }

  async whenIdle(): Promise<void> {
    if (this.activeCycle) {
      await this.activeCycle;
    }
  }

  getState(): RefreshSchedulerState {
    return {
      phase: this.phase,
      nextRefreshAt: this.nextRefreshAt?.toISOString() ?? null,
      lastCycle: this.lastCycle,
    };
  }

  private hydrate(snapshot: CatalogSnapshot): void {
    this.catalogStore.load(snapshot);
    this.metricsPort.setCatalogSize({
      withSku: snapshot.metadata.productsWithSku,
      withoutSku: snapshot.productsWithoutSku.length,
    });

    this.logger.catalog('catalog_snapshot_hydrated', {
      event: 'catalog_snapshot_hydrated',
      total_products: snapshot.metadata.totalProducts,
      last_update: snapshot.metadata.lastUpdate.toISOString(),
    });
  }

  private scheduleNext(delayMs: number): void {
    this.pendingTask?.cancel();
    this.nextRefreshAt = new Date(this.clock.now().getTime() + delayMs);
    this.pendingTask = this.timer.schedule(delayMs, () => this.launchCycle());
  }

  private launchCycle(): void {
    if (this.activeCycle || this.stopped) {
      return;
    }

    this.pendingTask = undefined;
    this.nextRefreshAt = null;
    this.activeCycle = this.runCycle().finally(() => {
      this.activeCycle = undefined;
    });
  }

  private async runCycle(): Promise<RefreshCycleOutcome> {
    const startedAt = this.clock.now();
    let outcome: RefreshCycleOutcome = 'failed';
    let errorName: string | undefined;

    this.phase = 'fetching';
    this.catalogStore.beginRefresh();

    try {
      const result = await this.fetchCatalogSnapshot.execute();
      this.phase = 'settling';

      if (result.records === 0 && this.catalogStore.view().hasCache) {
        outcome = 'empty';
        this.logger.warn('catalog_refresh_empty', {
          event: 'catalog_refresh_empty',
          kept_total_products: this.catalogStore.view().totalProducts,
        });
      } else {
        this.catalogStore.replace(result.snapshot);
        this.metricsPort.setCatalogSize({
          withSku: result.snapshot.metadata.productsWithSku,
          withoutSku: result.snapshot.productsWithoutSku.length,
        });
        await this.snapshotRepository.save(result.snapshot);
        outcome = 'succeeded';

        this.logger.catalog('catalog_refresh_succeeded', {
          event: 'catalog_refresh_succeeded',
          pages: result.pages,
          records: result.records,
          total_products: result.snapshot.metadata.totalProducts,
          products_with_sku: result.snapshot.metadata.productsWithSku,
        });
      }
    } catch (error: unknown) {
      errorName = error instanceof Error ? error.name : 'UnknownError';
      this.logger.error(
        'catalog_refresh_failed',
        error instanceof Error ? error : undefined,
        {
          event: 'catalog_refresh_failed',
          ...describeFetchError(error),
          keeps_previous_snapshot: this.catalogStore.view().hasCache,
        },
      );
    } finally {
      this.catalogStore.endRefresh();

      const finishedAt = this.clock.now();
      const durationMs = Math.max(0, finishedAt.getTime() - startedAt.getTime());
      this.lastCycle = {
        outcome,
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString(),
        durationMs,
        ...(errorName ? { errorName } : {}),
      };
      this.metricsPort.incrementRefreshCycle(outcome);
      this.metricsPort.observeRefreshDuration(durationMs / 1000);

      if (this.stopped) {
        this.phase = 'stopped';
      } else {
        this.phase = 'idle';
        this.scheduleNext(this.refreshIntervalMs);
      }
    }

    return outcome;
  }
}

function describeFetchError(error: unknown): Record<string, unknown> {
  if (error instanceof CatalogTransportError) {
    return {
      error_kind: 'transport',
      error_code: error.errorCode,
      status_code: error.statusCode,
      offset: error.context?.offset ?? null,
    };
  }

  if (error instanceof CatalogFormatError) {
    return {
      error_kind: 'format',
      offset: error.context?.offset ?? null,
    };
  }

  return { error_kind: 'unexpected' };
}
