import { Injectable } from '@nestjs/common';
import {
  CATALOG_METRIC_LOOKUPS_TOTAL,
  CATALOG_METRIC_PERSISTENCE_FAILURES_TOTAL,
  CATALOG_METRIC_PRODUCTS,
  CATALOG_METRIC_REFRESH_CYCLES_TOTAL,
  CATALOG_METRIC_REFRESH_DURATION_SECONDS,
} from '@/common/metrics/constants';
import type { LookupOutcome } from '@/modules/catalog/domain/lookup';
import type { MetricsPort, RefreshCycleOutcome } from '@/modules/catalog/application/ports/metrics.port';

@Injectable()
export class PrometheusMetricsAdapter implements MetricsPort {
  private readonly refreshCycles = new Map<string, number>();
  private readonly lookups = new Map<string, number>();
  private readonly persistenceFailures = new Map<string, number>();
  private readonly catalogSize = new Map<string, number>();
  private lastRefreshDurationSeconds: number | null = null;

  incrementRefreshCycle(outcome: RefreshCycleOutcome): void {
    const key = sanitizeLabelValue(outcome);
    this.refreshCycles.set(key, (this.refreshCycles.get(key) ?? 0) + 1);
  }

  observeRefreshDuration(seconds: number): void {
    this.lastRefreshDurationSeconds = Number.isFinite(seconds) && seconds >= 0 ? seconds : 0;
  }

  setCatalogSize(input: { withSku: number; withoutSku: number }): void {
    this.catalogSize.set('with_sku', input.withSku);
    this.catalogSize.set('without_sku', input.withoutSku);
  }

  incrementLookup(input: { kind: 'variant' | 'product' | 'variants'; outcome: LookupOutcome }): void {
    const key = `${sanitizeLabelValue(input.kind)}|${sanitizeLabelValue(input.outcome)}`;
    this.lookups.set(key, (this.lookups.get(key) ?? 0) + 1);
  }

  incrementPersistenceFailure(operation: 'save' | 'load'): void {
    const key = sanitizeLabelValue(operation);
    this.persistenceFailures.set(key, (this.persistenceFailures.get(key) ?? 0) + 1);
  }

  renderPrometheus(): string {
    const lines: string[] = [];

    lines.push(`# HELP ${CATALOG_METRIC_REFRESH_CYCLES_TOTAL} Total catalog refresh cycles by outcome.`);
    lines.push(`# TYPE ${CATALOG_METRIC_REFRESH_CYCLES_TOTAL} counter`);
    for (const [outcome, value] of this.refreshCycles.entries()) {
      lines.push(`${CATALOG_METRIC_REFRESH_CYCLES_TOTAL}{outcome="${outcome}"} ${value}`);
    }

    lines.push(`# HELP ${CATALOG_METRIC_REFRESH_DURATION_SECONDS} Duration of the last refresh cycle in seconds.`);
    lines.push(`# TYPE ${CATALOG_METRIC_REFRESH_DURATION_SECONDS} gauge`);
    if (this.lastRefreshDurationSeconds !== null) {
      lines.push(`${CATALOG_METRIC_REFRESH_DURATION_SECONDS} ${this.lastRefreshDurationSeconds}`);
    }

    lines.push(`# HELP ${CATALOG_METRIC_PRODUCTS} Products in the published catalog.`);
    lines.push(`# TYPE ${CATALOG_METRIC_PRODUCTS} gauge`);
    for (const [group, value] of this.catalogSize.entries()) {
      lines.push(`${CATALOG_METRIC_PRODUCTS}{group="${group}"} ${value}`);
    }

    lines.push(`# HELP ${CATALOG_METRIC_LOOKUPS_TOTAL} Total catalog lookups by kind and outcome.`);
    lines.push(`# TYPE ${CATALOG_METRIC_LOOKUPS_TOTAL} counter`);
    for (const [key, value] of this.lookups.entries()) {
      const [kind, outcome] = key.split('|');
      lines.push(`${CATALOG_METRIC_LOOKUPS_TOTAL}{kind="${kind}",outcome="${outcome}"} ${value}`);
    }

    lines.push(
      `# HELP ${CATALOG_METRIC_PERSISTENCE_FAILURES_TOTAL} Snapshot file operations that failed and were skipped.`,
    );
    lines.push(`# TYPE ${CATALOG_METRIC_PERSISTENCE_FAILURES_TOTAL} counter`);
    for (const [operation, value] of this.persistenceFailures.entries()) {
      lines.push(`${CATALOG_METRIC_PERSISTENCE_FAILURES_TOTAL}{operation="${operation}"} ${value}`);
    }

    return `${lines.join('\n')}\n`;
  }
}

function sanitizeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}
