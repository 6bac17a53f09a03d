import type { LookupOutcome } from '../../domain/lookup';

export type RefreshCycleOutcome = 'succeeded' | 'empty' | 'failed';

export interface MetricsPort {
  incrementRefreshCycle(outcome: RefreshCycleOutcome): void;

  observeRefreshDuration(seconds: number): void;

  setCatalogSize(input: { withSku: number; withoutSku: number }): void;

  incrementLookup(input: { kind: 'variant' | 'product' | 'variants'; outcome: LookupOutcome }): void;

  incrementPersistenceFailure(operation: 'save' | 'load'): void;
}
