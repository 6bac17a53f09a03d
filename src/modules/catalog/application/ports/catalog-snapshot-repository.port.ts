import type { CatalogSnapshot } from '../../domain/catalog-snapshot';

export interface CatalogSnapshotRepositoryPort {
  /** Best effort: failures are logged by the implementation, never rejected. */
  save(snapshot: CatalogSnapshot): Promise<void>;

  /** Resolves to null when nothing usable is stored. */
  load(): Promise<CatalogSnapshot | null>;
}
