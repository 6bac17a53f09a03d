export type { CatalogMetadata, CatalogSnapshot, CatalogSnapshotBuildReport } from './types';
export { buildCatalogSnapshot, isSnapshotFresh } from './build';
