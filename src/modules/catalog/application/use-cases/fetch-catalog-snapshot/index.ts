export {
  FetchCatalogSnapshotUseCase,
  type FetchCatalogSnapshotResult,
} from './fetch-catalog-snapshot.use-case';
