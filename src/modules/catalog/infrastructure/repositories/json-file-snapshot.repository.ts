import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { Inject, Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createLogger } from '@/common/utils/logger';
import type { CatalogSnapshotRepositoryPort } from '../../application/ports/catalog-snapshot-repository.port';
import type { MetricsPort } from '../../application/ports/metrics.port';
import { METRICS_PORT } from '../../application/ports/tokens';
import type { CatalogSnapshot } from '../../domain/catalog-snapshot';
import { decodeSnapshot, encodeSnapshot } from './snapshot-file.codec';

/**
 * Stores the catalog as one JSON file. Writes go to a temporary sibling and
 * are renamed into place, so readers never see a half-written file.
 */
@Injectable()
export class JsonFileSnapshotRepository implements CatalogSnapshotRepositoryPort {
  private readonly logger = createLogger(JsonFileSnapshotRepository.name);
  private readonly filePath: string;
  private readonly enabled: boolean;

  constructor(
    private readonly configService: ConfigService,
    @Optional()
    @Inject(METRICS_PORT)
    private readonly metricsPort?: MetricsPort,
  ) {
    const configuredPath = this.configService.get<string>('CATALOG_SNAPSHOT_PATH') ?? 'products_cache.json';
    this.filePath = resolve(process.cwd(), configuredPath);
    this.enabled = this.configService.get<boolean>('CATALOG_PERSISTENCE_ENABLED') ?? true;
  }

  async save(snapshot: CatalogSnapshot): Promise<void> {
    if (!this.enabled) {
      return;
    }

    const tempPath = `${this.filePath}.${randomUUID()}.tmp`;

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(encodeSnapshot(snapshot), null, 2), 'utf8');
      await rename(tempPath, this.filePath);

      this.logger.catalog('catalog_snapshot_saved', {
        event: 'catalog_snapshot_saved',
        path: this.filePath,
        products_with_sku: snapshot.metadata.productsWithSku,
        products_without_sku: snapshot.productsWithoutSku.length,
      });
    } catch (error: unknown) {
      this.metricsPort?.incrementPersistenceFailure('save');
      this.logger.error('catalog_snapshot_save_failed', error instanceof Error ? error : undefined, {
        event: 'catalog_snapshot_save_failed',
        path: this.filePath,
      });
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn('catalog_snapshot_temp_cleanup_failed', {
          event: 'catalog_snapshot_temp_cleanup_failed',
          path: tempPath,
          error_message: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
        });
      });
    }
  }

  async load(): Promise<CatalogSnapshot | null> {
    if (!this.enabled) {
      return null;
    }

    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        this.logger.info('catalog_snapshot_absent', {
          event: 'catalog_snapshot_absent',
          path: this.filePath,
        });
        return null;
      }

      this.metricsPort?.incrementPersistenceFailure('load');
      this.logger.error('catalog_snapshot_read_failed', error instanceof Error ? error : undefined, {
        event: 'catalog_snapshot_read_failed',
        path: this.filePath,
      });
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw) as unknown;
    } catch {
      return this.rejectFile('invalid_json');
    }

    const decoded = decodeSnapshot(parsed);
    if (!decoded.ok) {
      return this.rejectFile(decoded.reason);
    }

    this.logger.catalog('catalog_snapshot_loaded', {
      event: 'catalog_snapshot_loaded',
      path: this.filePath,
      format: decoded.format,
      total_products: decoded.snapshot.metadata.totalProducts,
      last_update: decoded.snapshot.metadata.lastUpdate.toISOString(),
    });

    return decoded.snapshot;
  }

  private rejectFile(reason: string): null {
    this.metricsPort?.incrementPersistenceFailure('load');
    this.logger.warn('catalog_snapshot_corrupt', {
      event: 'catalog_snapshot_corrupt',
      path: this.filePath,
      reason,
    });
    return null;
  }
}

function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
