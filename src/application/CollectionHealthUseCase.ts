import type { CollectionStorePort, CollectionCounts } from '../domain/ports/CollectionStorePort.js';
import { CollectionNotFoundError } from '../domain/errors/DomainErrors.js';
import type { CollectionLock } from '../shared/CollectionLock.js';
import type { Result } from '../shared/Result.js';
import { fail, ok } from '../shared/Result.js';

export interface HealthCheckOptions {
  fix?: boolean;
}

export interface HealthReport {
  collectionName: string;
  healthy: boolean;
  generation: number;
  counts: CollectionCounts;
  /** parent_id 找不到對應 parent 的 child 紀錄 */
  orphanRecordIds: string[];
  /** vec0 中沒有 payload 紀錄的 rowid */
  danglingVectorRowIds: number[];
  fixActions: string[];
}

/**
 * 健康檢查用例：驗證 collection 一致性，可選修復模式
 *
 * 檢查項目：
 * 1. orphan children：紀錄的 parent_id 不在 parent 表中
 * 2. 向量漂移：vec0 rowid 沒有對應紀錄
 *
 * 修復項目（fix=true）：刪除上述兩類資料。
 * 修復持有 exclusive lock，純檢查持有 shared lock。
 */
export class CollectionHealthUseCase {
  constructor(
    private readonly store: CollectionStorePort,
    private readonly lock: CollectionLock,
  ) {}

  async check(
    collectionName: string,
    options: HealthCheckOptions = {},
  ): Promise<Result<HealthReport, CollectionNotFoundError>> {
    const run = options.fix ? this.lock.runExclusive.bind(this.lock) : this.lock.runShared.bind(this.lock);

    return run(collectionName, (): Result<HealthReport, CollectionNotFoundError> => {
      const info = this.store.getCollection(collectionName);
      if (!info) return fail(new CollectionNotFoundError(collectionName));

      const fixActions: string[] = [];
      const orphanRecordIds = this.store.findOrphanRecordIds(collectionName);
      const danglingVectorRowIds = this.store.findDanglingVectorRowIds(collectionName);

      if (options.fix) {
        this.store.transaction(() => {
          if (orphanRecordIds.length > 0) {
            this.store.deleteRecords(collectionName, orphanRecordIds);
            fixActions.push(`Deleted ${orphanRecordIds.length} orphan child records`);
          }
          if (danglingVectorRowIds.length > 0) {
            this.store.deleteVectorRows(collectionName, danglingVectorRowIds);
            fixActions.push(`Deleted ${danglingVectorRowIds.length} dangling vectors`);
          }
        });
      }

      return ok({
        collectionName,
        healthy: orphanRecordIds.length === 0 && danglingVectorRowIds.length === 0,
        generation: info.generation,
        counts: this.store.counts(collectionName),
        orphanRecordIds,
        danglingVectorRowIds,
        fixActions,
      });
    });
  }
}
