import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DatabaseManager } from '../../src/infrastructure/sqlite/DatabaseManager.js';
import { SqliteCollectionStore, vecTableName } from '../../src/infrastructure/sqlite/SqliteCollectionStore.js';
import { CollectionHealthUseCase } from '../../src/application/CollectionHealthUseCase.js';
import { CollectionNotFoundError } from '../../src/domain/errors/DomainErrors.js';
import { CollectionLock } from '../../src/shared/CollectionLock.js';
import { makeParent } from '../helpers/InMemoryCollectionStore.js';

/**
 * Feature: collection 一致性檢查
 *
 * 作為維運人員，我需要找出沒有 parent 的 child 紀錄與沒有紀錄的向量，
 * 並可選擇修復。
 */
describe('CollectionHealthUseCase', () => {
  let dbMgr: DatabaseManager;
  let store: SqliteCollectionStore;
  let health: CollectionHealthUseCase;

  beforeEach(() => {
    dbMgr = new DatabaseManager(':memory:');
    store = new SqliteCollectionStore(dbMgr.getDb());
    health = new CollectionHealthUseCase(store, new CollectionLock());

    store.createCollection('docs', 2);
    store.putParents('docs', [makeParent('d-p0001', 0, 'Parent one.')]);
    store.upsertRecords('docs', [
      {
        id: 'd-p0001-c001',
        vector: new Float32Array([1, 0]),
        payload: { chunk_type: 'child', parent_id: 'd-p0001', page: 1, page_end: 1, ocr_processed: false, language: 'en', text: 'Parent one.' },
      },
    ]);
  });

  afterEach(() => {
    dbMgr.close();
  });

  function corrupt(): void {
    store.upsertRecords('docs', [
      {
        id: 'd-p0009-c001',
        vector: new Float32Array([0, 1]),
        payload: { chunk_type: 'child', parent_id: 'd-p0009', page: 9, page_end: 9, ocr_processed: false, language: 'en', text: 'lost' },
      },
    ]);
    dbMgr.getDb().exec(`INSERT INTO ${vecTableName('docs')}(rowid, embedding) VALUES (500, '[1.0, 1.0]')`);
  }

  it('should report a consistent collection as healthy', async () => {
    const result = await health.check('docs');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({
      collectionName: 'docs',
      healthy: true,
      generation: 1,
      counts: { parents: 1, records: 1, vectors: 1 },
      orphanRecordIds: [],
      danglingVectorRowIds: [],
      fixActions: [],
    });
  });

  /**
   * Scenario: 偵測但不修復
   * Given 一筆 orphan child 與一個孤立向量
   * When 不帶 fix 檢查
   * Then 回報問題但資料保持不變
   */
  it('should detect orphans and dangling vectors without changing anything', async () => {
    corrupt();

    const result = await health.check('docs');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.healthy).toBe(false);
    expect(result.value.orphanRecordIds).toEqual(['d-p0009-c001']);
    expect(result.value.danglingVectorRowIds).toEqual([500]);
    expect(result.value.fixActions).toEqual([]);
    expect(store.counts('docs')).toEqual({ parents: 1, records: 2, vectors: 3 });
  });

  it('should delete orphans and dangling vectors in fix mode', async () => {
    corrupt();

    const result = await health.check('docs', { fix: true });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.fixActions).toEqual([
      'Deleted 1 orphan child records',
      'Deleted 1 dangling vectors',
    ]);
    expect(result.value.counts).toEqual({ parents: 1, records: 1, vectors: 1 });

    const again = await health.check('docs');
    expect(again.ok && again.value.healthy).toBe(true);
  });

  it('should fail for an unknown collection', async () => {
    const result = await health.check('nope');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(CollectionNotFoundError);
  });
});
