import type { ChildChunk, ParentChunk } from '../domain/entities/Chunk.js';
import type { ScoredRecord, VectorRecord } from '../domain/entities/VectorRecord.js';
import { toPayload } from '../domain/entities/VectorRecord.js';
import type { SessionContext } from '../domain/entities/SessionContext.js';
import type { EmbeddingPort } from '../domain/ports/EmbeddingPort.js';
import type {
  CollectionCounts,
  CollectionInfo,
  CollectionStorePort,
} from '../domain/ports/CollectionStorePort.js';
import {
  CollectionNotFoundError,
  IndexUnavailableError,
  OrphanChildError,
} from '../domain/errors/DomainErrors.js';
import type { EmbeddingBatcher } from '../infrastructure/embedding/EmbeddingBatcher.js';
import { CollectionLock } from '../shared/CollectionLock.js';
import { Logger, errorMessage } from '../shared/Logger.js';

export interface UpsertOptions {
  /** children 所屬的全部 parent；每個 child 的 parentId 都必須在其中 */
  parents: ParentChunk[];
  session?: SessionContext;
}

export interface UpsertStats {
  collectionName: string;
  generation: number;
  parentsWritten: number;
  recordsWritten: number;
  embeddingTokens: number;
}

/** snapshot 期間的唯讀視圖；同一把 shared lock 內完成查詢與 parent 解析 */
export interface CollectionView {
  readonly info: CollectionInfo;
  search(vector: Float32Array, k: number): ScoredRecord[];
  parents(parentIds: string[]): Map<string, ParentChunk>;
}

export interface CollectionDescription {
  info: CollectionInfo;
  counts: CollectionCounts;
}

/** 呼叫端可直接處理的錯誤原樣傳出，其餘一律視為索引暫時不可用 */
function toIndexError(err: unknown, collectionName: string): Error {
  if (
    err instanceof CollectionNotFoundError
    || err instanceof OrphanChildError
    || err instanceof IndexUnavailableError
  ) {
    return err;
  }
  return new IndexUnavailableError(
    `Index "${collectionName}" unavailable: ${errorMessage(err)}`,
    collectionName,
    { cause: err },
  );
}

/**
 * 具名 collection 的 child 向量索引
 *
 * - 重建：先在鎖外完成全部 embedding，再於 exclusive lock + 單一交易內
 *   刪除舊 collection、重建並寫入；任何失敗都保留前一代資料
 * - 查詢：shared lock，多個查詢可並行，但不會與重建交錯
 */
export class VectorIndex {
  private readonly logger = new Logger('VectorIndex');

  constructor(
    private readonly store: CollectionStorePort,
    private readonly embedding: EmbeddingPort,
    private readonly batcher: EmbeddingBatcher,
    private readonly lock: CollectionLock = new CollectionLock(),
  ) {}

  get embeddingModel(): string {
    return this.embedding.modelId;
  }

  async upsert(
    children: ChildChunk[],
    collectionName: string,
    options: UpsertOptions,
  ): Promise<UpsertStats> {
    const parentIds = new Set(options.parents.map((p) => p.id));
    for (const child of children) {
      if (!parentIds.has(child.parentId)) {
        throw new OrphanChildError(child.id, child.parentId);
      }
    }

    let records: VectorRecord[];
    let embeddingTokens = 0;
    try {
      const embeddings = await this.batcher.embedBatch(children.map((c) => c.text));
      records = children.map((child, i) => {
        embeddingTokens += embeddings[i].tokensUsed;
        return { id: child.id, vector: embeddings[i].vector, payload: toPayload(child) };
      });
    } catch (err) {
      throw toIndexError(err, collectionName);
    }

    return this.lock.runExclusive(collectionName, () => {
      try {
        const stats = this.store.transaction(() => {
          this.store.deleteCollection(collectionName);
          const info = this.store.createCollection(collectionName, this.embedding.dimension);
          this.store.putParents(collectionName, options.parents);
          this.store.upsertRecords(collectionName, records);
          if (options.session) this.store.saveSession(collectionName, options.session);

          return {
            collectionName,
            generation: info.generation,
            parentsWritten: options.parents.length,
            recordsWritten: records.length,
            embeddingTokens,
          };
        });

        this.logger.info('Collection rebuilt', { ...stats });
        return stats;
      } catch (err) {
        throw toIndexError(err, collectionName);
      }
    });
  }

  /** 查詢文字的 embedding；失敗時為 IndexUnavailableError */
  async embedQuery(text: string, collectionName: string): Promise<Float32Array> {
    try {
      const { vector } = await this.embedding.embedOne(text);
      return vector;
    } catch (err) {
      throw toIndexError(err, collectionName);
    }
  }

  async query(text: string, collectionName: string, k: number): Promise<ScoredRecord[]> {
    const vector = await this.embedQuery(text, collectionName);
    return this.snapshot(collectionName, (view) => view.search(vector, k));
  }

  /** 在 shared lock 下執行 fn；collection 不存在時丟出 CollectionNotFoundError */
  snapshot<T>(collectionName: string, fn: (view: CollectionView) => T | Promise<T>): Promise<T> {
    return this.lock.runShared(collectionName, async () => {
      let info: CollectionInfo | undefined;
      try {
        info = this.store.getCollection(collectionName);
      } catch (err) {
        throw toIndexError(err, collectionName);
      }
      if (!info) throw new CollectionNotFoundError(collectionName);

      const view: CollectionView = {
        info,
        search: (vector, k) => this.store.search(collectionName, vector, k),
        parents: (ids) => this.store.getParents(collectionName, ids),
      };

      try {
        return await fn(view);
      } catch (err) {
        throw toIndexError(err, collectionName);
      }
    });
  }

  async dropCollection(collectionName: string): Promise<boolean> {
    return this.lock.runExclusive(collectionName, () => {
      try {
        return this.store.deleteCollection(collectionName);
      } catch (err) {
        throw toIndexError(err, collectionName);
      }
    });
  }

  listCollections(): CollectionInfo[] {
    try {
      return this.store.listCollections();
    } catch (err) {
      throw toIndexError(err, '*');
    }
  }

  /** collection 的 metadata 與筆數；不存在時回傳 undefined */
  async describe(collectionName: string): Promise<CollectionDescription | undefined> {
    return this.lock.runShared(collectionName, () => {
      try {
        const info = this.store.getCollection(collectionName);
        if (!info) return undefined;
        return { info, counts: this.store.counts(collectionName) };
      } catch (err) {
        throw toIndexError(err, collectionName);
      }
    });
  }
}
