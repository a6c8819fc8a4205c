import type { ParentChunk } from '../entities/Chunk.js';
import type { ScoredRecord, VectorRecord } from '../entities/VectorRecord.js';
import type { SessionContext } from '../entities/SessionContext.js';

export interface CollectionInfo {
  name: string;
  dimension: number;
  /** 每次重建遞增 */
  generation: number;
  createdAt: number;
  session?: SessionContext;
}

export interface CollectionCounts {
  parents: number;
  records: number;
  vectors: number;
}

/**
 * 具名 collection 的向量儲存
 *
 * 同步介面（better-sqlite3 為同步 API）；transaction 內的操作全有或全無。
 */
export interface CollectionStorePort {
  // Collection 操作
  createCollection(name: string, dimension: number): CollectionInfo;
  deleteCollection(name: string): boolean;
  getCollection(name: string): CollectionInfo | undefined;
  listCollections(): CollectionInfo[];
  saveSession(name: string, session: SessionContext): void;

  // 向量紀錄
  upsertRecords(name: string, records: VectorRecord[]): void;
  search(name: string, queryVec: Float32Array, topK: number): ScoredRecord[];

  // Parent chunk
  putParents(name: string, parents: ParentChunk[]): void;
  getParents(name: string, parentIds: string[]): Map<string, ParentChunk>;

  // 一致性
  counts(name: string): CollectionCounts;
  findOrphanRecordIds(name: string): string[];
  findDanglingVectorRowIds(name: string): number[];
  deleteRecords(name: string, recordIds: string[]): void;
  deleteVectorRows(name: string, rowIds: number[]): void;

  // 交易控制
  transaction<T>(fn: () => T): T;
}
