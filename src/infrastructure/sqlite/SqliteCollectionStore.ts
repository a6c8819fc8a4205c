import { createHash } from 'node:crypto';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { ParentChunk } from '../../domain/entities/Chunk.js';
import type { ScoredRecord, VectorRecord } from '../../domain/entities/VectorRecord.js';
import type { SessionContext } from '../../domain/entities/SessionContext.js';
import type {
  CollectionCounts,
  CollectionInfo,
  CollectionStorePort,
} from '../../domain/ports/CollectionStorePort.js';
import { CollectionNotFoundError } from '../../domain/errors/DomainErrors.js';
import { vecTableSQL } from './schema.js';

const payloadSchema = z.object({
  chunk_type: z.literal('child'),
  parent_id: z.string(),
  page: z.number(),
  page_end: z.number(),
  ocr_processed: z.boolean(),
  language: z.string(),
  text: z.string(),
});

const pageSpansSchema = z.array(z.object({
  page: z.number(),
  start: z.number(),
  end: z.number(),
}));

const childIdsSchema = z.array(z.string());

const sessionSchema = z.object({
  collectionName: z.string(),
  documentId: z.string(),
  sourceName: z.string(),
  language: z.string(),
  languageConfidence: z.number(),
  parentCount: z.number(),
  childCount: z.number(),
  ocrPages: z.array(z.number()),
  gapPages: z.array(z.number()),
  embeddingModel: z.string(),
  ingestedAt: z.number(),
});

interface CollectionRow {
  name: string;
  vec_table: string;
  dimension: number;
  generation: number;
  created_at: number;
  session_json: string | null;
}

interface ParentRow {
  parent_id: string;
  chunk_index: number;
  text: string;
  page_start: number;
  page_end: number;
  page_spans_json: string;
  language: string;
  ocr_processed: number;
  child_ids_json: string;
}

interface RecordRow {
  record_rowid: number;
  record_id: string;
  payload_json: string;
}

/** 將向量正規化為單位長度，使 L2 距離可換算為 cosine */
function normalize(vec: Float32Array): Float32Array {
  let norm = 0;
  for (const v of vec) norm += v * v;
  norm = Math.sqrt(norm);
  if (norm === 0) return vec;
  return vec.map((v) => v / norm);
}

function toBlob(vec: Float32Array): Buffer {
  return Buffer.from(vec.buffer, vec.byteOffset, vec.byteLength);
}

/**
 * better-sqlite3 + sqlite-vec 的 collection 儲存
 *
 * 每個 collection 一張 vec0 表（rowid = vector_records.record_rowid），
 * parent chunk 與 payload 存在一般表格，刪除 collection 時一併清除。
 * 相似度回傳 cosine：向量寫入與查詢前皆正規化，cosine = 1 - d² / 2。
 *
 * 注意：sqlite-vec v0.1.x 的 PK 型別檢查要求 SQLite INTEGER，
 * better-sqlite3 的 JS number 會被綁為 REAL，需用 BigInt 才會綁為 INTEGER。
 */
export class SqliteCollectionStore implements CollectionStorePort {
  constructor(private readonly db: Database.Database) {}

  createCollection(name: string, dimension: number): CollectionInfo {
    const generation = this.nextGeneration(name);
    const vecTable = vecTableName(name);
    const createdAt = Date.now();

    this.db.exec(vecTableSQL(vecTable, dimension));
    this.db.prepare(`
      INSERT INTO collections(name, vec_table, dimension, generation, created_at)
      VALUES(?, ?, ?, ?, ?)
    `).run(name, vecTable, dimension, generation, createdAt);

    return { name, dimension, generation, createdAt };
  }

  deleteCollection(name: string): boolean {
    const row = this.findRow(name);
    if (!row) return false;

    this.db.exec(`DROP TABLE IF EXISTS ${row.vec_table}`);
    this.db.prepare('DELETE FROM collections WHERE name = ?').run(name);
    return true;
  }

  getCollection(name: string): CollectionInfo | undefined {
    const row = this.findRow(name);
    return row ? toInfo(row) : undefined;
  }

  listCollections(): CollectionInfo[] {
    return this.db.prepare<[], CollectionRow>(
      'SELECT * FROM collections ORDER BY name',
    ).all().map(toInfo);
  }

  saveSession(name: string, session: SessionContext): void {
    this.requireRow(name);
    this.db.prepare('UPDATE collections SET session_json = ? WHERE name = ?')
      .run(JSON.stringify(session), name);
  }

  upsertRecords(name: string, records: VectorRecord[]): void {
    const { vec_table: vecTable } = this.requireRow(name);

    const findExisting = this.db.prepare<[string, string], { record_rowid: number }>(
      'SELECT record_rowid FROM vector_records WHERE collection = ? AND record_id = ?',
    );
    const deleteRecord = this.db.prepare('DELETE FROM vector_records WHERE record_rowid = ?');
    const deleteVec = this.db.prepare(`DELETE FROM ${vecTable} WHERE rowid = ?`);
    const insertRecord = this.db.prepare(`
      INSERT INTO vector_records(collection, record_id, parent_id, payload_json)
      VALUES(?, ?, ?, ?)
    `);
    const insertVec = this.db.prepare(`INSERT INTO ${vecTable}(rowid, embedding) VALUES(?, ?)`);

    for (const record of records) {
      const existing = findExisting.get(name, record.id);
      if (existing) {
        deleteVec.run(BigInt(existing.record_rowid));
        deleteRecord.run(existing.record_rowid);
      }

      const result = insertRecord.run(
        name, record.id, record.payload.parent_id, JSON.stringify(record.payload),
      );
      // BigInt 確保 better-sqlite3 綁定為 SQLite INTEGER
      insertVec.run(BigInt(result.lastInsertRowid), toBlob(normalize(record.vector)));
    }
  }

  search(name: string, queryVec: Float32Array, topK: number): ScoredRecord[] {
    const { vec_table: vecTable } = this.requireRow(name);

    const hits = this.db.prepare<[Buffer, number], { rowid: number | bigint; distance: number }>(`
      SELECT rowid, distance
      FROM ${vecTable}
      WHERE embedding MATCH ?
        AND k = ?
      ORDER BY distance
    `).all(toBlob(normalize(queryVec)), topK);

    if (hits.length === 0) return [];

    const getRecord = this.db.prepare<[number], RecordRow>(
      'SELECT record_rowid, record_id, payload_json FROM vector_records WHERE record_rowid = ?',
    );

    const results: ScoredRecord[] = [];
    for (const hit of hits) {
      const row = getRecord.get(Number(hit.rowid));
      if (!row) continue;
      results.push({
        id: row.record_id,
        score: 1 - (hit.distance * hit.distance) / 2,
        payload: payloadSchema.parse(JSON.parse(row.payload_json)),
      });
    }
    return results;
  }

  putParents(name: string, parents: ParentChunk[]): void {
    this.requireRow(name);
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO parent_chunks(
        collection, parent_id, chunk_index, text, page_start, page_end,
        page_spans_json, language, ocr_processed, child_ids_json
      ) VALUES(?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    for (const p of parents) {
      stmt.run(
        name, p.id, p.index, p.text, p.pageRange.start, p.pageRange.end,
        JSON.stringify(p.pageSpans), p.language, p.ocrProcessed ? 1 : 0,
        JSON.stringify(p.childIds),
      );
    }
  }

  getParents(name: string, parentIds: string[]): Map<string, ParentChunk> {
    const result = new Map<string, ParentChunk>();
    if (parentIds.length === 0) return result;

    const stmt = this.db.prepare<[string, string], ParentRow>(`
      SELECT parent_id, chunk_index, text, page_start, page_end,
             page_spans_json, language, ocr_processed, child_ids_json
      FROM parent_chunks
      WHERE collection = ? AND parent_id = ?
    `);

    for (const id of parentIds) {
      const row = stmt.get(name, id);
      if (row) result.set(id, toParent(row));
    }
    return result;
  }

  counts(name: string): CollectionCounts {
    const { vec_table: vecTable } = this.requireRow(name);
    const count = (sql: string, ...params: string[]): number =>
      this.db.prepare<string[], { cnt: number }>(sql).get(...params)?.cnt ?? 0;

    return {
      parents: count('SELECT COUNT(*) AS cnt FROM parent_chunks WHERE collection = ?', name),
      records: count('SELECT COUNT(*) AS cnt FROM vector_records WHERE collection = ?', name),
      vectors: count(`SELECT COUNT(*) AS cnt FROM ${vecTable}`),
    };
  }

  /** parent_id 在 parent_chunks 找不到的紀錄 */
  findOrphanRecordIds(name: string): string[] {
    this.requireRow(name);
    return this.db.prepare<[string], { record_id: string }>(`
      SELECT r.record_id
      FROM vector_records r
      LEFT JOIN parent_chunks p
        ON p.collection = r.collection AND p.parent_id = r.parent_id
      WHERE r.collection = ? AND p.parent_id IS NULL
      ORDER BY r.record_id
    `).all(name).map((r) => r.record_id);
  }

  /** vec0 中沒有對應 vector_records 的 rowid */
  findDanglingVectorRowIds(name: string): number[] {
    const { vec_table: vecTable } = this.requireRow(name);
    const rowIds = this.db.prepare<[], { rowid: number | bigint }>(
      `SELECT rowid FROM ${vecTable}`,
    ).all().map((r) => Number(r.rowid));

    const exists = this.db.prepare<[number], { record_rowid: number }>(
      'SELECT record_rowid FROM vector_records WHERE record_rowid = ?',
    );
    return rowIds.filter((id) => !exists.get(id)).sort((a, b) => a - b);
  }

  deleteRecords(name: string, recordIds: string[]): void {
    const { vec_table: vecTable } = this.requireRow(name);
    const find = this.db.prepare<[string, string], { record_rowid: number }>(
      'SELECT record_rowid FROM vector_records WHERE collection = ? AND record_id = ?',
    );
    const deleteVec = this.db.prepare(`DELETE FROM ${vecTable} WHERE rowid = ?`);
    const deleteRecord = this.db.prepare('DELETE FROM vector_records WHERE record_rowid = ?');

    for (const id of recordIds) {
      const row = find.get(name, id);
      if (!row) continue;
      deleteVec.run(BigInt(row.record_rowid));
      deleteRecord.run(row.record_rowid);
    }
  }

  deleteVectorRows(name: string, rowIds: number[]): void {
    const { vec_table: vecTable } = this.requireRow(name);
    const stmt = this.db.prepare(`DELETE FROM ${vecTable} WHERE rowid = ?`);
    for (const id of rowIds) {
      stmt.run(BigInt(id));
    }
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ── 內部 ──

  private findRow(name: string): CollectionRow | undefined {
    return this.db.prepare<[string], CollectionRow>(
      'SELECT * FROM collections WHERE name = ?',
    ).get(name);
  }

  private requireRow(name: string): CollectionRow {
    const row = this.findRow(name);
    if (!row) throw new CollectionNotFoundError(name);
    return row;
  }

  /** generation 記在 schema_meta，collection 刪除後重建仍會遞增 */
  private nextGeneration(name: string): number {
    const key = `generation:${name}`;
    const row = this.db.prepare<[string], { value: string }>(
      'SELECT value FROM schema_meta WHERE key = ?',
    ).get(key);
    const next = (row ? parseInt(row.value, 10) : 0) + 1;
    this.db.prepare('INSERT OR REPLACE INTO schema_meta(key, value) VALUES(?, ?)')
      .run(key, String(next));
    return next;
  }
}

/** collection 名稱可含任意字元，vec0 表名取其雜湊 */
export function vecTableName(collectionName: string): string {
  const digest = createHash('sha256').update(collectionName, 'utf-8').digest('hex');
  return `vec_${digest.slice(0, 16)}`;
}

function toInfo(row: CollectionRow): CollectionInfo {
  const info: CollectionInfo = {
    name: row.name,
    dimension: row.dimension,
    generation: row.generation,
    createdAt: row.created_at,
  };
  if (row.session_json) {
    info.session = sessionSchema.parse(JSON.parse(row.session_json));
  }
  return info;
}

function toParent(row: ParentRow): ParentChunk {
  return {
    kind: 'parent',
    id: row.parent_id,
    index: row.chunk_index,
    text: row.text,
    pageRange: { start: row.page_start, end: row.page_end },
    pageSpans: pageSpansSchema.parse(JSON.parse(row.page_spans_json)),
    language: row.language,
    ocrProcessed: row.ocr_processed === 1,
    childIds: childIdsSchema.parse(JSON.parse(row.child_ids_json)),
  };
}
