import type { ChildChunk } from './Chunk.js';

/**
 * 向量紀錄 payload
 * 欄位名稱固定（snake_case）；page_end 之外的欄位與既有 collection 格式一致
 */
export interface VectorPayload {
  chunk_type: 'child';
  parent_id: string;
  page: number;
  /** 最後頁碼；跨頁的 child 以 [page, page_end] 引用 */
  page_end: number;
  ocr_processed: boolean;
  language: string;
  text: string;
}

export interface VectorRecord {
  /** = child chunk id */
  id: string;
  vector: Float32Array;
  payload: VectorPayload;
}

export interface ScoredRecord {
  id: string;
  /** cosine similarity，越大越相近 */
  score: number;
  payload: VectorPayload;
}

export function toPayload(child: ChildChunk): VectorPayload {
  return {
    chunk_type: 'child',
    parent_id: child.parentId,
    page: child.page,
    page_end: child.pageRange.end,
    ocr_processed: child.ocrProcessed,
    language: child.language,
    text: child.text,
  };
}
