import type { SessionContext } from '../../domain/entities/SessionContext.js';

/** 文件匯入統計 */
export interface IngestStats {
  session: SessionContext;
  pageCount: number;
  parentsCreated: number;
  childrenCreated: number;
  generation: number;
  embeddingTokens: number;
  /** 缺頁等可繼續處理的問題 */
  warnings: string[];
  durationMs: number;
}
