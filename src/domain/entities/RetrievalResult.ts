import type { PageRange } from './Chunk.js';

export interface ChildMatch {
  childId: string;
  parentId: string;
  /** child 涵蓋的頁碼範圍 */
  pageRange: PageRange;
  score: number;
  ocrProcessed: boolean;
}

/** 引用資訊：讓答案可追溯回原文頁面 */
export interface Citation {
  parentId: string;
  pageRange: PageRange;
  /** 命中 child 所在的頁碼（去重、遞增） */
  matchedPages: number[];
  /** 任一命中 child 來自 OCR 頁面 */
  ocrProcessed: boolean;
  score: number;
  childIds: string[];
}

export interface ContextPiece {
  parentId: string;
  text: string;
  tokens: number;
  citation: Citation;
}

export type RetrievalStatus = 'ok' | 'no_relevant_content' | 'context_budget_exceeded';

export interface RetrievalResult {
  query: string;
  collectionName: string;
  status: RetrievalStatus;
  /** 通過 minScore 的 child 命中，依分數遞減 */
  matches: ChildMatch[];
  /** 實際交給答案生成的 parent，依最佳分數遞減 */
  contexts: ContextPiece[];
  /** 因超出 budget 而整段排除的 parent */
  excludedParentIds: string[];
  usedTokens: number;
  contextBudget: number;
}
