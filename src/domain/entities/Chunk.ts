/** 頁碼範圍（1-based，含兩端） */
export interface PageRange {
  start: number;
  end: number;
}

/** 某一頁內容在 parent 文字中的位置 [start, end) */
export interface PageSpan {
  page: number;
  start: number;
  end: number;
}

export interface ParentChunk {
  kind: 'parent';
  id: string;
  index: number;
  text: string;
  pageRange: PageRange;
  pageSpans: PageSpan[];
  language: string;
  /** 任一涵蓋頁面經過 OCR */
  ocrProcessed: boolean;
  childIds: string[];
}

export interface ChildChunk {
  kind: 'child';
  id: string;
  parentId: string;
  /** 在 parent 內的序號 */
  index: number;
  /** 在 parent 文字中的 [start, end) */
  start: number;
  end: number;
  text: string;
  /** 起始頁碼（payload 的 page 欄位） */
  page: number;
  pageRange: PageRange;
  language: string;
  ocrProcessed: boolean;
}

/** 1 token ≈ 4 chars，chunk 尺寸與 context budget 共用此估算 */
export const CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}
