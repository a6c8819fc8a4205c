import type { PageExtractionFailedError } from '../errors/DomainErrors.js';

/** 偵測到的語言；信心不足時 code 為 'unknown' */
export interface DetectedLanguage {
  code: string;
  confidence: number;
}

export const UNKNOWN_LANGUAGE = 'unknown';

interface PageExtractionBase {
  /** 1-based 頁碼 */
  pageNumber: number;
  /** 原生文字層的非空白字元數 */
  density: number;
}

/**
 * 單頁抽取結果（tagged union）
 * - native：文字層直接取得
 * - recognized：文字層密度不足，改由 OCR 辨識
 * - gap：兩階段皆失敗，記錄為缺頁
 */
export type PageExtraction =
  | (PageExtractionBase & { kind: 'native'; text: string })
  | (PageExtractionBase & { kind: 'recognized'; text: string })
  | (PageExtractionBase & { kind: 'gap'; error: PageExtractionFailedError });

export type UsablePage = Extract<PageExtraction, { kind: 'native' | 'recognized' }>;

export interface IngestedDocument {
  /** 依抽取後各頁文字計算的 SHA-256 */
  documentId: string;
  sourceName: string;
  pages: readonly PageExtraction[];
  language: DetectedLanguage;
}

export function isUsablePage(page: PageExtraction): page is UsablePage {
  return page.kind !== 'gap';
}

/** 以 OCR 取得文字的頁碼 */
export function ocrPageNumbers(doc: IngestedDocument): number[] {
  return doc.pages.filter((p) => p.kind === 'recognized').map((p) => p.pageNumber);
}

export function gapPageNumbers(doc: IngestedDocument): number[] {
  return doc.pages.filter((p) => p.kind === 'gap').map((p) => p.pageNumber);
}
