/**
 * 每個 session 的明確狀態
 * 由 IngestUseCase 建立並與 collection 一起保存，之後的 ask / retrieve 呼叫再讀回。
 */
export interface SessionContext {
  collectionName: string;
  documentId: string;
  sourceName: string;
  language: string;
  languageConfidence: number;
  parentCount: number;
  childCount: number;
  ocrPages: number[];
  gapPages: number[];
  embeddingModel: string;
  ingestedAt: number;
}
