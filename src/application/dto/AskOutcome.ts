import type { Citation, RetrievalResult } from '../../domain/entities/RetrievalResult.js';

export type AskStatus =
  | 'answered'
  | 'degraded'
  | 'no_relevant_content'
  | 'context_budget_exceeded';

export interface AskRequest {
  question: string;
  collectionName: string;
  topK?: number;
  contextBudget?: number;
}

export interface AskOutcome {
  status: AskStatus;
  /** answered / degraded 時有值 */
  answer: string | null;
  citations: Citation[];
  retrieval: RetrievalResult;
  /** 降級原因（錯誤代碼與訊息） */
  degradation?: { code: string; message: string };
}
