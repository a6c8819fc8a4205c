import type { Citation } from '../entities/RetrievalResult.js';

/**
 * 答案生成抽象介面
 *
 * 設計意圖：將 LLM 作答抽象為 Port，AskUseCase 不依賴具體的 LLM 實作。
 * 支援 NullAnswerGenerator（未設定 LLM）與 OpenAIAnswerGenerator（遠端 API）。
 */

export interface AnswerContext {
  /** 1-based，與 prompt 中的 [n] 標號一致 */
  index: number;
  text: string;
  citation: Citation;
}

export interface AnswerRequest {
  query: string;
  contexts: AnswerContext[];
  language: string;
}

export interface GeneratedAnswer {
  answer: string;
  /** 模型實際引用的 context index */
  referencedIndexes: number[];
}

export interface AnswerGeneratorPort {
  readonly providerId: string;
  /** signal abort 時應儘速 reject */
  generate(request: AnswerRequest, signal: AbortSignal): Promise<GeneratedAnswer>;
}
