import type {
  AnswerGeneratorPort,
  AnswerRequest,
  GeneratedAnswer,
} from '../../domain/ports/AnswerGeneratorPort.js';
import { AnswerGenerationFailedError } from '../../domain/errors/DomainErrors.js';

/**
 * 空答案生成實作
 *
 * 設計意圖：answer.provider 為 'none' 時使用。AskUseCase 收到錯誤後
 * 降級為只回傳檢索到的 context 與引用。
 */
export class NullAnswerGenerator implements AnswerGeneratorPort {
  readonly providerId = 'none';

  async generate(_request: AnswerRequest, _signal: AbortSignal): Promise<GeneratedAnswer> {
    throw new AnswerGenerationFailedError('Answer generation is disabled (answer.provider = "none")');
  }
}
