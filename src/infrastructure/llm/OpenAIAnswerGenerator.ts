import OpenAI from 'openai';
import { z } from 'zod';
import type {
  AnswerGeneratorPort,
  AnswerRequest,
  GeneratedAnswer,
} from '../../domain/ports/AnswerGeneratorPort.js';
import { AnswerGenerationFailedError } from '../../domain/errors/DomainErrors.js';
import { UNKNOWN_LANGUAGE } from '../../domain/entities/Document.js';
import { Logger, errorMessage } from '../../shared/Logger.js';

/**
 * OpenAI-compatible 答案生成
 *
 * 設計意圖：以編號的 parent context 組 prompt，要求模型以 JSON 回傳
 * 答案與引用的編號，讓 AskUseCase 能把引用對回頁碼。
 * 支援任何 OpenAI-compatible endpoint（OpenAI、Ollama、vLLM、LiteLLM 等）。
 */

export interface OpenAIAnswerConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  temperature?: number;
}

const answerSchema = z.object({
  answer: z.string(),
  references: z.array(z.number().int()).default([]),
});

const SYSTEM_PROMPT = `You answer questions about a document using ONLY the numbered context passages provided.
Return a JSON object: {"answer": string, "references": number[]}.
"references" lists the passage numbers the answer relies on.
If the passages do not contain the answer, say so in "answer" and return an empty "references" array.
Do not invent facts that are not in the passages.`;

export class OpenAIAnswerGenerator implements AnswerGeneratorPort {
  readonly providerId = 'openai-compatible';
  private readonly client: OpenAI;
  private readonly logger = new Logger('OpenAIAnswerGenerator');

  constructor(private readonly config: OpenAIAnswerConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey || 'not-needed',
      baseURL: config.baseUrl,
      maxRetries: 1,
    });
  }

  async generate(request: AnswerRequest, signal: AbortSignal): Promise<GeneratedAnswer> {
    const passages = request.contexts
      .map((c) => {
        const { start, end } = c.citation.pageRange;
        const pages = start === end ? `page ${start}` : `pages ${start}-${end}`;
        return `[${c.index}] (${pages})\n${c.text}`;
      })
      .join('\n\n');

    const languageLine = request.language === UNKNOWN_LANGUAGE
      ? 'Answer in the language of the question.'
      : `The document language is "${request.language}". Answer in the language of the question.`;

    let content: string;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.config.model,
          temperature: this.config.temperature ?? 0.2,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: `${SYSTEM_PROMPT}\n${languageLine}` },
            { role: 'user', content: `Context passages:\n\n${passages}\n\nQuestion: ${request.query}` },
          ],
        },
        { signal },
      );
      content = response.choices[0]?.message?.content?.trim() ?? '';
    } catch (err) {
      if (signal.aborted) throw err;
      this.logger.warn('Answer generation failed', { error: errorMessage(err) });
      throw new AnswerGenerationFailedError(`Answer generation failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!content) {
      throw new AnswerGenerationFailedError('Model returned an empty answer');
    }

    const validIndexes = new Set(request.contexts.map((c) => c.index));
    const parsed = parseAnswer(content);
    return {
      answer: parsed.answer,
      referencedIndexes: [...new Set(parsed.references)].filter((i) => validIndexes.has(i)),
    };
  }
}

/** 解析模型回應；非 JSON 時整段視為答案，不帶引用 */
export function parseAnswer(content: string): z.infer<typeof answerSchema> {
  const candidates = [content];

  // markdown code block
  const fenced = content.match(/```(?:json)?\s*\n?([\s\S]*?)```/);
  if (fenced) candidates.push(fenced[1].trim());

  // 第一個 { 到最後一個 }
  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  if (start !== -1 && end > start) candidates.push(content.slice(start, end + 1));

  for (const candidate of candidates) {
    const parsed = answerSchema.safeParse(tryParseJson(candidate));
    if (parsed.success) return parsed.data;
  }
  return { answer: content, references: [] };
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
