import { describe, it, expect, vi, beforeEach } from 'vitest';
import { OpenAIAnswerGenerator, parseAnswer } from '../../../src/infrastructure/llm/OpenAIAnswerGenerator.js';
import type { AnswerRequest } from '../../../src/domain/ports/AnswerGeneratorPort.js';
import { AnswerGenerationFailedError } from '../../../src/domain/errors/DomainErrors.js';

/**
 * Feature: OpenAI-compatible 答案生成
 *
 * 作為問答用例，我需要把編號的 parent context 交給遠端 LLM，
 * 並取回答案與它引用的段落編號。
 */

const { mockCreate } = vi.hoisted(() => ({ mockCreate: vi.fn() }));

vi.mock('openai', () => ({
  default: class MockOpenAI {
    chat = { completions: { create: mockCreate } };
  },
}));

function request(overrides: Partial<AnswerRequest> = {}): AnswerRequest {
  const citation = (parentId: string, start: number, end: number) => ({
    parentId,
    pageRange: { start, end },
    matchedPages: [start],
    ocrProcessed: false,
    score: 0.8,
    childIds: [],
  });
  return {
    query: 'When was the bridge opened?',
    contexts: [
      { index: 1, text: 'The bridge opened in 1932.', citation: citation('d-p0001', 3, 3) },
      { index: 2, text: 'Repairs lasted two years.', citation: citation('d-p0002', 4, 5) },
    ],
    language: 'en',
    ...overrides,
  };
}

function reply(content: string | null) {
  return { choices: [{ message: { content } }] };
}

describe('OpenAIAnswerGenerator', () => {
  let generator: OpenAIAnswerGenerator;

  beforeEach(() => {
    mockCreate.mockReset();
    generator = new OpenAIAnswerGenerator({ baseUrl: 'http://localhost:11434/v1', model: 'test-model' });
  });

  /**
   * Scenario: 模型回傳 JSON
   * Given 回應為 {"answer", "references"}
   * Then 取出答案與有效的引用編號
   */
  it('should return the answer and referenced passages', async () => {
    mockCreate.mockResolvedValue(reply('{"answer": "In 1932 [1].", "references": [1]}'));

    const result = await generator.generate(request(), new AbortController().signal);

    expect(result).toEqual({ answer: 'In 1932 [1].', referencedIndexes: [1] });
  });

  it('should number the passages and label their pages in the prompt', async () => {
    mockCreate.mockResolvedValue(reply('{"answer": "ok", "references": []}'));
    const signal = new AbortController().signal;

    await generator.generate(request(), signal);

    const [body, options] = mockCreate.mock.calls[0];
    expect(body.model).toBe('test-model');
    expect(body.response_format).toEqual({ type: 'json_object' });
    expect(body.messages[1].content).toBe(
      'Context passages:\n\n[1] (page 3)\nThe bridge opened in 1932.\n\n'
      + '[2] (pages 4-5)\nRepairs lasted two years.\n\nQuestion: When was the bridge opened?',
    );
    expect(body.messages[0].content).toContain('The document language is "en".');
    expect(options).toEqual({ signal });
  });

  it('should omit the document language when it is unknown', async () => {
    mockCreate.mockResolvedValue(reply('{"answer": "ok"}'));

    await generator.generate(request({ language: 'unknown' }), new AbortController().signal);

    const [body] = mockCreate.mock.calls[0];
    expect(body.messages[0].content).not.toContain('The document language is');
  });

  it('should drop duplicate and out-of-range references', async () => {
    mockCreate.mockResolvedValue(reply('{"answer": "x", "references": [2, 2, 7, 1]}'));

    const result = await generator.generate(request(), new AbortController().signal);

    expect(result.referencedIndexes).toEqual([2, 1]);
  });

  it('should treat an empty reply as a failure', async () => {
    mockCreate.mockResolvedValue(reply(null));

    await expect(generator.generate(request(), new AbortController().signal))
      .rejects.toThrow('Model returned an empty answer');
  });

  it('should wrap API errors as AnswerGenerationFailedError', async () => {
    mockCreate.mockRejectedValue(new Error('Connection refused'));

    const promise = generator.generate(request(), new AbortController().signal);

    await expect(promise).rejects.toBeInstanceOf(AnswerGenerationFailedError);
    await expect(promise).rejects.toThrow('Answer generation failed: Connection refused');
  });

  it('should rethrow the abort error unchanged after cancellation', async () => {
    const controller = new AbortController();
    const abortError = new Error('Request was aborted.');
    mockCreate.mockImplementation(async () => {
      controller.abort();
      throw abortError;
    });

    await expect(generator.generate(request(), controller.signal)).rejects.toBe(abortError);
  });
});

describe('parseAnswer', () => {
  it('should parse a JSON object', () => {
    expect(parseAnswer('{"answer": "yes", "references": [1, 2]}')).toEqual({ answer: 'yes', references: [1, 2] });
  });

  it('should default missing references to an empty list', () => {
    expect(parseAnswer('{"answer": "yes"}')).toEqual({ answer: 'yes', references: [] });
  });

  it('should parse JSON inside a markdown code block', () => {
    const content = 'Here you go:\n```json\n{"answer": "fenced", "references": [3]}\n```';
    expect(parseAnswer(content)).toEqual({ answer: 'fenced', references: [3] });
  });

  it('should parse a JSON object surrounded by prose', () => {
    expect(parseAnswer('Sure! {"answer": "inline", "references": []} Hope it helps.'))
      .toEqual({ answer: 'inline', references: [] });
  });

  it('should fall back to the raw text when no JSON answer is found', () => {
    expect(parseAnswer('The bridge opened in 1932.')).toEqual({ answer: 'The bridge opened in 1932.', references: [] });
    expect(parseAnswer('{"text": "wrong shape"}')).toEqual({ answer: '{"text": "wrong shape"}', references: [] });
  });
});
